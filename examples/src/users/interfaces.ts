export interface User {
  readonly id: number;
  readonly name: string;
  readonly email: string;
}

export interface UserInput {
  readonly name: string;
  readonly email: string;
}
