import type { User, UserInput } from './interfaces';

export class UserRepository {
  private readonly users = new Map<number, User>();
  private nextId = 1;

  constructor(seed: readonly UserInput[] = []) {
    for (const input of seed) {
      this.create(input);
    }
  }

  findAll(): User[] {
    return [...this.users.values()];
  }

  findOneById(id: number): User | undefined {
    return this.users.get(id);
  }

  findOneByEmail(email: string): User | undefined {
    return this.findAll().find(user => user.email === email);
  }

  create(input: UserInput): User {
    const user: User = { id: this.nextId++, ...input };

    this.users.set(user.id, user);

    return user;
  }

  updateById(id: number, input: UserInput): User | undefined {
    if (!this.users.has(id)) {
      return undefined;
    }

    const user: User = { id, ...input };

    this.users.set(id, user);

    return user;
  }

  deleteById(id: number): boolean {
    return this.users.delete(id);
  }
}
