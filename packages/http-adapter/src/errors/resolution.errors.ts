import { BadRequestError, UnprocessableEntityError } from './http.errors';

export interface Violation {
  readonly property: string;
  readonly message: string;
  readonly code: string;
}

export class MissingRequiredParameterError extends BadRequestError {
  constructor(readonly parameter: string) {
    super(`Missing required parameter '${parameter}'.`);
  }
}

export class TypeMismatchError extends BadRequestError {
  constructor(
    readonly parameter: string,
    readonly expected: string,
    readonly value: string,
  ) {
    super(`Parameter '${parameter}' with value '${value}' could not be converted into a valid ${expected}.`);
  }
}

export class IncompatibleParametersError extends BadRequestError {
  constructor(
    readonly parameter: string,
    readonly incompatibleWith: string,
  ) {
    super(`Parameter '${parameter}' is incompatible with parameter '${incompatibleWith}'.`);
  }
}

export class ValidationError extends UnprocessableEntityError {
  constructor(readonly violations: readonly Violation[]) {
    super('Validation failed.');
  }
}
