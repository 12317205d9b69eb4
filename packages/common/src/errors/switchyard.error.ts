export class SwitchyardError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);

    this.name = new.target.name;
  }
}

/**
 * Raised for programming or configuration faults: a misdeclared route, a missing
 * provider, a response mutated in a way its type forbids.
 */
export class LogicError extends SwitchyardError {}
