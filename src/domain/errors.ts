export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Input failed a structural or policy precondition (weak password,
 * malformed email, empty stored hash). Always correctable by the caller.
 */
export class ValidationError extends DomainError {
  constructor(message = 'Validation failed') {
    super(message);
  }
}
