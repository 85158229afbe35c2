/**
 * Application-level errors, mapped to HTTP statuses by the error handler.
 */
export class ApplicationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends ApplicationError {
  constructor(message = 'Resource not found') {
    super(message);
  }
}

/**
 * Any authentication or authorization failure. Callers see one message
 * per boundary; the sub-cause only goes to the logs.
 */
export class UnauthorizedError extends ApplicationError {
  constructor(message = 'Unauthorized') {
    super(message);
  }
}

export class ConflictError extends ApplicationError {
  constructor(message = 'Conflict') {
    super(message);
  }
}
