/**
 * Base class for all application-level errors.
 * These errors represent failures in use case execution.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ Café Errors ============

export class CafeClosedError extends ApplicationError {
  readonly code = 'CAFE_CLOSED';

  constructor() {
    super('The café is closed and cannot take orders');
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}
