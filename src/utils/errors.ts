export class AppError extends Error {
  code: string;
  isOperational: boolean;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', false);
    this.issues = issues;
  }
}

/** A queue message that does not match the envelope contract. */
export class InvalidEnvelopeError extends AppError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'INVALID_ENVELOPE', false);
    this.issues = issues;
  }
}

export class InvalidTransitionError extends AppError {
  from: string;
  to: string;

  constructor(from: string, to: string) {
    super(`Illegal notification transition ${from} -> ${to}`, 'INVALID_TRANSITION');
    this.from = from;
    this.to = to;
  }
}

/** A compare-and-set write lost to another writer after this process held the claim. */
export class ConcurrentModificationError extends AppError {
  constructor(resource: string) {
    super(`${resource} was modified concurrently`, 'CONCURRENT_MODIFICATION');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND');
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
