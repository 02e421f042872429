/**
 * Application error taxonomy. Every failure raised by a service is one of
 * these; the error middleware maps them onto the response envelope.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_INPUT'
  | 'CONFLICT'
  | 'FORBIDDEN'
  | 'UNAUTHENTICATED';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(statusCode: number, code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// Missing or inactive entity
export class NotFoundError extends AppError {
  constructor(message: string = 'Not found') {
    super(404, 'NOT_FOUND', message);
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string = 'Invalid input', details?: unknown) {
    super(400, 'INVALID_INPUT', message, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Already exists') {
    super(409, 'CONFLICT', message);
  }
}

// Ownership or role mismatch
export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(403, 'FORBIDDEN', message);
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message: string = 'Not authenticated') {
    super(401, 'UNAUTHENTICATED', message);
  }
}
