import type { Response } from 'express';

export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or cross-field-inconsistent input; nothing has been written. */
export class ValidationError extends AppError {
  constructor(public readonly fields: FieldErrors) {
    super(400, 'Validation failed');
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(401, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(403, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(404, message);
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(message: string) {
    super(405, message);
  }
}

/** The requested action does not apply to the record's current state. */
export class StateConflictError extends AppError {
  constructor(message: string) {
    super(409, message);
  }
}

interface PgError {
  code: string;
  detail?: string;
}

function isPgError(err: unknown, code: string): err is PgError {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export function sendError(res: Response, err: unknown, fallback: string) {
  if (err instanceof ValidationError) {
    return res.status(err.status).json({ errors: err.fields });
  }
  if (err instanceof AppError) {
    return res.status(err.status).json({ error: err.message });
  }
  if (isPgError(err, '23505')) {
    return res.status(409).json({ error: err.detail || 'Record already exists' });
  }
  if (isPgError(err, '23503')) {
    return res.status(409).json({ error: 'Record is still referenced by other records' });
  }
  console.error(`[ERROR] ${fallback}:`, err);
  return res.status(500).json({ error: fallback });
}
