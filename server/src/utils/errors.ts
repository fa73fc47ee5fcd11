import Database from 'better-sqlite3';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required field is missing, or a reference points nowhere. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** A date or number field could not be read. */
export class ParseError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

type ConstraintCode = 'SQLITE_CONSTRAINT_UNIQUE' | 'SQLITE_CONSTRAINT_FOREIGNKEY';

export function isConstraintViolation(
  error: unknown,
  code: ConstraintCode
): boolean {
  return error instanceof Database.SqliteError && error.code === code;
}
