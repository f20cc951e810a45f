export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class AuthFailureError extends AppError {
  constructor(message = 'Invalid credentials') {
    super(message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class IntegrityError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 409, options);
  }
}

// Storage or stream failure; callers may retry.
export class IOError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, options);
  }
}

const hasStringCode = (error: unknown): error is Error & { code: string } =>
  error instanceof Error && 'code' in error && typeof error.code === 'string';

const isConstraintViolation = (error: unknown) =>
  hasStringCode(error) && error.code.startsWith('SQLITE_CONSTRAINT');

/**
 * Runs a write against SQLite, turning constraint violations into
 * {@link IntegrityError}. Anything else is rethrown untouched.
 */
export const withIntegrity = <T>(message: string, write: () => T): T => {
  try {
    return write();
  } catch (error) {
    if (isConstraintViolation(error)) {
      throw new IntegrityError(message, { cause: error });
    }
    throw error;
  }
};
