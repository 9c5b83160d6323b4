/**
 * Errors raised by use cases. `statusCode` is the HTTP status the
 * presentation layer answers with.
 */
export class AppError extends Error {
  constructor(message: string, public readonly statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class ProcessingError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 500, options);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || "Unknown error";
  }
  return typeof error === "string" ? error : "Unknown error";
}
