export class AppError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * The store, the audit log or the camera could not be reached.
 * Means "could not evaluate", never "evaluated and rejected".
 */
export class ServiceUnavailableError extends AppError {
  constructor(message = 'Service temporarily unavailable', cause?: unknown) {
    super(503, message, { retryable: true });
    this.name = 'ServiceUnavailableError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
