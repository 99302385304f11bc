export type ErrorStatus = 400 | 404 | 500 | 502 | 503;

/**
 * Base error for failures the API reports to callers. The status code is
 * used as-is by the HTTP error handler.
 */
export class AppError extends Error {
  statusCode: ErrorStatus;
  isOperational: boolean;

  constructor(message: string, statusCode: ErrorStatus = 500, isOperational = true) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

/**
 * An upstream API (Gemini, Twitter, Wikipedia, a news feed) failed or
 * returned something unusable.
 */
export class ExternalServiceError extends AppError {
  service: string;

  constructor(service: string, message: string) {
    super(`${service}: ${message}`, 502);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
