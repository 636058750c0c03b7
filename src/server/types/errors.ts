/**
 * Centralized error type definitions for MediTranslate
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Domain-specific error types
 */
export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

/**
 * Translation model files are absent on disk.
 * Not transient: the remedy is downloading the model, so callers must not retry.
 */
export class ModelMissingError extends AppError {
  constructor(language: string, modelPath: string) {
    super(`Model missing for ${language}`, ErrorCode.MODEL_MISSING, 500, true, { language, modelPath });
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  BAD_REQUEST = 'BAD_REQUEST',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  MODEL_MISSING = 'MODEL_MISSING',
}

/**
 * Human-readable message for any thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
