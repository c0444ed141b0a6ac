/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by every seedhash package.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * What exactly was wrong with a caller-supplied value.
 */
export type ValidationErrorKind =
  | 'EmptyInput'
  | 'TypeMismatch'
  | 'InvalidRange'
  | 'RangeOverflow'
  | 'InvalidCount'
  | 'InvalidStrataCount'
  | 'InvalidSampleCount'
  | 'InvalidClusterCount'
  | 'InvalidOption';

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  public readonly kind: ValidationErrorKind;

  constructor(
    message: string,
    kind: ValidationErrorKind = 'InvalidOption',
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', 400, { kind, ...context });
    this.kind = kind;
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Narrow an unknown error to a ValidationError of the given kind
 */
export function isValidationError(
  error: unknown,
  kind?: ValidationErrorKind
): error is ValidationError {
  return error instanceof ValidationError && (kind === undefined || error.kind === kind);
}
