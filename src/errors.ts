/**
 * Base application error class for consistent error handling.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Body of a 400 response: either a single sentence or one help message per field.
 */
export type ValidationMessage = string | Record<string, string>;

/**
 * Raised when request arguments fail validation, before the connection is touched.
 */
export class RequestValidationError extends AppError {
  public readonly validationMessage: ValidationMessage;

  constructor(validationMessage: ValidationMessage) {
    super(
      'VALIDATION_ERROR',
      typeof validationMessage === 'string'
        ? validationMessage
        : `Invalid arguments: ${Object.keys(validationMessage).join(', ')}`,
      { fields: validationMessage },
    );
    this.validationMessage = validationMessage;
  }
}

export class EndpointExistsError extends AppError {
  constructor(path: string) {
    super('ENDPOINT_EXISTS', `Endpoint "${path}" is already registered`, { path });
  }
}
