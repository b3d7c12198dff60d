/**
 * Structured error types
 *
 * Provides type-safe error handling with machine-readable error codes
 * and structured error details for logging and HTTP responses.
 */

export class PulpError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PulpError';
  }
}

export class ValidationError extends PulpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends PulpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised by a model when asked for a field it does not declare
 */
export class FieldDoesNotExistError extends PulpError {
  constructor(modelName: string, fieldName: string) {
    super(
      `${modelName} has no field named '${fieldName}'`,
      'FIELD_DOES_NOT_EXIST',
      { modelName, fieldName }
    );
    this.name = 'FieldDoesNotExistError';
  }
}

/**
 * Non-success response from the Pulp server
 *
 * Carries the status code and the raw response body as received.
 */
export class TransportError extends PulpError {
  constructor(
    public statusCode: number,
    public body: string = ''
  ) {
    super(`${statusCode}: ${body}`, 'TRANSPORT_ERROR', { statusCode, body });
    this.name = 'TransportError';
  }

  override toString(): string {
    return `${this.statusCode}: ${this.body}`;
  }
}

/**
 * Helper function to check if an error is a PulpError
 */
export function isPulpError(error: unknown): error is PulpError {
  return error instanceof PulpError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isPulpError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
