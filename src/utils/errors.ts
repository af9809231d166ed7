/**
 * Error types and codes for lic.
 * Every failure the CLI reports extends LicError.
 */

/**
 * Base error class for all lic errors.
 */
export class LicError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LicError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A required value could not be resolved, or the environment is invalid.
 */
export class ConfigError extends LicError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * License registry failures (network, HTTP status, response shape).
 */
export class RegistryError extends LicError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * The filesystem rejected the LICENSE write.
 */
export class WriteError extends LicError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'WriteError';
  }
}

/**
 * The user aborted an interactive prompt.
 */
export class InteractionCancelledError extends LicError {
  constructor(message = 'Operation cancelled.') {
    super(ErrorCodes.INTERACTION_CANCELLED, message);
    this.name = 'InteractionCancelledError';
  }
}

export const ErrorCodes = {
  // Configuration
  MISSING_AUTHOR: 'MISSING_AUTHOR',
  INVALID_ENVIRONMENT: 'INVALID_ENVIRONMENT',

  // Registry
  REGISTRY_UNREACHABLE: 'REGISTRY_UNREACHABLE',
  REGISTRY_HTTP_ERROR: 'REGISTRY_HTTP_ERROR',
  REGISTRY_INVALID_RESPONSE: 'REGISTRY_INVALID_RESPONSE',

  // Output
  LICENSE_WRITE_FAILED: 'LICENSE_WRITE_FAILED',

  // Interaction
  INTERACTION_CANCELLED: 'INTERACTION_CANCELLED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
