import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

// ============================================================================
// Error Codes
// ============================================================================

export const ERROR_CODES = {
  internal: 'INTERNAL_ERROR',
  http: 'HTTP_ERROR',
  validation: 'VALIDATION_ERROR',
  unsupportedMediaType: 'UNSUPPORTED_MEDIA_TYPE',
  configuration: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Status codes an exception may answer with; 1xx carry no body. */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * One invalid field found while decoding a payload.
 * `path` is dotted (`address.city`, `tags.0`); the empty string is the payload root.
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/** Body of every error response. */
export interface ApiErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string;
  };
}

// ============================================================================
// Exceptions
// ============================================================================

/**
 * Error with a status and a machine-readable code, rendered by the error
 * handler as an {@link ApiErrorBody}. Custom codes are accepted next to
 * {@link ERROR_CODES}.
 *
 * @example
 * ```ts
 * throw new ApiException('Person already exists', 409, 'CONFLICT', { name: 'Ada' });
 * ```
 */
export class ApiException extends HTTPException {
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, status: ApiStatusCode = 500, code: string = ERROR_CODES.internal, details?: unknown) {
    super(status, { message });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  toJSON(): ApiErrorBody {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
      },
    };
  }
}

/**
 * Raised per request when a wire payload does not match the transfer model.
 * `details` lists every invalid field found in one pass.
 */
export class InputValidationException extends ApiException {
  declare readonly details: ValidationIssue[];

  constructor(message: string, details: ValidationIssue[] = []) {
    super(message, 400, ERROR_CODES.validation, details);
    this.name = 'InputValidationException';
  }

  static fromZodError(error: ZodError): InputValidationException {
    return new InputValidationException(
      'Validation failed',
      error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
        code: issue.code,
      }))
    );
  }
}

export class UnsupportedMediaTypeException extends ApiException {
  readonly mediaType: string;

  constructor(mediaType: string) {
    super(`Unsupported media type: ${mediaType}`, 415, ERROR_CODES.unsupportedMediaType);
    this.name = 'UnsupportedMediaTypeException';
    this.mediaType = mediaType;
  }
}

/**
 * Raised while building DTOs and bindings, never while serving a request.
 */
export class ConfigurationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, ERROR_CODES.configuration, details);
    this.name = 'ConfigurationException';
  }
}

/**
 * An introspector or builder produced metadata it should never produce.
 * Not an ApiException: the error handler answers it with a generic 500.
 */
export class SchemaConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaConstructionError';
  }
}

/**
 * A domain value reached a union with nested alternatives but matched none of
 * them. Raised instead of sending the value unfiltered; answered with a 500.
 */
export class TransferError extends Error {
  readonly alternatives: readonly string[];

  constructor(message: string, alternatives: readonly string[]) {
    super(message);
    this.name = 'TransferError';
    this.alternatives = alternatives;
  }
}
