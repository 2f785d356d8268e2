/**
 * Standardized error classes for Reelwatch
 * API errors return the consistent ApiError format from @reelwatch/shared
 */

import type { FastifyInstance, FastifyError } from 'fastify';
import type { ZodError } from 'zod';
import type { ApiError, ServerType } from '@reelwatch/shared';

// Error codes for client identification
export const ErrorCodes = {
  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_001',
  MALFORMED_OBSERVATION: 'VAL_002',

  // Resource (3xxx)
  NOT_FOUND: 'RES_001',

  // Server (4xxx)
  INTERNAL_ERROR: 'SRV_001',
  SERVICE_UNAVAILABLE: 'SRV_002',
  DATABASE_ERROR: 'SRV_003',

  // Media server connector (6xxx)
  CONNECTOR_UNREACHABLE: 'EXT_001',
  CONNECTOR_UNAUTHORIZED: 'EXT_002',
  CONNECTOR_NOT_FOUND: 'EXT_003',
  CONNECTOR_TIMEOUT: 'EXT_004',
  CONNECTOR_MALFORMED_RESPONSE: 'EXT_005',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  toJSON(): ApiError & { code: ErrorCode; details?: Record<string, unknown> } {
    return {
      statusCode: this.statusCode,
      error: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Validation error - 400 Bad Request
 */
export class ValidationError extends AppError {
  public readonly fields?: Array<{ field: string; message: string }>;

  constructor(message: string, fields?: Array<{ field: string; message: string }>) {
    super(message, 400, ErrorCodes.VALIDATION_ERROR, fields ? { fields } : undefined);
    this.name = 'ValidationError';
    this.fields = fields;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromZodError(error: ZodError): ValidationError {
    const fields = error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError('Validation failed', fields);
  }
}

/**
 * Not found error - 404 Not Found
 */
export class NotFoundError extends AppError {
  constructor(resource = 'Resource', id?: string) {
    const message = id ? `${resource} with ID '${id}' not found` : `${resource} not found`;
    super(message, 404, ErrorCodes.NOT_FOUND);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Internal server error - 500 Internal Server Error
 */
export class InternalError extends AppError {
  constructor(message = 'An unexpected error occurred') {
    // Not operational - these are bugs that need investigation
    super(message, 500, ErrorCodes.INTERNAL_ERROR, undefined, false);
    this.name = 'InternalError';
    Object.setPrototypeOf(this, InternalError.prototype);
  }
}

/**
 * Service unavailable - 503 Service Unavailable
 */
export class ServiceUnavailableError extends AppError {
  constructor(service: string) {
    super(`${service} is currently unavailable`, 503, ErrorCodes.SERVICE_UNAVAILABLE);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}

// ============================================================================
// Pipeline errors
// ============================================================================

export type ConnectorErrorKind =
  | 'unreachable'
  | 'unauthorized'
  | 'not_found'
  | 'timeout'
  | 'malformed_response';

const CONNECTOR_ERROR_STATUS: Record<ConnectorErrorKind, { statusCode: number; code: ErrorCode }> =
  {
    unreachable: { statusCode: 502, code: ErrorCodes.CONNECTOR_UNREACHABLE },
    unauthorized: { statusCode: 502, code: ErrorCodes.CONNECTOR_UNAUTHORIZED },
    not_found: { statusCode: 404, code: ErrorCodes.CONNECTOR_NOT_FOUND },
    timeout: { statusCode: 504, code: ErrorCodes.CONNECTOR_TIMEOUT },
    malformed_response: { statusCode: 502, code: ErrorCodes.CONNECTOR_MALFORMED_RESPONSE },
  };

/**
 * Failure of a call to the upstream media server
 */
export class ConnectorError extends AppError {
  public readonly kind: ConnectorErrorKind;
  public readonly service: ServerType;

  constructor(service: ServerType, kind: ConnectorErrorKind, message: string, cause?: unknown) {
    const { statusCode, code } = CONNECTOR_ERROR_STATUS[kind];
    super(`${service.charAt(0).toUpperCase() + service.slice(1)} ${kind}: ${message}`, statusCode, code, {
      kind,
    });
    this.name = 'ConnectorError';
    this.kind = kind;
    this.service = service;
    this.cause = cause;
    Object.setPrototypeOf(this, ConnectorError.prototype);
  }

  /** Transient failures worth retrying */
  get retryable(): boolean {
    return this.kind === 'unreachable' || this.kind === 'timeout';
  }
}

/**
 * Observation that failed shape validation at the reconciler intake
 */
export class MalformedObservationError extends AppError {
  constructor(message: string, fields?: Array<{ field: string; message: string }>) {
    super(message, 400, ErrorCodes.MALFORMED_OBSERVATION, fields ? { fields } : undefined);
    this.name = 'MalformedObservationError';
    Object.setPrototypeOf(this, MalformedObservationError.prototype);
  }

  static fromZodError(error: ZodError): MalformedObservationError {
    const fields = error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    return new MalformedObservationError('Malformed observation', fields);
  }
}

/**
 * History write failed at the storage layer
 */
export class HistoryStorageError extends AppError {
  constructor(message = 'History write failed', cause?: unknown) {
    super(message, 500, ErrorCodes.DATABASE_ERROR);
    this.name = 'HistoryStorageError';
    this.cause = cause;
    Object.setPrototypeOf(this, HistoryStorageError.prototype);
  }
}

/**
 * Best-effort message extraction for logging unknown throwables
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Register global error handler for Fastify
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError | AppError | Error, request, reply) => {
    request.log.error(
      {
        err: error,
        requestId: request.id,
        url: request.url,
        method: request.method,
      },
      'Request error'
    );

    if (error instanceof AppError) {
      return reply.status(error.statusCode).send(error.toJSON());
    }

    // Handle Fastify validation errors
    if ('validation' in error && error.validation) {
      const validationError = new ValidationError(
        'Validation failed',
        error.validation.map((v) => ({
          field: v.instancePath || 'unknown',
          message: v.message ?? 'Invalid value',
        }))
      );
      return reply.status(400).send(validationError.toJSON());
    }

    if ('statusCode' in error && typeof error.statusCode === 'number') {
      const response: ApiError = {
        statusCode: error.statusCode,
        error: error.name || 'Error',
        message: error.message,
      };
      return reply.status(error.statusCode).send(response);
    }

    const isProduction = process.env.NODE_ENV === 'production';
    const response: ApiError = {
      statusCode: 500,
      error: 'InternalServerError',
      message: isProduction ? 'An unexpected error occurred' : error.message,
    };

    return reply.status(500).send(response);
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiError = {
      statusCode: 404,
      error: 'NotFound',
      message: `Route ${request.method} ${request.url} not found`,
    };
    return reply.status(404).send(response);
  });
}
