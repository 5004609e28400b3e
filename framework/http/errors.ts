/**
 * HTTP Errors
 *
 * Exceptions a handler can throw to end the request with a specific
 * status. The application turns them into the standard API error body.
 */

import { apiError, HttpStatus } from '../api/response.ts';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'CONFLICT'
  | 'UPSTREAM_ERROR'
  | 'SERVER_ERROR';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  UNAUTHORIZED: HttpStatus.UNAUTHORIZED,
  FORBIDDEN: HttpStatus.FORBIDDEN,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  METHOD_NOT_ALLOWED: HttpStatus.METHOD_NOT_ALLOWED,
  CONFLICT: HttpStatus.CONFLICT,
  UPSTREAM_ERROR: HttpStatus.BAD_GATEWAY,
  SERVER_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Error carrying an HTTP status and an API error code
 */
export class HttpError extends Error {
  readonly status: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HttpError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    this.details = details;
  }

  static badRequest(message: string, details?: Record<string, unknown>): HttpError {
    return new HttpError('VALIDATION_ERROR', message, details);
  }

  static unauthorized(message = 'Unauthorized'): HttpError {
    return new HttpError('UNAUTHORIZED', message);
  }

  static notFound(message = 'Not Found'): HttpError {
    return new HttpError('NOT_FOUND', message);
  }

  static conflict(message: string, details?: Record<string, unknown>): HttpError {
    return new HttpError('CONFLICT', message, details);
  }

  /**
   * Render as a JSON response
   */
  toResponse(): Response {
    return Response.json(apiError(this.code, this.message, this.details), {
      status: this.status,
    });
  }
}

/**
 * Status code for an API error code
 */
export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Normalize an unknown thrown value
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
