import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';
import { ErrorV1, type ErrorV1T } from '../schemas/intent.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode = ErrorV1T['code'];

/**
 * Build a structured error response (error.v1 schema)
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1T {
  const error: ErrorV1T = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1T {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Strip file paths and secret-looking assignments from an error message.
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]');
}

function readStatusCode(error: Error): number | undefined {
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  return typeof statusCode === 'number' ? statusCode : undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1T {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  // Plugins (rate limiting) throw an already-built envelope
  const envelope = ErrorV1.safeParse(error);
  if (envelope.success) {
    return envelope.data;
  }

  if (error instanceof Error) {
    const statusCode = readStatusCode(error);

    if (statusCode === 429) {
      return buildErrorV1('RATE_LIMITED', 'Too many requests', undefined, requestId);
    }

    // Fastify body parsing / size errors carry 4xx status codes
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1('BAD_INPUT', sanitizeErrorMessage(error.message), undefined, requestId);
    }

    const message = error.message || 'An unexpected error occurred';
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(message), undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'RATE_LIMITED':
      return 429;
    case 'INTERNAL':
    default:
      return 500;
  }
}
