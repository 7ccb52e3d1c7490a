/**
 * Standardized API response helpers.
 *
 * Every error response from every route conforms to the canonical shape:
 * { error: string, code: string, requestId: string, details?: unknown }
 */

import type { FastifyReply } from 'fastify';
import { ErrorCodes, shouldExposeErrorDetails, type ErrorCode, type ErrorResponse } from './index';

/**
 * Request ID the request logger put on the reply, or '' before it ran
 */
export function getReplyRequestId(reply: FastifyReply): string {
  const rawRequestId = reply.getHeader('x-request-id');
  return typeof rawRequestId === 'string' ? rawRequestId : '';
}

/**
 * Send a standardized error response.
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: ErrorCode,
  message: string,
  opts?: { details?: unknown }
): FastifyReply {
  const body: ErrorResponse = {
    error: message,
    code,
    requestId: getReplyRequestId(reply),
  };
  if (opts?.details !== undefined && shouldExposeErrorDetails()) {
    body.details = opts.details;
  }
  return reply.status(statusCode).send(body);
}

/** Convenience helpers for common error responses. */
export const errors = {
  notFound: (reply: FastifyReply, resource = 'Resource') =>
    sendError(reply, 404, ErrorCodes.NOT_FOUND, `${resource} not found`),

  unsupportedMediaType: (reply: FastifyReply) =>
    sendError(reply, 415, ErrorCodes.UNSUPPORTED_MEDIA_TYPE, 'Unsupported Media Type: Content-Type must be application/json'),
} as const;
