import type { FastifyReply, FastifyRequest } from 'fastify';
import { getLogger, type Logger } from '@kernel/logger';
import { AppError, ErrorCodes, type ErrorCode } from './index';
import { getReplyRequestId, sendError } from './responses';

interface ErrorHandlerOptions {
  /** Logger instance or service name string (will create a logger) */
  logger: Logger | string;
}

interface ErrorLike {
  message: string;
  statusCode?: number | undefined;
}

function toErrorLike(error: unknown): ErrorLike {
  if (error instanceof Error) {
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number'
      ? error.statusCode
      : undefined;
    return { message: error.message, statusCode };
  }
  return { message: String(error) };
}

/**
* Error code for framework errors that only carry an HTTP status
* (malformed JSON body, unknown content type, body too large)
*/
function codeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return ErrorCodes.VALIDATION_ERROR;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 413:
      return ErrorCodes.PAYLOAD_TOO_LARGE;
    case 415:
      return ErrorCodes.UNSUPPORTED_MEDIA_TYPE;
    case 503:
      return ErrorCodes.SERVICE_UNAVAILABLE;
    default:
      return ErrorCodes.INTERNAL_ERROR;
  }
}

/**
 * Creates the Fastify error handler producing the canonical error shape
 * `{ error, code, requestId, details? }` for every error a route throws.
 *
 * Usage:
 *   app.setErrorHandler(createErrorHandler({ logger: 'api' }));
 */
export function createErrorHandler(options: ErrorHandlerOptions) {
  const log = typeof options.logger === 'string'
    ? getLogger(options.logger)
    : options.logger;

  return function handleError(error: unknown, request: FastifyRequest, reply: FastifyReply): void {
    // AppError subclasses carry their own code + statusCode
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        log.error(`${request.method} ${request.url} failed`, error, { code: error.code });
      }
      void reply.status(error.statusCode).send(error.toClientJSON(getReplyRequestId(reply)));
      return;
    }

    const { message, statusCode = 500 } = toErrorLike(error);
    if (statusCode >= 500) {
      log.error(`${request.method} ${request.url} failed`, error instanceof Error ? error : new Error(message));
      void sendError(reply, statusCode, ErrorCodes.INTERNAL_ERROR, 'Internal server error', {
        details: { message },
      });
      return;
    }

    void sendError(reply, statusCode, codeForStatus(statusCode), message);
  };
}
