import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { getLogger } from '@kernel/logger';
import { sanitizeHeaders } from '@kernel/redaction';
import { createRequestContext, runWithContext, type RequestContext } from '@kernel/request-context';

import crypto from 'crypto';

/**
* Request ID, request context and completion logging for every route
*/

const logger = getLogger('api');

const contexts = new WeakMap<FastifyRequest, RequestContext>();

/**
 * Client-supplied request IDs are echoed into logs and headers, so only
 * bounded alphanumeric-dash values are accepted.
 */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

export function sanitizeRequestId(raw: string | string[] | undefined): string | undefined {
  if (typeof raw !== 'string') return undefined;
  return SAFE_REQUEST_ID_RE.test(raw) ? raw : undefined;
}

function generateRequestId(): string {
  return `${Date.now()}-${crypto.randomBytes(8).toString('hex')}`;
}

function routePath(req: FastifyRequest): string {
  return req.routeOptions.url || req.url;
}

function logCompletion(req: FastifyRequest, res: FastifyReply): void {
  const meta = {
    method: req.method,
    path: routePath(req),
    statusCode: res.statusCode,
    durationMs: Math.round(res.elapsedTime),
  };

  if (res.statusCode >= 500) {
    logger.error('API request error', undefined, meta);
  } else if (res.statusCode >= 400) {
    logger.warn('API request rejected', meta);
  } else {
    logger.info('API request', meta);
  }
}

export function registerRequestLogging(app: FastifyInstance): void {
  app.addHook('onRequest', (req, res, done) => {
    const requestId = sanitizeRequestId(req.headers['x-request-id']) ?? generateRequestId();
    const context = createRequestContext({ requestId, path: req.url, method: req.method });
    contexts.set(req, context);

    void res.header('X-Request-ID', requestId);
    if (context.traceId) {
      void res.header('X-Trace-ID', context.traceId);
    }
    logger.debug('Incoming request', { method: req.method, url: req.url, headers: sanitizeHeaders(req.headers) });

    runWithContext(context, () => done());
  });

  // Body parsing runs outside the context; re-enter it for the handler
  app.addHook('preHandler', (req, _res, done) => {
    const context = contexts.get(req);
    if (!context) {
      done();
      return;
    }
    runWithContext(context, () => done());
  });

  app.addHook('onResponse', async (req, res) => {
    logCompletion(req, res);
    contexts.delete(req);
  });
}
