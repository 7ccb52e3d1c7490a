import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';
import { context as otelContext, trace } from '@opentelemetry/api';

/**
* Request Context Module
* Carries the request ID and timing of the current request through async calls,
* so log entries written deep inside the excuse pipeline can be correlated.
*/

export interface RequestContext {
  requestId: string;
  traceId?: string | undefined;
  spanId?: string | undefined;
  startTime: number;
  path?: string | undefined;
  method?: string | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run function within a request context
*/
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

function activeOtelIds(): { traceId?: string; spanId?: string } {
  try {
    const activeSpan = trace.getSpan(otelContext.active());
    if (activeSpan) {
      const spanCtx = activeSpan.spanContext();
      if (spanCtx.traceId && spanCtx.traceId !== '00000000000000000000000000000000') {
        return { traceId: spanCtx.traceId, spanId: spanCtx.spanId };
      }
    }
  } catch {
    // OTel not initialized: random IDs below
  }
  return {};
}

/**
* Generate new request context
* Bridges OTel trace context when available, falling back to random UUIDs.
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  const otel = activeOtelIds();

  return {
    requestId: options?.requestId || randomUUID(),
    traceId: options?.traceId || otel.traceId || randomUUID(),
    spanId: otel.spanId || randomUUID().slice(0, 16),
    startTime: Date.now(),
    path: options?.path,
    method: options?.method,
  };
}

/**
* Elapsed time since the current request started, or 0 outside a request
*/
export function getElapsedMs(): number {
  const context = getRequestContext();
  if (!context) return 0;
  return Date.now() - context.startTime;
}
