import { describe, it, expect } from 'vitest';

import {
  createRequestContext,
  getElapsedMs,
  getRequestContext,
  runWithContext,
} from '../request-context';

describe('request context', () => {
  it('is empty outside a request', () => {
    expect(getRequestContext()).toBeUndefined();
    expect(getElapsedMs()).toBe(0);
  });

  it('keeps a supplied request ID and fills in trace IDs', () => {
    const context = createRequestContext({ requestId: 'req-1', path: '/api/generate-excuse', method: 'POST' });

    expect(context.requestId).toBe('req-1');
    expect(context.traceId).toMatch(/^[0-9a-f-]{36}$/);
    expect(context.spanId).toHaveLength(16);
    expect(context.path).toBe('/api/generate-excuse');
    expect(context.method).toBe('POST');
  });

  it('is visible across awaits inside runWithContext', async () => {
    const context = createRequestContext({ requestId: 'req-2' });

    const seen = await runWithContext(context, async () => {
      await new Promise(resolve => setTimeout(resolve, 1));
      return getRequestContext()?.requestId;
    });

    expect(seen).toBe('req-2');
    expect(getRequestContext()).toBeUndefined();
  });

  it('measures elapsed time inside a request', () => {
    const elapsed = runWithContext(createRequestContext(), () => getElapsedMs());
    expect(elapsed).toBeGreaterThanOrEqual(0);
    expect(elapsed).toBeLessThan(1000);
  });
});
