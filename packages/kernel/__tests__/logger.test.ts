import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { addLogHandler, clearLogHandlers, getLogger, resetLogHandlers, type LogEntry } from '../logger';
import { createRequestContext, runWithContext } from '../request-context';

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    entries = [];
    clearLogHandlers();
    addLogHandler(entry => entries.push(entry));
  });

  afterEach(() => {
    resetLogHandlers();
  });

  it('prefixes messages with the service name', () => {
    getLogger('excuse-service').info('Generating excuse', { tone: 'casual' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: '[excuse-service] Generating excuse',
      service: 'excuse-service',
      metadata: { tone: 'casual' },
    });
  });

  it('drops entries below LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const logger = getLogger('svc');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(entries.map(e => e.level)).toEqual(['warn', 'error']);
  });

  it('attaches the error', () => {
    const error = new Error('boom');
    getLogger('svc').error('Call failed', error, { status: 500 });

    expect(entries[0]).toMatchObject({ errorMessage: 'boom', error, metadata: { status: 500 } });
  });

  it('correlates entries with the current request', async () => {
    const context = createRequestContext({ requestId: 'req-42' });

    await runWithContext(context, async () => {
      getLogger('svc').info('inside');
    });

    expect(entries[0]?.requestId).toBe('req-42');
    expect(entries[0]?.traceId).toBe(context.traceId);
    expect(entries[0]?.duration).toBeGreaterThanOrEqual(0);
  });

  it('prefers an explicit correlation ID', async () => {
    await runWithContext(createRequestContext({ requestId: 'req-42' }), async () => {
      getLogger({ service: 'svc', correlationId: 'job-7' }).info('inside');
    });

    expect(entries[0]?.requestId).toBe('job-7');
  });

  it('merges child context into metadata', () => {
    getLogger('svc').child({ component: 'normalizer' }).info('done', { strategy: 'json' });

    expect(entries[0]?.metadata).toEqual({ component: 'normalizer', strategy: 'json' });
  });

  it('stops delivering to a removed handler', () => {
    const extra: LogEntry[] = [];
    const remove = addLogHandler(entry => extra.push(entry));

    getLogger('svc').info('first');
    remove();
    getLogger('svc').info('second');

    expect(extra).toHaveLength(1);
    expect(entries).toHaveLength(2);
  });

  it('writes redacted JSON lines to stderr by default', () => {
    resetLogHandlers();
    const write = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    getLogger('svc').info('hello', { token: 'test-secret', count: 2 });

    expect(write).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(write.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: 'INFO',
      message: '[svc] hello',
      service: 'svc',
      metadata: { token: '[REDACTED]', count: 2 },
    });
    expect(line).not.toHaveProperty('correlationId');
    write.mockRestore();
  });
});
