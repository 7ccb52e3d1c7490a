import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';

import type { ModelServingConfig } from '@config';
import { ErrorCodes, ExternalServiceError, ServiceUnavailableError, TimeoutError } from '@errors';

import { ModelServingClient } from '../ModelServingClient';
import { generateExcuse } from '../../../excuse/service';
import { createChatReply, createExcuseRequest } from '../../../../../../test/factories';

const ENDPOINT = 'https://serving.example.test/serving-endpoints/excuse-model/invocations';

function createConfig(overrides: Partial<ModelServingConfig> = {}): ModelServingConfig {
  return {
    endpointUrl: ENDPOINT,
    apiToken: 'test-secret',
    maxTokens: 1000,
    temperature: 0.7,
    timeoutMs: 30000,
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('ModelServingClient', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  it('posts a chat invocation with the bearer token', async () => {
    fetchMock.mockResolvedValue(jsonResponse(createChatReply('Subject: Late')));

    await new ModelServingClient(createConfig()).complete('Write the email');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Authorization': 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      messages: [{ role: 'user', content: 'Write the email' }],
      max_tokens: 1000,
      temperature: 0.7,
    });
  });

  it('passes configured generation parameters', async () => {
    fetchMock.mockResolvedValue(jsonResponse(createChatReply('ok')));

    await new ModelServingClient(createConfig({ maxTokens: 256, temperature: 0.2 })).complete('p');

    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(JSON.parse(String(init?.body))).toMatchObject({ max_tokens: 256, temperature: 0.2 });
  });

  it('returns the extracted reply text', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ predictions: ['Dear Jordan'] }));

    await expect(new ModelServingClient(createConfig()).complete('p')).resolves.toBe('Dear Jordan');
  });

  it('fails without calling out when the token is missing', async () => {
    const client = new ModelServingClient(createConfig({ apiToken: undefined }));

    const error = await client.complete('p').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceUnavailableError);
    expect(error).toMatchObject({
      message: 'DATABRICKS_API_TOKEN not configured',
      code: ErrorCodes.CONFIGURATION_ERROR,
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails without calling out when the endpoint is missing', async () => {
    const client = new ModelServingClient(createConfig({ endpointUrl: undefined }));

    await expect(client.complete('p')).rejects.toThrow('DATABRICKS_ENDPOINT_URL not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports a non-2xx status without the upstream body', async () => {
    fetchMock.mockResolvedValue(new Response('internal details', { status: 503 }));

    const error = await new ModelServingClient(createConfig()).complete('p').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({ message: 'LLM service error: 503', upstreamStatus: 503 });
  });

  it('aborts the call when the timeout elapses', async () => {
    fetchMock.mockImplementation((_input, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        reject(new DOMException('This operation was aborted', 'AbortError'));
      });
    }));

    const error = await new ModelServingClient(createConfig({ timeoutMs: 20 })).complete('p').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'LLM service timed out after 20ms', timeoutMs: 20 });
  });

  it('reports a connection failure', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const error = await new ModelServingClient(createConfig()).complete('p').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceUnavailableError);
    expect(error).toMatchObject({ message: 'Failed to connect to LLM service' });
  });

  it('reports a body that is not JSON as unexpected', async () => {
    fetchMock.mockResolvedValue(new Response('<html>gateway</html>', { status: 200 }));

    await expect(new ModelServingClient(createConfig()).complete('p')).rejects.toThrow(
      'Unexpected error calling LLM service'
    );
  });

  describe('through the excuse service', () => {
    const request = createExcuseRequest();

    it('produces a draft from a chat reply', async () => {
      fetchMock.mockResolvedValue(jsonResponse(createChatReply('{"subject":"Running late","body":"Dear Jordan"}')));

      const result = await generateExcuse(request, { client: new ModelServingClient(createConfig()) });

      expect(result).toEqual({ subject: 'Running late', body: 'Dear Jordan', success: true });
    });

    it.each([
      ['a non-2xx status', () => fetchMock.mockResolvedValue(new Response('', { status: 500 })), 'LLM service error: 500'],
      ['a connection failure', () => fetchMock.mockRejectedValue(new TypeError('fetch failed')), 'Failed to connect to LLM service'],
    ])('turns %s into a failed result', async (_case, arrange, message) => {
      arrange();

      const result = await generateExcuse(request, { client: new ModelServingClient(createConfig()) });

      expect(result).toEqual({ subject: '', body: '', success: false, error: message });
    });

    it('turns a missing token into a failed result', async () => {
      const client = new ModelServingClient(createConfig({ apiToken: undefined }));

      const result = await generateExcuse(request, { client });

      expect(result).toEqual({
        subject: '',
        body: '',
        success: false,
        error: 'DATABRICKS_API_TOKEN not configured',
      });
    });
  });
});
