import { getModelServingConfig, type ModelServingConfig } from '@config';
import {
  AppError,
  ErrorCodes,
  ExternalServiceError,
  ServiceUnavailableError,
  TimeoutError,
} from '@errors';
import { getLogger } from '@kernel/logger';
import { sanitizeErrorMessage } from '@kernel/redaction';

import type { CompletionClient } from '../../excuse/types';
import { classifyReply, extractReplyText } from './replyShapes';

/**
 * Databricks Model Serving Client
 * Sends one chat-style invocation per prompt.
 *
 * Required: DATABRICKS_API_TOKEN, DATABRICKS_ENDPOINT_URL
 */

/** Upstream error bodies are logged at most this long, never returned */
const MAX_ERROR_BODY_LENGTH = 200;

interface ChatInvocation {
  messages: Array<{ role: 'user'; content: string }>;
  max_tokens: number;
  temperature: number;
}

export class ModelServingClient implements CompletionClient {
  private readonly logger = getLogger('ModelServingClient');

  constructor(private readonly config: ModelServingConfig = getModelServingConfig()) {}

  async complete(prompt: string): Promise<string> {
    const { apiToken, endpointUrl, maxTokens, temperature, timeoutMs } = this.config;

    if (!apiToken) {
      throw new ServiceUnavailableError('DATABRICKS_API_TOKEN not configured', ErrorCodes.CONFIGURATION_ERROR);
    }
    if (!endpointUrl) {
      throw new ServiceUnavailableError('DATABRICKS_ENDPOINT_URL not configured', ErrorCodes.CONFIGURATION_ERROR);
    }

    const payload: ChatInvocation = {
      messages: [{ role: 'user', content: prompt }],
      max_tokens: maxTokens,
      temperature,
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const startTime = Date.now();

    try {
      const response = await fetch(endpointUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${apiToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        this.logger.error('Model serving returned an error status', undefined, {
          status: response.status,
          body: sanitizeErrorMessage(errorBody.slice(0, MAX_ERROR_BODY_LENGTH)),
        });
        throw new ExternalServiceError(`LLM service error: ${response.status}`, response.status);
      }

      const json: unknown = await response.json();
      const reply = classifyReply(json);
      const text = extractReplyText(json);

      this.logger.info('Model serving call completed', {
        durationMs: Date.now() - startTime,
        variant: reply.kind,
        replyLength: text.length,
      });
      this.logger.debug('Model serving reply', { reply: text.slice(0, 500) });

      return text;
    } catch (error) {
      throw this.toServingError(error, controller.signal.aborted, timeoutMs);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private toServingError(error: unknown, aborted: boolean, timeoutMs: number): AppError {
    if (error instanceof AppError) {
      return error;
    }
    if (aborted) {
      this.logger.error('Model serving call timed out', undefined, { timeoutMs });
      return new TimeoutError(`LLM service timed out after ${timeoutMs}ms`, timeoutMs, { cause: error });
    }
    // fetch rejects with a TypeError when no connection can be made
    if (error instanceof TypeError) {
      this.logger.error('Model serving connection failed', error);
      return new ServiceUnavailableError(
        'Failed to connect to LLM service',
        ErrorCodes.SERVICE_UNAVAILABLE,
        { cause: error }
      );
    }
    this.logger.error('Unexpected model serving failure', error instanceof Error ? error : new Error(String(error)));
    return new ExternalServiceError('Unexpected error calling LLM service', undefined, { cause: error });
  }
}
