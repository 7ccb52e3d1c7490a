import { AppError } from '@errors';
import { getLogger } from '@kernel/logger';

import { buildExcusePrompt } from '../ai/prompts/excuseEmail.v1';
import { normalizeModelReply } from './normalizer';
import type { CompletionClient, ExcuseRequest, ExcuseResponse } from './types';

const logger = getLogger('excuse-service');

export const GENERIC_FAILURE_MESSAGE = 'An error occurred processing your request';

export interface ExcuseServiceDeps {
  client: CompletionClient;
}

function failedExcuse(error: string): ExcuseResponse {
  return { subject: '', body: '', success: false, error };
}

/**
* Generate an excuse email for an already validated request.
* Never rejects: downstream failures come back as success: false.
*/
export async function generateExcuse(request: ExcuseRequest, deps: ExcuseServiceDeps): Promise<ExcuseResponse> {
  const log = logger.child({ category: request.category, tone: request.tone });
  log.info('Generating excuse', { seriousness: request.seriousness });

  let reply: string;
  try {
    reply = await deps.client.complete(buildExcusePrompt(request));
  } catch (error) {
    if (error instanceof AppError) {
      log.warn('Excuse generation failed', { code: error.code, error: error.message });
      return failedExcuse(error.message);
    }
    log.error('Excuse generation failed unexpectedly', error instanceof Error ? error : new Error(String(error)));
    return failedExcuse(GENERIC_FAILURE_MESSAGE);
  }

  const { subject, body, strategy } = normalizeModelReply(reply, request);
  log.info('Excuse generated', { strategy, bodyLength: body.length });

  return { subject, body, success: true };
}
