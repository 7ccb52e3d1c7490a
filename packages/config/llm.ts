/**
 * Model Serving Configuration
 *
 * Endpoint, credential and generation parameters for the excuse model.
 * Token and endpoint are optional at boot; their absence is reported per request.
 */

import { getOptionalEnv, parseFloatEnv, parseIntEnv } from './env';
import { getTimeoutConfig } from './timeouts';

export interface ModelServingConfig {
  endpointUrl: string | undefined;
  apiToken: string | undefined;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.7;

export function getModelServingConfig(): ModelServingConfig {
  return {
    endpointUrl: getOptionalEnv('DATABRICKS_ENDPOINT_URL'),
    apiToken: getOptionalEnv('DATABRICKS_API_TOKEN'),
    maxTokens: parseIntEnv('LLM_MAX_TOKENS', DEFAULT_MAX_TOKENS),
    temperature: parseFloatEnv('LLM_TEMPERATURE', DEFAULT_TEMPERATURE),
    timeoutMs: getTimeoutConfig().llm,
  };
}
