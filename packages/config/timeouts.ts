/**
 * Timeout Configuration
 */

import { parseIntEnv } from './env';
import { getLogger } from '@kernel/logger';

const logger = getLogger('config:timeouts');

/**
 * Values <= 0 would disable the abort timer entirely; they fall back to the default.
 */
export function parsePositiveIntEnv(name: string, defaultValue: number): number {
  const parsed = parseIntEnv(name, defaultValue);
  if (parsed <= 0) {
    logger.warn('Invalid timeout configuration', { variable: name, value: parsed, default: defaultValue });
    return defaultValue;
  }
  return parsed;
}

/** Default outbound model-serving timeout */
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

/**
 * Read at call time so a changed environment (tests, reloads) is honored.
 */
export function getTimeoutConfig(): { llm: number; shutdown: number } {
  return {
    /** Outbound model-serving call */
    llm: parsePositiveIntEnv('LLM_TIMEOUT_MS', DEFAULT_LLM_TIMEOUT_MS),
    /** Grace period for draining connections on shutdown */
    shutdown: parsePositiveIntEnv('SHUTDOWN_TIMEOUT_MS', 10_000),
  };
}
