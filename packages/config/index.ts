/**
 * Shared Configuration Package
 *
 * Environment parsing and typed configuration for the excuse email service.
 *
 * @example
 * ```typescript
 * import { getModelServingConfig, validateEnv } from '@config';
 *
 * const warnings = validateEnv();
 * const { endpointUrl, timeoutMs } = getModelServingConfig();
 * ```
 *
 * @module @config
 */

// ============================================================================
// Environment Utilities
// ============================================================================
export {
  getOptionalEnv,
  isPlaceholder,
  parseIntEnv,
  parseFloatEnv,
  parseArrayEnv,
} from './env';

// ============================================================================
// Validation
// ============================================================================
export {
  MODEL_SERVING_ENV_VARS,
  type ValidationResult,
  validateConfig,
  validateEnv,
} from './validation';
export { envSchema } from './schema';

// ============================================================================
// Typed Configuration
// ============================================================================
export { getTimeoutConfig, parsePositiveIntEnv, DEFAULT_LLM_TIMEOUT_MS } from './timeouts';
export {
  getModelServingConfig,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type ModelServingConfig,
} from './llm';
export { getServerConfig, SERVICE_NAME, SERVICE_VERSION, type ServerConfig } from './server';
