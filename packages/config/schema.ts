/**
 * Environment Validation Schema
 *
 * Zod schema for every variable the service reads. All are optional and a
 * blank value counts as unset; the schema rejects values that are present
 * but malformed.
 *
 * @module @config/schema
 */

import { z } from 'zod';

/** `VAR=` in a .env file reads the same as an unset variable */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema.optional()
  );
}

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z.object({
  // -- Core --
  NODE_ENV: optional(z.string()),
  LOG_LEVEL: optional(z.enum(['debug', 'info', 'warn', 'error', 'fatal'])),
  PORT: optional(z.coerce.number().int().min(1).max(65535)),
  HOST: optional(z.string().min(1)),
  PUBLIC_DIR: optional(z.string().min(1)),
  CORS_ORIGIN: optional(z.string().min(1)),

  // -- Model serving --
  DATABRICKS_API_TOKEN: optional(z.string().min(1)),
  DATABRICKS_ENDPOINT_URL: optional(z.string().url()),
  LLM_MAX_TOKENS: optional(positiveInt),
  LLM_TEMPERATURE: optional(z.coerce.number().min(0).max(2)),
  LLM_TIMEOUT_MS: optional(positiveInt),
  SHUTDOWN_TIMEOUT_MS: optional(positiveInt),
});
