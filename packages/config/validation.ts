/**
 * Configuration Validation
 *
 * Malformed values are errors and stop the boot. A missing model-serving
 * credential is only a warning: the service still starts and each excuse
 * request reports the gap as a failed result.
 */

import { extractZodIssues } from '@errors';

import { isPlaceholder } from './env';
import { envSchema } from './schema';

export const MODEL_SERVING_ENV_VARS = ['DATABRICKS_API_TOKEN', 'DATABRICKS_ENDPOINT_URL'] as const;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateConfig(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    for (const issue of extractZodIssues(parsed.error)) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  for (const name of MODEL_SERVING_ENV_VARS) {
    const value = env[name];
    if (!value?.trim()) {
      warnings.push(`${name} is not set; excuse generation will fail until it is configured`);
    } else if (isPlaceholder(value)) {
      warnings.push(`${name} looks like a placeholder value`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate the process environment at startup.
 * @throws Error listing every malformed variable
 * @returns warnings for the caller to log
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): string[] {
  const result = validateConfig(env);
  if (!result.valid) {
    throw new Error(`Invalid environment configuration:\n  ${result.errors.join('\n  ')}`);
  }
  return result.warnings;
}
