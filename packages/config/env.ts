/**
 * Environment Variable Utilities
 *
 * Provides safe parsing of environment variables.
 */

const PLACEHOLDER_PATTERN = /\bplaceholder\b|\byour_|\bxxx\b|\bchangeme\b|^\s*$/i;

/**
 * Trimmed value, or undefined when unset or blank
 */
export function getOptionalEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Check if a value is a placeholder left over from .env.example
 */
export function isPlaceholder(value: string | undefined): boolean {
  if (!value) return true;
  const trimmed = value.trim();
  if (trimmed.length < 3) return true;
  return PLACEHOLDER_PATTERN.test(trimmed);
}

/**
 * Parse integer environment variable with default
 */
export function parseIntEnv(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  // Number('  ') === 0, so blank values must be caught before parsing
  const trimmed = value.trim();
  if (!trimmed) return defaultValue;
  const parsed = Number(trimmed);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

/**
 * Parse float environment variable with default
 */
export function parseFloatEnv(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const trimmed = value.trim();
  if (!trimmed) return defaultValue;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

/**
 * Parse string array environment variable
 */
export function parseArrayEnv(name: string, separator = ','): string[] {
  const value = process.env[name];
  if (!value) return [];
  return value.split(separator).map(s => s.trim()).filter(Boolean);
}
