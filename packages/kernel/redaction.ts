/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to every log entry's metadata.
 * Keeps the model-serving bearer token and auth headers out of log output.
 */

// Patterns for detecting sensitive fields (by key name)
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^apikey$/i,
  /^auth[_-]?token$/i,
  /^access[_-]?token$/i,
  /^private[_-]?key$/i,
  /^client[_-]?secret$/i,
  /^jwt$/i,
  /^bearer$/i,
  /^authorization$/i,
  /^cookie$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
];

// Patterns for detecting sensitive values (by content)
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^dapi[a-f0-9]{32}(-\d+)?$/i,   // Databricks personal access token
  /^sk-[a-zA-Z0-9_-]{24,}$/,      // OpenAI-style secret key
  /^[a-zA-Z0-9_-]+\.eyJ/,         // JWT token
  /^Bearer\s+[a-zA-Z0-9._-]+/,    // Bearer token
  /^Basic\s+[a-zA-Z0-9=]+$/,      // Basic auth
  /^-----BEGIN (RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----/,
];

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Check if a value looks like sensitive data
 */
export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive value, showing only first 2 and last 2 characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.substring(0, 2) + '****' + value.substring(value.length - 2);
}

export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 * Sensitive keys become '[REDACTED]'; secret-looking strings are masked.
 */
export function sanitizeForLogging(
  data: unknown,
  options: { depth?: number; maxDepth?: number } = {}
): SanitizedData {
  const maxDepth = options.maxDepth ?? 10;
  const currentDepth = options.depth ?? 0;

  if (currentDepth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return isSensitiveValue(data) ? maskValue(data) : data;
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (typeof data === 'function') {
    return '[Function]';
  }

  if (typeof data === 'symbol') {
    return '[Symbol]';
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return {
      name: data.name,
      message: data.message,
      stack: process.env['NODE_ENV'] === 'development' ? data.stack : undefined,
    };
  }

  const next = { ...options, depth: currentDepth + 1 };

  if (Array.isArray(data)) {
    return data.map(item => sanitizeForLogging(item, next));
  }

  const sanitized: Record<string, SanitizedData> = {};
  for (const [key, value] of Object.entries(data)) {
    sanitized[key] = isSensitiveField(key) ? '[REDACTED]' : sanitizeForLogging(value, next);
  }
  return sanitized;
}

/**
 * Sanitize HTTP headers for logging, keeping the auth scheme as a hint.
 */
export function sanitizeHeaders(headers: Record<string, unknown>): Record<string, unknown> {
  const sensitiveHeaders = ['authorization', 'cookie', 'set-cookie', 'x-api-key', 'x-auth-token'];

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lowerKey = key.toLowerCase();
    if (!sensitiveHeaders.includes(lowerKey) && !isSensitiveField(key)) {
      sanitized[key] = value;
      continue;
    }
    const strValue = String(value).toLowerCase();
    if (lowerKey === 'authorization' && strValue.startsWith('bearer ')) {
      sanitized[key] = 'Bearer [REDACTED]';
    } else if (lowerKey === 'authorization' && strValue.startsWith('basic ')) {
      sanitized[key] = 'Basic [REDACTED]';
    } else {
      sanitized[key] = '[REDACTED]';
    }
  }
  return sanitized;
}

/**
 * Strip bearer tokens and keys out of free-form error text.
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  let message = error instanceof Error ? error.message : String(error);

  const patterns = [
    { pattern: /dapi[a-f0-9]{32}(-\d+)?/gi, replacement: 'dapi***' },
    { pattern: /sk-[a-zA-Z0-9_-]{24,}/g, replacement: 'sk-***' },
    { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[JWT]' },
    { pattern: /Bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer ***' },
    { pattern: /token['"]?\s*[:=]\s*['"]?[^\s'"]+/gi, replacement: 'token=***' },
  ];

  for (const { pattern, replacement } of patterns) {
    message = message.replace(pattern, replacement);
  }

  return message;
}
