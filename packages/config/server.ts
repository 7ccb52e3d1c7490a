/**
 * HTTP Server Configuration
 */

import { getOptionalEnv, parseArrayEnv, parseIntEnv } from './env';

export const SERVICE_NAME = 'excuse-email-tool';
export const SERVICE_VERSION = '1.0.0';

export interface ServerConfig {
  port: number;
  host: string;
  /** Directories searched, in order, for the prebuilt frontend bundle */
  publicDirCandidates: string[];
  /** Allowed CORS origins; ['*'] allows any */
  corsOrigins: string[];
}

export function getServerConfig(): ServerConfig {
  const rawPort = parseIntEnv('PORT', 8000);
  const port = rawPort >= 1 && rawPort <= 65535 ? rawPort : 8000;

  const configuredDir = getOptionalEnv('PUBLIC_DIR');
  const publicDirCandidates = [configuredDir ?? 'public', 'public', '/app/public']
    .filter((dir, index, all) => all.indexOf(dir) === index);

  const corsOrigins = parseArrayEnv('CORS_ORIGIN');

  return {
    port,
    host: getOptionalEnv('HOST') ?? '0.0.0.0',
    publicDirCandidates,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : ['*'],
  };
}
