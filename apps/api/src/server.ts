import 'dotenv/config';

import { getServerConfig, validateEnv } from '@config';
import { getLogger } from '@kernel/logger';
import { registerShutdownHandler, setupShutdownHandlers } from '@shutdown';

import { buildApp } from './app';

const logger = getLogger('server');

async function start(): Promise<void> {
  for (const warning of validateEnv()) {
    logger.warn(warning);
  }

  const config = getServerConfig();
  const app = await buildApp({ serverConfig: config });

  setupShutdownHandlers();
  registerShutdownHandler(async function closeHttpServer() {
    await app.close();
  });

  await app.listen({ port: config.port, host: config.host });
  logger.info('Excuse email service listening', { host: config.host, port: config.port });
}

start().catch((error: unknown) => {
  logger.fatal('Failed to start server', error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
