import cors from '@fastify/cors';
import Fastify, { type FastifyInstance } from 'fastify';

import { getServerConfig, type ServerConfig } from '@config';
import { createErrorHandler } from '@errors/route-error-handler';
import { errors } from '@errors/responses';

import { ModelServingClient } from './adapters/databricks/ModelServingClient';
import type { CompletionClient } from './excuse/types';
import { registerRequestLogging } from './middleware/request-logger';
import { excuseRoutes } from './routes/excuse';
import { healthRoutes } from './routes/health';
import { resolvePublicDir, staticRoutes } from './routes/static';

export interface BuildAppOptions {
  /** Defaults to the Databricks model serving client */
  client?: CompletionClient;
  serverConfig?: ServerConfig;
  /** Defaults to true outside production */
  exposeDebug?: boolean;
}

const MUTATING_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const serverConfig = options.serverConfig ?? getServerConfig();
  const client = options.client ?? new ModelServingClient();
  const exposeDebug = options.exposeDebug ?? process.env['NODE_ENV'] !== 'production';
  const publicDir = resolvePublicDir(serverConfig.publicDirCandidates);

  const app = Fastify({ logger: false });

  const allowAnyOrigin = serverConfig.corsOrigins.includes('*');
  await app.register(cors, {
    origin: allowAnyOrigin ? '*' : serverConfig.corsOrigins,
    credentials: !allowAnyOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', 'traceparent', 'tracestate'],
    exposedHeaders: ['X-Request-ID', 'X-Trace-ID'],
  });

  registerRequestLogging(app);

  // Bodies on mutating requests must be declared as JSON
  app.addHook('preValidation', async (req, res) => {
    if (!MUTATING_METHODS.has(req.method)) return;

    const contentLength = req.headers['content-length'];
    const transferEncoding = req.headers['transfer-encoding'];
    if (!contentLength && !transferEncoding) return;

    const contentType = req.headers['content-type'] ?? '';
    if (!contentType.startsWith('application/json')) {
      return errors.unsupportedMediaType(res);
    }
  });

  app.setErrorHandler(createErrorHandler({ logger: 'api' }));

  app.setNotFoundHandler((_req, res) => {
    void errors.notFound(res, 'Route');
  });

  await app.register(healthRoutes, { publicDir, exposeDebug });
  await app.register(excuseRoutes, { client });
  await app.register(staticRoutes, { publicDir });

  return app;
}
