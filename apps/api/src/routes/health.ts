import type { FastifyPluginAsync } from 'fastify';

import { SERVICE_NAME, SERVICE_VERSION, getModelServingConfig, getServerConfig } from '@config';

export interface HealthRouteOptions {
  /** Resolved frontend bundle directory, if any */
  publicDir: string | undefined;
  /** Register GET /debug */
  exposeDebug: boolean;
}

const PROBE_PATHS = ['/health', '/healthz', '/ready', '/ping'] as const;

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, { publicDir, exposeDebug }) => {
  for (const path of PROBE_PATHS) {
    app.get(path, async () => ({ status: 'healthy', service: SERVICE_NAME }));
  }

  app.get('/metrics', async () => ({
    service: SERVICE_NAME,
    status: 'running',
    version: SERVICE_VERSION,
  }));

  if (!exposeDebug) return;

  // Environment summary for deployment troubleshooting; the token is never shown
  app.get('/debug', async () => {
    const modelServing = getModelServingConfig();
    const server = getServerConfig();
    return {
      databricks_endpoint: modelServing.endpointUrl ?? 'Not set',
      databricks_token: modelServing.apiToken ? '***' : 'Not set',
      port: server.port,
      host: server.host,
      current_directory: process.cwd(),
      public_dir_candidates: server.publicDirCandidates,
      public_dir: publicDir ?? null,
    };
  });
};
