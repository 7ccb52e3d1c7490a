import fastifyStatic from '@fastify/static';
import type { FastifyPluginAsync } from 'fastify';

import { existsSync, statSync } from 'fs';
import path from 'path';

export interface StaticRouteOptions {
  publicDir: string | undefined;
}

const MISSING_BUNDLE_PAGE = `<!DOCTYPE html>
<html>
  <head>
    <title>Excuse Email Tool</title>
  </head>
  <body>
    <h1>Excuse Email Draft Tool</h1>
    <p>Frontend bundle not found. Please ensure index.html is in the public/ directory.</p>
  </body>
</html>
`;

/**
* First candidate that exists as a directory, as an absolute path
*/
export function resolvePublicDir(candidates: readonly string[]): string | undefined {
  for (const candidate of candidates) {
    const dir = path.resolve(candidate);
    if (existsSync(dir) && statSync(dir).isDirectory()) {
      return dir;
    }
  }
  return undefined;
}

/**
* Serves the prebuilt frontend: assets under /static/, index.html at /
*/
export const staticRoutes: FastifyPluginAsync<StaticRouteOptions> = async (app, { publicDir }) => {
  const hasIndex = publicDir !== undefined && existsSync(path.join(publicDir, 'index.html'));

  if (publicDir) {
    await app.register(fastifyStatic, {
      root: publicDir,
      prefix: '/static/',
      index: false,
    });
  }

  app.get('/', async (_req, res) => {
    if (hasIndex) {
      return res.sendFile('index.html');
    }
    return res.status(404).type('text/html; charset=utf-8').send(MISSING_BUNDLE_PAGE);
  });
};
