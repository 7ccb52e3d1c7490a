import type { FastifyPluginAsync } from 'fastify';

import { parseExcuseRequest } from '../excuse/schema';
import { generateExcuse } from '../excuse/service';
import type { CompletionClient } from '../excuse/types';

export interface ExcuseRouteOptions {
  client: CompletionClient;
}

/**
* POST /api/generate-excuse
* Validation failures are thrown and rendered as 400 by the error handler
* before the model is ever called.
*/
export const excuseRoutes: FastifyPluginAsync<ExcuseRouteOptions> = async (app, { client }) => {
  app.post('/api/generate-excuse', async (req, res) => {
    const request = parseExcuseRequest(req.body);
    const result = await generateExcuse(request, { client });
    return res.send(result);
  });
};
