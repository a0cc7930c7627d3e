import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import type { ApiErrorResponse } from '@delaylens/shared';
import configPlugin, { loadConfig } from './plugins/config.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import delayAnalysisRoutes from './routes/delayAnalysis.js';

export async function buildApp(): Promise<FastifyInstance> {
  // Logger and body limit are Fastify constructor options, so configuration is read first
  const config = loadConfig(process.env);

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
    trustProxy: config.trustProxy,
    bodyLimit: config.bodyLimit,
    // Reject unknown body keys instead of silently stripping them
    ajv: {
      customOptions: { removeAdditional: false },
    },
  });

  // Configuration (must be first)
  await app.register(configPlugin, { config });

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // Compression (gzip/deflate/brotli); Markdown and JSON reports compress well
  await app.register(fastifyCompress);

  // Delay analysis routes
  await app.register(delayAnalysisRoutes, { prefix: '/api/delay-analysis' });

  // Health check endpoint (liveness)
  app.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = {
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(response);
  });

  return app;
}
