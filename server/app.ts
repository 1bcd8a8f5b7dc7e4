import Fastify, { type FastifyInstance } from 'fastify';
import websocketPlugin from '@fastify/websocket';
import corsPlugin from '@fastify/cors';
import type { AnalysisSession } from '../src/session.js';
import type { ServerConfig } from './config.js';
import { snapshotRoutes } from './routes/snapshot.js';
import { viewRoutes } from './routes/views.js';
import { navigationRoutes } from './routes/navigation.js';
import { createWebsocketHandler } from './websocket.js';

export async function buildServer(session: AnalysisSession, config: ServerConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel
    },
    connectionTimeout: 30000,
    keepAliveTimeout: 5000,
    maxParamLength: 1000,
    bodyLimit: 1048576, // 1MB limit
  });

  await fastify.register(corsPlugin, {
    origin: config.corsOrigin
  });

  await fastify.register(websocketPlugin);

  await fastify.register(snapshotRoutes, { prefix: '/api', session, dataDir: config.dataDir });
  await fastify.register(viewRoutes, { prefix: '/api', session });
  await fastify.register(navigationRoutes, { prefix: '/api', session });

  const websocketHandler = createWebsocketHandler(session);
  await fastify.register(async function (fastify) {
    fastify.get('/ws', { websocket: true }, (socket) => websocketHandler(socket));
  });

  return fastify;
}
