import { AnalysisSession } from '../src/session.js';
import { logError } from '../src/error-logger.js';
import { buildServer } from './app.js';
import { loadConfig } from './config.js';
import { reloadFromDisk } from './reload.js';

async function start() {
  const config = loadConfig();
  const session = new AnalysisSession({ trustPolicy: config.trustPolicy });
  const fastify = await buildServer(session, config);

  await reloadFromDisk(session, config.dataDir, fastify.log);

  const shutdown = async (signal: string) => {
    console.log(`🛑 Received ${signal}, shutting down gracefully...`);
    try {
      session.dispose();
      await fastify.close();
      process.exit(0);
    } catch (err) {
      console.error('Error during shutdown:', err);
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`🚀 netlineage server running at http://localhost:${config.port}`);
    console.log(`📂 Capture directory: ${config.dataDir}`);
    console.log(`📡 WebSocket endpoint: ws://localhost:${config.port}/ws`);
  } catch (err) {
    fastify.log.error(err);
    await logError('server:listen', err);
    process.exit(1);
  }
}

start().catch(async (err) => {
  await logError('server:start', err);
  console.error('Failed to start server:', err);
  process.exit(1);
});
