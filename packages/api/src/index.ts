import { buildApp } from './app';
import { loadConfig, missingCredentials } from './config';
import { createServices } from './container';
import { logger } from './utils/logger';

async function start() {
  const config = loadConfig();

  const missing = missingCredentials(config);
  if (missing.length > 0) {
    throw new Error(`${missing.join('; ')}. Configure them in the .env file.`);
  }

  logger.info(
    { provider: config.llmProvider, embeddingModel: config.embeddings.model },
    'LLM configured'
  );

  const services = await createServices(config);
  const fastify = await buildApp(services, {
    logger: { level: config.logLevel },
    corsOrigins: config.corsOrigins,
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    await fastify.close();
    await services.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await fastify.listen({
    port: config.port,
    host: config.host,
  });

  logger.info(`API server running at http://${config.host}:${config.port}`);
}

start().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
