import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { PipelineFactory } from './services/pipeline/PipelineFactory.js';
import { buildServer } from './server.js';

logger.info('Initializing services...');

const services = PipelineFactory.create(config, logger);
const fastify = await buildServer(services, config.server.nodeEnv);

logger.info('Services initialized');

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  logger.info('Shutdown complete');
  process.exit(0);
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

try {
  await fastify.listen({
    port: config.server.port,
    host: '0.0.0.0',
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  process.exit(1);
}
