import 'dotenv/config';
import { loadConfig, logger } from './config/index.js';
import { CatalogStore } from './catalog/loader.js';
import { buildServer } from './server.js';

async function start() {
  const config = loadConfig();

  const store = await CatalogStore.open(config.catalog.path);
  const fastify = buildServer({ store, config });

  async function shutdown() {
    logger.info('Shutting down server...');
    await fastify.close();
    process.exit(0);
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({ port: config.server.port, host: config.server.host });
  logger.info(`Server listening on http://${config.server.host}:${config.server.port}`);
}

start().catch(error => {
  logger.error(error);
  process.exit(1);
});
