import 'dotenv/config';
import { loadConfig, logger } from './config/index.js';
import { EmbeddingService } from './embeddings/index.js';
import { readCatalogFile } from './catalog/loader.js';
import { SnapshotManager } from './engine/snapshot-manager.js';
import { QueryPlanner } from './engine/query-planner.js';
import { buildServer } from './server.js';

async function start() {
  const config = loadConfig();

  const embedder = new EmbeddingService(config.embedding);
  const snapshots = new SnapshotManager(embedder, {
    batchSize: config.build.batchSize,
    concurrency: config.build.concurrency,
    timeoutMs: config.embedding.timeoutMs,
  });
  const planner = new QueryPlanner(snapshots, embedder, {
    defaultLimit: config.query.defaultLimit,
    timeoutMs: config.embedding.timeoutMs,
  });

  // Serve nothing until the catalog on disk has been indexed
  const revision = await readCatalogFile(config.catalog.path);
  const info = await snapshots.publish(revision);
  logger.info({ snapshotId: info.id, records: info.recordCount }, '✅ Catalog snapshot ready');

  const fastify = await buildServer({ snapshots, planner, embedder, config });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down server...');
    try {
      await fastify.close();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await fastify.listen({ port: config.server.port, host: config.server.host });
  logger.info(`Server listening on http://${config.server.host}:${config.server.port}`);
}

start().catch(error => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});
