/**
 * Archive Worker Service
 *
 * Drives registered accessions through crawl, download and storage.
 * Safe to run as several replicas: progress lives on the accession rows.
 */

import { getLogger } from './lib/logger.js';
import { closePool } from './lib/db.js';
import { createIngestionWorker } from './jobs/ingestionWorker.js';

const logger = getLogger();

async function main() {
  logger.info('Starting archive worker service');

  const worker = createIngestionWorker();

  // Handle graceful shutdown: finish in-flight steps, then release the pool
  const shutdown = () => {
    logger.info('Shutting down worker...');
    worker.stop();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await worker.start();
  } finally {
    await closePool();
  }
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((err) => {
    logger.error({ err }, 'Worker service failed');
    process.exit(1);
  });
