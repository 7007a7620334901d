import { loadQueueConfig } from './config.js';
import { createQueueDatabase } from './db.js';
import { createLogger } from './logger.js';
import { createDownloadQueue } from './runtime/download-queue.js';
import { describeError } from './runtime/errors.js';
import { createWorkerRegistry } from './runtime/worker-registry.js';

async function bootstrap(urls: string[]): Promise<void> {
  const config = loadQueueConfig();
  const logger = createLogger(config.logLevel);
  const database = createQueueDatabase(config.sqlitePath);
  database.initialize();

  const registry = createWorkerRegistry(config.workerManifestPath, logger.child({ component: 'registry' }));
  const queue = createDownloadQueue({
    config,
    database,
    registry,
    logger: logger.child({ component: 'queue' }),
    onFatal: (error) => {
      logger.fatal({ error: describeError(error) }, 'job store unavailable; exiting');
      process.exit(1);
    },
  });

  queue.start();

  for (const url of urls) {
    try {
      queue.submit(url);
    } catch (error) {
      logger.error({ url, error: describeError(error) }, 'could not queue url');
    }
  }

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;

    logger.info({ signal }, 'shutting down');
    await queue.shutdown();
    database.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error: describeError(error) }, 'shutdown failed');
        process.exitCode = 1;
      });
    });
  }
}

bootstrap(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`fatal: ${describeError(error)}`);
  process.exitCode = 1;
});
