import { describeError } from './errors.js';
import type { WorkerTable } from './domain-resolver.js';
import type { QueueLogger, WorkerDescriptor, WorkerManifest } from './types.js';
import { loadWorkerManifest } from './worker-manifest-loader.js';

export interface WorkerRegistry {
  table: () => WorkerTable;
  get: (siteKey: string) => WorkerDescriptor | undefined;
  /** Reloads the manifest; keeps the previous table and returns false when it is invalid. */
  refresh: () => boolean;
}

export function buildWorkerTable(manifest: WorkerManifest): WorkerTable {
  const table = new Map<string, WorkerDescriptor>();
  for (const worker of manifest.workers) {
    table.set(worker.siteKey, worker);
    for (const alias of worker.aliases) {
      table.set(alias, worker);
    }
  }
  return table;
}

export function createWorkerRegistry(manifestPath: string, logger: QueueLogger): WorkerRegistry {
  let current = buildWorkerTable(loadWorkerManifest(manifestPath));
  logger.info({ manifestPath, sites: current.size }, 'worker registry loaded');

  return {
    table: () => current,
    get: (siteKey) => current.get(siteKey),
    refresh: () => {
      try {
        current = buildWorkerTable(loadWorkerManifest(manifestPath));
        logger.debug({ manifestPath, sites: current.size }, 'worker registry refreshed');
        return true;
      } catch (error) {
        logger.warn({ manifestPath, error: describeError(error) }, 'worker registry refresh failed; keeping previous manifest');
        return false;
      }
    },
  };
}
