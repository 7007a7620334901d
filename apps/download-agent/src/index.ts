export { loadQueueConfig, parseQueueConfig, type QueueConfig, type ToolUpdateConfig } from './config.js';
export { createQueueDatabase, type QueueDatabase } from './db.js';
export { createLogger, type LogLevel } from './logger.js';
export { ConcurrencyGate, PER_SITE_CONCURRENCY } from './runtime/concurrency-gate.js';
export { createDownloadQueue, type DownloadQueue, type DownloadQueueDeps } from './runtime/download-queue.js';
export { resolveSiteKey, resolveWorker } from './runtime/domain-resolver.js';
export { QueueError, type QueueErrorCode } from './runtime/errors.js';
export type { Job, JobStatus, JobSummary, ToolUpdateResult, WorkerDescriptor } from './runtime/types.js';
export { WORKER_CONTRACT_VERSION } from './runtime/worker-contract.js';
export { createWorkerRegistry, type WorkerRegistry } from './runtime/worker-registry.js';
