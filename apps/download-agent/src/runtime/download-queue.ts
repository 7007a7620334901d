import type { QueueConfig } from '../config.js';
import type { QueueDatabase } from '../db.js';
import { ConcurrencyGate } from './concurrency-gate.js';
import { createDispatcher } from './dispatcher.js';
import { resolveWorker } from './domain-resolver.js';
import { QueueError } from './errors.js';
import { createJobStore } from './job-store.js';
import { Scheduler } from './scheduler.js';
import { createToolUpdater, type CommandRunner } from './tool-updater.js';
import type { Job, JobSummary, QueueLogger, ToolUpdateResult } from './types.js';
import type { WorkerRegistry } from './worker-registry.js';
import type { WorkerProcessFactory } from './worker-supervisor.js';

export const CLEARED_NOTE = 'interrupted: job was cleared';

const CONCURRENCY_SETTING = 'concurrency';

export type QueueRuntimeConfig = Pick<
  QueueConfig,
  | 'mediaRootPath'
  | 'defaultConcurrency'
  | 'dispatchIntervalMs'
  | 'registryRefreshIntervalMs'
  | 'maxRunDurationSec'
  | 'killGraceMs'
  | 'toolUpdate'
>;

export interface DownloadQueueDeps {
  config: QueueRuntimeConfig;
  database: QueueDatabase;
  registry: WorkerRegistry;
  logger: QueueLogger;
  onFatal: (error: unknown) => void;
  createProcess?: WorkerProcessFactory;
  commandRunner?: CommandRunner;
  now?: () => Date;
}

export interface DownloadQueue {
  start: () => void;
  submit: (url: string) => Job;
  listJobs: () => JobSummary[];
  getJob: (jobId: number) => Job;
  getConcurrencyLimit: () => number;
  setConcurrencyLimit: (limit: number) => void;
  requeue: (jobId: number) => Job;
  clearCompleted: () => number;
  clearAll: () => number;
  runToolUpdate: () => Promise<ToolUpdateResult>;
  /** Resolves once every worker running at the time of the call has been recorded. */
  waitForIdle: () => Promise<void>;
  shutdown: () => Promise<void>;
}

function toSummary(job: Job): JobSummary {
  return {
    id: job.id,
    url: job.url,
    siteKey: job.siteKey,
    status: job.status,
    submittedAt: job.submittedAt,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt,
    resultNote: job.resultNote,
  };
}

function isValidLimit(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

export function createDownloadQueue(deps: DownloadQueueDeps): DownloadQueue {
  const { config, database, registry, logger } = deps;
  const store = createJobStore(database, { now: deps.now });
  if (store.recoveredOnOpen > 0) {
    logger.warn({ jobs: store.recoveredOnOpen }, 'marked jobs interrupted by a previous run as failed');
  }

  const loadLimit = (): number => {
    const stored = database.getSetting(CONCURRENCY_SETTING);
    if (stored === undefined) {
      return config.defaultConcurrency;
    }

    const parsed = Number(stored);
    if (!isValidLimit(parsed)) {
      logger.warn({ stored }, 'ignoring invalid stored concurrency limit');
      return config.defaultConcurrency;
    }
    return parsed;
  };

  const gate = new ConcurrencyGate(loadLimit());
  const scheduler = new Scheduler(logger);
  const toolUpdater = createToolUpdater(config.toolUpdate, logger, deps.commandRunner);
  const dispatcher = createDispatcher({
    store,
    gate,
    lookupWorker: (siteKey) => registry.get(siteKey),
    logger,
    mediaRootPath: config.mediaRootPath,
    maxRunDurationSec: config.maxRunDurationSec,
    killGraceMs: config.killGraceMs,
    createProcess: deps.createProcess,
    onFatal: deps.onFatal,
  });
  let started = false;

  const requireJob = (jobId: number): Job => {
    const job = store.get(jobId);
    if (!job) {
      throw new QueueError('job_not_found', `Job ${jobId} not found`);
    }
    return job;
  };

  return {
    start: () => {
      if (started) {
        return;
      }
      started = true;

      scheduler.register({
        name: 'dispatch',
        intervalMs: config.dispatchIntervalMs,
        run: () => {
          dispatcher.runPass();
        },
      });
      if (config.registryRefreshIntervalMs > 0) {
        scheduler.register({
          name: 'registry-refresh',
          intervalMs: config.registryRefreshIntervalMs,
          run: () => {
            registry.refresh();
          },
        });
      }

      logger.info({ concurrency: gate.getLimit() }, 'download queue started');
      dispatcher.requestPass();
    },
    submit: (url) => {
      const { siteKey } = resolveWorker(url, registry.table());
      const job = store.create(url.trim(), siteKey);
      logger.info({ jobId: job.id, siteKey, url: job.url }, 'job submitted');
      dispatcher.requestPass();
      return job;
    },
    listJobs: () => store.list().map(toSummary),
    getJob: requireJob,
    getConcurrencyLimit: () => gate.getLimit(),
    setConcurrencyLimit: (limit) => {
      if (!isValidLimit(limit)) {
        throw new QueueError('invalid_value', `Concurrency limit must be a non-negative integer (received ${limit})`);
      }

      gate.setLimit(limit);
      database.setSetting(CONCURRENCY_SETTING, String(limit));
      logger.info({ concurrency: limit }, 'concurrency limit changed');
      dispatcher.requestPass();
    },
    requeue: (jobId) => {
      const job = requireJob(jobId);
      if (job.status !== 'failed') {
        throw new QueueError('invalid_state', `Job ${jobId} is ${job.status}; only failed jobs can be requeued`);
      }

      const requeued = store.transition(jobId, 'failed', 'pending');
      logger.info({ jobId, siteKey: requeued.siteKey }, 'job requeued');
      dispatcher.requestPass();
      return requeued;
    },
    clearCompleted: () => {
      const removed = store.deleteWhere(['completed']);
      logger.info({ removed }, 'completed jobs cleared');
      return removed;
    },
    clearAll: () => {
      const terminated = dispatcher.runningJobIds().filter((jobId) => dispatcher.terminate(jobId, CLEARED_NOTE));
      const removed = store.deleteAll();
      logger.info({ removed, terminated: terminated.length }, 'all jobs cleared');
      return removed;
    },
    runToolUpdate: () => toolUpdater.run(),
    waitForIdle: () => dispatcher.waitForRunning(),
    shutdown: async () => {
      scheduler.stopAll();
      await dispatcher.stop();
      logger.info({}, 'download queue stopped');
    },
  };
}
