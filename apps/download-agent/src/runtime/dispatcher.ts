import type { ConcurrencyGate } from './concurrency-gate.js';
import { describeError, isQueueError, QueueError } from './errors.js';
import type { JobStore } from './job-store.js';
import type { Job, QueueLogger, WorkerDescriptor } from './types.js';
import { createLaunchRequest } from './worker-contract.js';
import { superviseWorker, type WorkerHandle, type WorkerProcessFactory } from './worker-supervisor.js';

export const SHUTDOWN_NOTE = 'interrupted: shutdown';

export interface DispatcherDeps {
  store: JobStore;
  gate: ConcurrencyGate;
  lookupWorker: (siteKey: string) => WorkerDescriptor | undefined;
  logger: QueueLogger;
  mediaRootPath: string;
  maxRunDurationSec?: number;
  killGraceMs: number;
  createProcess?: WorkerProcessFactory;
  onFatal: (error: unknown) => void;
}

export interface Dispatcher {
  /** One scan of the pending jobs; returns how many were started. */
  runPass: () => number;
  /** Schedules a pass on the microtask queue; repeated requests collapse into one. */
  requestPass: () => void;
  terminate: (jobId: number, reason: string) => boolean;
  runningJobIds: () => number[];
  waitForRunning: () => Promise<void>;
  stop: () => Promise<void>;
}

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const { store, gate, logger } = deps;
  const running = new Map<number, WorkerHandle>();
  let passQueued = false;
  let stopping = false;

  const supervisorDeps = {
    store,
    gate,
    logger,
    createProcess: deps.createProcess,
    killGraceMs: deps.killGraceMs,
    onFatal: deps.onFatal,
  };

  const fail = (error: unknown): void => {
    logger.error({ error: describeError(error) }, 'job store failure during dispatch');
    deps.onFatal(error);
  };

  const requestPass = (): void => {
    if (stopping || passQueued) {
      return;
    }

    passQueued = true;
    queueMicrotask(() => {
      passQueued = false;
      runPass();
    });
  };

  const launch = (job: Job): void => {
    const handle = superviseWorker(supervisorDeps, job, () => {
      const worker = deps.lookupWorker(job.siteKey);
      if (!worker) {
        throw new QueueError('no_worker_for_site', `No worker for site "${job.siteKey}"`);
      }
      return createLaunchRequest({
        job,
        worker,
        mediaRootPath: deps.mediaRootPath,
        maxRunDurationSec: deps.maxRunDurationSec,
      });
    });

    running.set(job.id, handle);
    const settle = (): void => {
      running.delete(job.id);
      requestPass();
    };
    void handle.done.then(settle, (error: unknown) => {
      logger.error({ jobId: job.id, error: describeError(error) }, 'worker supervisor crashed');
      settle();
    });
  };

  const runPass = (): number => {
    if (stopping) {
      return 0;
    }

    let pending: Job[];
    try {
      pending = store.listByStatus('pending');
    } catch (error) {
      fail(error);
      return 0;
    }

    let started = 0;
    for (const job of pending) {
      if (!gate.tryReserve(job.siteKey, job.id)) {
        continue;
      }

      let active: Job;
      try {
        active = store.transition(job.id, 'pending', 'active');
      } catch (error) {
        gate.release(job.siteKey, job.id);
        if (isQueueError(error, 'invalid_transition') || isQueueError(error, 'job_not_found')) {
          logger.debug({ jobId: job.id, reason: error.message }, 'job no longer pending; skipped');
          continue;
        }
        fail(error);
        return started;
      }

      logger.info({ jobId: active.id, siteKey: active.siteKey, url: active.url }, 'job dispatched');
      launch(active);
      started += 1;
    }

    if (pending.length > 0) {
      logger.debug(
        { pending: pending.length, started, active: gate.activeCount(), limit: gate.getLimit() },
        'dispatch pass complete',
      );
    }
    return started;
  };

  const waitForRunning = async (): Promise<void> => {
    await Promise.all(Array.from(running.values(), (handle) => handle.done));
  };

  return {
    runPass,
    requestPass,
    terminate: (jobId, reason) => {
      const handle = running.get(jobId);
      if (!handle) {
        return false;
      }
      handle.terminate(reason);
      return true;
    },
    runningJobIds: () => Array.from(running.keys()),
    waitForRunning,
    stop: async () => {
      stopping = true;
      for (const handle of running.values()) {
        handle.terminate(SHUTDOWN_NOTE);
      }
      await waitForRunning();
    },
  };
}
