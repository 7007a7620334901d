import { type ChildProcess, spawn } from 'node:child_process';
import { mkdir } from 'node:fs/promises';
import type { ConcurrencyGate } from './concurrency-gate.js';
import { describeError, isQueueError } from './errors.js';
import type { JobStore } from './job-store.js';
import type { Job, QueueLogger } from './types.js';
import { interpretExit, type WorkerLaunchRequest, type WorkerOutcome } from './worker-contract.js';

const MAX_LOG_CHARS = 64 * 1024;

const LOG_FLUSH_INTERVAL_MS = 1_000;

/** How long output may keep arriving after the worker exits before its pipes are cut. */
const STDIO_DRAIN_MS = 250;

export interface WorkerProcess {
  kill: (signal: NodeJS.Signals) => void;
  onOutput: (listener: (chunk: string) => void) => void;
  onExit: (listener: (exitCode: number | null, signal: NodeJS.Signals | null) => void) => void;
  onError: (listener: (error: Error) => void) => void;
}

export type WorkerProcessFactory = (request: WorkerLaunchRequest) => WorkerProcess;

export interface WorkerHandle {
  jobId: number;
  siteKey: string;
  /** Sends SIGTERM (SIGKILL after the grace period); the job is recorded failed with `reason`. */
  terminate: (reason: string) => void;
  done: Promise<WorkerOutcome>;
}

export interface WorkerSupervisorDeps {
  store: JobStore;
  gate: ConcurrencyGate;
  logger: QueueLogger;
  createProcess?: WorkerProcessFactory;
  killGraceMs: number;
  onFatal: (error: unknown) => void;
}

type ExitResult =
  | { kind: 'exit'; exitCode: number | null; signal: NodeJS.Signals | null }
  | { kind: 'error'; error: Error };

// Workers run in their own process group so helpers they start (ffmpeg and the like)
// are signalled with them.
function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch {
    child.kill(signal);
  }
}

export function spawnWorkerProcess(request: WorkerLaunchRequest): WorkerProcess {
  const child = spawn(request.command, request.args, {
    cwd: request.cwd,
    detached: true,
    stdio: ['ignore', 'pipe', 'pipe'],
  });
  child.stdout?.setEncoding('utf8');
  child.stderr?.setEncoding('utf8');

  return {
    kill: (signal) => {
      if (child.exitCode === null && child.signalCode === null) {
        signalGroup(child, signal);
      }
    },
    onOutput: (listener) => {
      child.stdout?.on('data', (chunk: string) => {
        listener(chunk);
      });
      child.stderr?.on('data', (chunk: string) => {
        listener(chunk);
      });
    },
    onExit: (listener) => {
      // A helper that inherited stdout can hold the pipes open after the worker is gone,
      // so completion follows 'exit' and waits for 'close' only briefly.
      child.once('exit', (code, signal) => {
        let reported = false;
        const report = (): void => {
          if (reported) {
            return;
          }
          reported = true;
          clearTimeout(drainTimer);
          child.stdout?.destroy();
          child.stderr?.destroy();
          listener(code, signal);
        };
        const drainTimer = setTimeout(() => {
          signalGroup(child, 'SIGKILL');
          report();
        }, STDIO_DRAIN_MS);
        child.once('close', report);
      });
    },
    onError: (listener) => {
      child.on('error', listener);
    },
  };
}

function waitForExit(process: WorkerProcess): Promise<ExitResult> {
  return new Promise((resolve) => {
    let settled = false;
    const settle = (result: ExitResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(result);
    };

    process.onError((error) => {
      settle({ kind: 'error', error });
    });
    process.onExit((exitCode, signal) => {
      settle({ kind: 'exit', exitCode, signal });
    });
  });
}

function formatDuration(ms: number): string {
  return ms % 1_000 === 0 ? `${ms / 1_000}s` : `${ms}ms`;
}

export function superviseWorker(
  deps: WorkerSupervisorDeps,
  job: Job,
  prepareLaunch: () => WorkerLaunchRequest,
): WorkerHandle {
  const createProcess = deps.createProcess ?? spawnWorkerProcess;
  const logger = deps.logger;
  let child: WorkerProcess | undefined;
  let finished = false;
  let terminationReason: string | undefined;
  let timeoutTimer: ReturnType<typeof setTimeout> | undefined;
  let killTimer: ReturnType<typeof setTimeout> | undefined;
  let flushTimer: ReturnType<typeof setTimeout> | undefined;
  let output = '';

  const kill = (reason: string): void => {
    if (finished) {
      return;
    }
    terminationReason ??= reason;
    const current = child;
    if (!current || killTimer) {
      return;
    }

    current.kill('SIGTERM');
    killTimer = setTimeout(() => {
      current.kill('SIGKILL');
    }, deps.killGraceMs);
  };

  const flushLog = (): void => {
    clearTimeout(flushTimer);
    flushTimer = undefined;
    try {
      deps.store.updateLog(job.id, output);
    } catch (error) {
      logger.error({ jobId: job.id, error: describeError(error) }, 'failed to store worker output');
    }
  };

  const captureOutput = (chunk: string): void => {
    output = `${output}${chunk}`.slice(-MAX_LOG_CHARS);
    flushTimer ??= setTimeout(flushLog, LOG_FLUSH_INTERVAL_MS);
  };

  const execute = async (): Promise<WorkerOutcome> => {
    try {
      const request = prepareLaunch();
      await mkdir(request.cwd, { recursive: true });
      if (terminationReason !== undefined) {
        return { status: 'failed', note: terminationReason };
      }

      const started = createProcess(request);
      child = started;
      const exited = waitForExit(started);
      started.onOutput(captureOutput);

      if (request.timeoutMs !== undefined) {
        const timeoutMs = request.timeoutMs;
        timeoutTimer = setTimeout(() => {
          kill(`worker timed out after ${formatDuration(timeoutMs)}`);
        }, timeoutMs);
      }

      logger.info(
        { jobId: job.id, siteKey: job.siteKey, command: request.command, cwd: request.cwd },
        'worker started',
      );

      const result = await exited;
      if (result.kind === 'error') {
        return { status: 'failed', note: `failed to launch worker: ${result.error.message}` };
      }
      if (terminationReason !== undefined) {
        return { status: 'failed', note: terminationReason };
      }
      return interpretExit({ exitCode: result.exitCode, signal: result.signal, output });
    } catch (error) {
      return { status: 'failed', note: `failed to launch worker: ${describeError(error)}` };
    } finally {
      finished = true;
      clearTimeout(timeoutTimer);
      clearTimeout(killTimer);
      if (flushTimer !== undefined) {
        flushLog();
      }
    }
  };

  const record = (outcome: WorkerOutcome): void => {
    const note = outcome.status === 'failed' ? outcome.note : undefined;
    try {
      deps.store.transition(job.id, 'active', outcome.status, note);
      logger.info({ jobId: job.id, siteKey: job.siteKey, status: outcome.status, note }, 'worker finished');
    } catch (error) {
      if (isQueueError(error, 'job_not_found') || isQueueError(error, 'invalid_transition')) {
        logger.debug({ jobId: job.id, reason: error.message }, 'worker outcome not recorded');
        return;
      }
      logger.error({ jobId: job.id, error: describeError(error) }, 'failed to record worker outcome');
      deps.onFatal(error);
    }
  };

  const run = async (): Promise<WorkerOutcome> => {
    try {
      const outcome = await execute();
      record(outcome);
      return outcome;
    } finally {
      deps.gate.release(job.siteKey, job.id);
    }
  };

  return {
    jobId: job.id,
    siteKey: job.siteKey,
    terminate: kill,
    done: run(),
  };
}
