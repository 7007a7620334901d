import { join } from 'node:path';
import type { Job, WorkerDescriptor } from './types.js';

/**
 * Version 1: the worker is started with the descriptor's args followed by the job URL
 * as the last argument, its cwd set to `<mediaRoot>/<siteKey>`. Exit code 0 means the
 * download succeeded; any other code or a terminating signal means it failed. Output
 * is kept for diagnostics only.
 */
export const WORKER_CONTRACT_VERSION = 1;

export interface WorkerLaunchRequest {
  contractVersion: typeof WORKER_CONTRACT_VERSION;
  jobId: number;
  siteKey: string;
  command: string;
  args: string[];
  cwd: string;
  timeoutMs?: number;
}

export type WorkerOutcome =
  | { status: 'completed' }
  | { status: 'failed'; note: string };

export function createLaunchRequest(input: {
  job: Job;
  worker: WorkerDescriptor;
  mediaRootPath: string;
  maxRunDurationSec?: number;
}): WorkerLaunchRequest {
  const { job, worker } = input;
  const timeoutSec = worker.timeoutSec ?? input.maxRunDurationSec;

  return {
    contractVersion: WORKER_CONTRACT_VERSION,
    jobId: job.id,
    siteKey: job.siteKey,
    command: worker.command,
    args: [...worker.args, job.url],
    cwd: join(input.mediaRootPath, job.siteKey),
    timeoutMs: timeoutSec === undefined ? undefined : timeoutSec * 1_000,
  };
}

function lastLine(output: string): string | undefined {
  const lines = output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1];
}

export function interpretExit(input: {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  output: string;
}): WorkerOutcome {
  if (input.exitCode === 0) {
    return { status: 'completed' };
  }

  const base =
    input.exitCode === null
      ? `worker terminated by ${input.signal ?? 'unknown signal'}`
      : `worker exited with code ${input.exitCode}`;
  const detail = lastLine(input.output);

  return { status: 'failed', note: detail ? `${base}: ${detail}` : base };
}
