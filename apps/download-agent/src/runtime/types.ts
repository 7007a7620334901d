export type JobStatus = 'pending' | 'active' | 'completed' | 'failed';

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'active', 'completed', 'failed'];

export interface Job {
  id: number;
  url: string;
  siteKey: string;
  status: JobStatus;
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  resultNote: string | null;
  log: string | null;
}

export type JobSummary = Omit<Job, 'log'>;

export interface WorkerDescriptor {
  siteKey: string;
  command: string;
  args: string[];
  aliases: string[];
  timeoutSec?: number;
}

export interface WorkerManifest {
  contractVersion: number;
  workers: WorkerDescriptor[];
}

export interface QueueLogger {
  debug: (input: Record<string, unknown>, message?: string) => void;
  info: (input: Record<string, unknown>, message?: string) => void;
  warn: (input: Record<string, unknown>, message?: string) => void;
  error: (input: Record<string, unknown>, message?: string) => void;
}

export type ToolUpdateResult = { ok: true; output: string } | { ok: false; error: string };
