import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { WorkerDescriptor, WorkerManifest } from './types.js';
import { WORKER_CONTRACT_VERSION } from './worker-contract.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`Invalid manifest: ${key} must be a non-empty string`);
  }
  return value.trim();
}

function parseOptionalStringArray(record: Record<string, unknown>, key: string): string[] {
  const value = record[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`Invalid manifest: ${key} must be a string array`);
  }

  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new Error(`Invalid manifest: ${key} must be a string array`);
    }
    items.push(item);
  }
  return items;
}

function parseOptionalPositiveInteger(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid manifest: ${key} must be a positive integer`);
  }
  return value;
}

function parseWorkerDescriptor(workerRaw: unknown): WorkerDescriptor {
  if (!isRecord(workerRaw)) {
    throw new Error('Invalid manifest: each worker must be an object');
  }

  return {
    siteKey: requireString(workerRaw, 'siteKey').toLowerCase(),
    command: requireString(workerRaw, 'command'),
    args: parseOptionalStringArray(workerRaw, 'args'),
    aliases: parseOptionalStringArray(workerRaw, 'aliases').map((alias) => alias.trim().toLowerCase()),
    timeoutSec: parseOptionalPositiveInteger(workerRaw, 'timeoutSec'),
  };
}

function assertUniqueKeys(workers: WorkerDescriptor[]): void {
  const seen = new Set<string>();
  for (const worker of workers) {
    for (const key of [worker.siteKey, ...worker.aliases]) {
      if (key.length === 0) {
        throw new Error(`Invalid manifest: empty alias for ${worker.siteKey}`);
      }
      if (seen.has(key)) {
        throw new Error(`Invalid manifest: site key ${key} is declared more than once`);
      }
      seen.add(key);
    }
  }
}

export function parseWorkerManifest(parsed: unknown): WorkerManifest {
  if (!isRecord(parsed) || !Array.isArray(parsed.workers)) {
    throw new Error('Invalid manifest: workers array is required');
  }

  if (parsed.contractVersion !== WORKER_CONTRACT_VERSION) {
    throw new Error(
      `Invalid manifest: contractVersion must be ${WORKER_CONTRACT_VERSION} (received ${String(parsed.contractVersion)})`,
    );
  }

  const workers = parsed.workers.map((worker: unknown) => parseWorkerDescriptor(worker));
  assertUniqueKeys(workers);

  return {
    contractVersion: WORKER_CONTRACT_VERSION,
    workers,
  };
}

export function loadWorkerManifest(manifestPath: string): WorkerManifest {
  const absolutePath = resolve(manifestPath);
  const raw = readFileSync(absolutePath, 'utf-8');
  return parseWorkerManifest(JSON.parse(raw));
}
