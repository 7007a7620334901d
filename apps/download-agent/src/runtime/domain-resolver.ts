import { QueueError } from './errors.js';
import type { WorkerDescriptor } from './types.js';

export type WorkerTable = ReadonlyMap<string, WorkerDescriptor>;

export interface ResolvedWorker {
  siteKey: string;
  worker: WorkerDescriptor;
}

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

function parseUrl(raw: string): URL {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new QueueError('invalid_url', 'URL is empty');
  }

  const candidate = trimmed.includes('://') ? trimmed : `https://${trimmed}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new QueueError('invalid_url', `Invalid URL: ${trimmed}`);
  }

  if (!ALLOWED_PROTOCOLS.has(url.protocol)) {
    throw new QueueError('invalid_url', `Unsupported URL scheme: ${url.protocol}`);
  }
  if (url.hostname.length === 0) {
    throw new QueueError('invalid_url', `URL has no host: ${trimmed}`);
  }

  return url;
}

/** `https://www.YouTube.com/watch?v=x` -> `youtube`; a dotless host is its own key. */
export function resolveSiteKey(raw: string): string {
  const host = parseUrl(raw).hostname.toLowerCase().replace(/\.$/, '');
  const labels = host.split('.').filter((label) => label.length > 0);
  if (labels.length === 0) {
    throw new QueueError('invalid_url', `URL has no host: ${raw.trim()}`);
  }

  return labels.length === 1 ? (labels[0] ?? host) : (labels[labels.length - 2] ?? host);
}

export function resolveWorker(raw: string, table: WorkerTable): ResolvedWorker {
  const key = resolveSiteKey(raw);
  const worker = table.get(key);
  if (!worker) {
    throw new QueueError('no_worker_for_site', `No worker for site "${key}"`);
  }

  return { siteKey: worker.siteKey, worker };
}
