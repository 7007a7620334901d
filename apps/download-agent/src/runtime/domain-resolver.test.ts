import assert from 'node:assert/strict';
import test from 'node:test';
import { resolveSiteKey, resolveWorker } from './domain-resolver.js';
import { QueueError } from './errors.js';
import { buildWorkerTable } from './worker-registry.js';

const table = buildWorkerTable({
  contractVersion: 1,
  workers: [
    { siteKey: 'youtube', command: 'python3', args: ['youtube.py'], aliases: ['youtu'] },
    { siteKey: 'tiktok', command: 'python3', args: ['tiktok.py'], aliases: [] },
  ],
});

function assertQueueError(fn: () => unknown, code: QueueError['code']): void {
  assert.throws(fn, (error: unknown) => error instanceof QueueError && error.code === code);
}

test('resolveSiteKey takes the second-level label of the host', () => {
  assert.equal(resolveSiteKey('https://www.YouTube.com/watch?v=abc'), 'youtube');
  assert.equal(resolveSiteKey('https://vm.tiktok.com./ZM123/'), 'tiktok');
  assert.equal(resolveSiteKey('http://instagram.com:8443/p/xyz'), 'instagram');
});

test('resolveSiteKey treats a URL without a scheme as https', () => {
  assert.equal(resolveSiteKey('  youtube.com/@channel  '), 'youtube');
});

test('resolveSiteKey uses a dotless host as its own key', () => {
  assert.equal(resolveSiteKey('http://localhost:8080/video'), 'localhost');
});

test('resolveSiteKey rejects empty, unparseable and non-http URLs', () => {
  assertQueueError(() => resolveSiteKey('   '), 'invalid_url');
  assertQueueError(() => resolveSiteKey('https://'), 'invalid_url');
  assertQueueError(() => resolveSiteKey('not a url'), 'invalid_url');
  assertQueueError(() => resolveSiteKey('ftp://files.example.com/video.mp4'), 'invalid_url');
});

test('resolveWorker maps aliases onto the canonical site key', () => {
  const resolved = resolveWorker('https://youtu.be/abc', table);

  assert.equal(resolved.siteKey, 'youtube');
  assert.deepEqual(resolved.worker.args, ['youtube.py']);
});

test('resolveWorker fails with no_worker_for_site for unknown sites', () => {
  assert.throws(
    () => resolveWorker('https://www.example.com/video', table),
    (error: unknown) =>
      error instanceof QueueError &&
      error.code === 'no_worker_for_site' &&
      error.statusCode === 400 &&
      error.message === 'No worker for site "example"',
  );
});
