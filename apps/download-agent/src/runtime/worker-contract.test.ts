import assert from 'node:assert/strict';
import { join } from 'node:path';
import test from 'node:test';
import type { Job, WorkerDescriptor } from './types.js';
import { createLaunchRequest, interpretExit } from './worker-contract.js';

const job: Job = {
  id: 7,
  url: 'https://www.youtube.com/@channel',
  siteKey: 'youtube',
  status: 'active',
  submittedAt: '2026-01-01T00:00:00.000Z',
  startedAt: '2026-01-01T00:00:01.000Z',
  finishedAt: null,
  resultNote: null,
  log: null,
};

const worker: WorkerDescriptor = {
  siteKey: 'youtube',
  command: 'python3',
  args: ['/opt/workers/youtube.py', '--quiet'],
  aliases: [],
};

test('createLaunchRequest appends the URL as the last argument and runs in the site folder', () => {
  const request = createLaunchRequest({ job, worker, mediaRootPath: '/media' });

  assert.deepEqual(request, {
    contractVersion: 1,
    jobId: 7,
    siteKey: 'youtube',
    command: 'python3',
    args: ['/opt/workers/youtube.py', '--quiet', 'https://www.youtube.com/@channel'],
    cwd: join('/media', 'youtube'),
    timeoutMs: undefined,
  });
});

test('createLaunchRequest prefers the worker timeout over the global maximum', () => {
  assert.equal(
    createLaunchRequest({ job, worker: { ...worker, timeoutSec: 30 }, mediaRootPath: '/media', maxRunDurationSec: 600 })
      .timeoutMs,
    30_000,
  );
  assert.equal(createLaunchRequest({ job, worker, mediaRootPath: '/media', maxRunDurationSec: 600 }).timeoutMs, 600_000);
});

test('interpretExit treats only exit code 0 as success', () => {
  assert.deepEqual(interpretExit({ exitCode: 0, signal: null, output: 'ERROR ignored\n' }), { status: 'completed' });
  assert.deepEqual(interpretExit({ exitCode: 2, signal: null, output: '' }), {
    status: 'failed',
    note: 'worker exited with code 2',
  });
});

test('interpretExit adds the last non-empty output line to the failure note', () => {
  assert.deepEqual(interpretExit({ exitCode: 1, signal: null, output: 'fetching\nERROR: video unavailable\n\n' }), {
    status: 'failed',
    note: 'worker exited with code 1: ERROR: video unavailable',
  });
  assert.deepEqual(interpretExit({ exitCode: null, signal: 'SIGKILL', output: '' }), {
    status: 'failed',
    note: 'worker terminated by SIGKILL',
  });
});
