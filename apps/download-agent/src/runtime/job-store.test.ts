import assert from 'node:assert/strict';
import { join } from 'node:path';
import test from 'node:test';
import { createQueueDatabase } from '../db.js';
import { createTempDatabase, createTempDir } from '../testing/fakes.js';
import { QueueError } from './errors.js';
import { createJobStore, INTERRUPTED_NOTE } from './job-store.js';

function fixedClock(...isoTimes: string[]): () => Date {
  let index = 0;
  return () => {
    const value = isoTimes[Math.min(index, isoTimes.length - 1)] ?? '2026-01-01T00:00:00.000Z';
    index += 1;
    return new Date(value);
  };
}

function isQueueErrorWith(code: QueueError['code']) {
  return (error: unknown): boolean => error instanceof QueueError && error.code === code;
}

test('create stores a pending job and list returns jobs in submission order', () => {
  const store = createJobStore(createTempDatabase(), { now: fixedClock('2026-03-01T10:00:00.000Z') });

  const first = store.create('https://youtube.com/a', 'youtube');
  const second = store.create('https://tiktok.com/b', 'tiktok');

  assert.deepEqual(first, {
    id: 1,
    url: 'https://youtube.com/a',
    siteKey: 'youtube',
    status: 'pending',
    submittedAt: '2026-03-01T10:00:00.000Z',
    startedAt: null,
    finishedAt: null,
    resultNote: null,
    log: null,
  });
  assert.equal(second.id, 2);
  assert.deepEqual(
    store.list().map((job) => job.id),
    [1, 2],
  );
});

test('transition moves a job through its lifecycle and stamps times', () => {
  const store = createJobStore(createTempDatabase(), {
    now: fixedClock('2026-03-01T10:00:00.000Z', '2026-03-01T10:00:05.000Z', '2026-03-01T10:01:00.000Z'),
  });
  const job = store.create('https://youtube.com/a', 'youtube');

  const active = store.transition(job.id, 'pending', 'active');
  assert.equal(active.status, 'active');
  assert.equal(active.startedAt, '2026-03-01T10:00:05.000Z');

  const failed = store.transition(job.id, 'active', 'failed', 'worker exited with code 1');
  assert.equal(failed.status, 'failed');
  assert.equal(failed.finishedAt, '2026-03-01T10:01:00.000Z');
  assert.equal(failed.resultNote, 'worker exited with code 1');
});

test('transition is a compare-and-set on the current status', () => {
  const store = createJobStore(createTempDatabase());
  const job = store.create('https://youtube.com/a', 'youtube');
  store.transition(job.id, 'pending', 'active');

  assert.throws(() => store.transition(job.id, 'pending', 'active'), isQueueErrorWith('invalid_transition'));
  assert.equal(store.get(job.id)?.status, 'active');
});

test('transition rejects moves outside the lifecycle and unknown jobs', () => {
  const store = createJobStore(createTempDatabase());
  const job = store.create('https://youtube.com/a', 'youtube');

  assert.throws(() => store.transition(job.id, 'pending', 'completed'), isQueueErrorWith('invalid_transition'));
  assert.throws(() => store.transition(job.id, 'completed', 'pending'), isQueueErrorWith('invalid_transition'));
  assert.throws(() => store.transition(999, 'pending', 'active'), isQueueErrorWith('job_not_found'));
  assert.equal(store.get(job.id)?.status, 'pending');
});

test('rewinding a failed job clears its run details', () => {
  const store = createJobStore(createTempDatabase());
  const job = store.create('https://youtube.com/a', 'youtube');
  store.transition(job.id, 'pending', 'active');
  store.updateLog(job.id, 'downloading...\nERROR\n');
  store.transition(job.id, 'active', 'failed', 'worker exited with code 1');

  const requeued = store.transition(job.id, 'failed', 'pending');

  assert.equal(requeued.status, 'pending');
  assert.equal(requeued.startedAt, null);
  assert.equal(requeued.finishedAt, null);
  assert.equal(requeued.resultNote, null);
  assert.equal(requeued.log, null);
  assert.equal(requeued.siteKey, 'youtube');
});

test('listByStatus, deleteWhere and deleteAll', () => {
  const store = createJobStore(createTempDatabase());
  const done = store.create('https://youtube.com/a', 'youtube');
  store.transition(done.id, 'pending', 'active');
  store.transition(done.id, 'active', 'completed');
  store.create('https://tiktok.com/b', 'tiktok');
  store.create('https://instagram.com/c', 'instagram');

  assert.deepEqual(
    store.listByStatus('pending').map((job) => job.siteKey),
    ['tiktok', 'instagram'],
  );
  assert.equal(store.deleteWhere([]), 0);
  assert.equal(store.deleteWhere(['completed']), 1);
  assert.equal(store.get(done.id), undefined);
  assert.equal(store.deleteAll(), 2);
  assert.deepEqual(store.list(), []);
});

test('ids keep increasing after jobs are deleted', () => {
  const store = createJobStore(createTempDatabase());
  store.create('https://youtube.com/a', 'youtube');
  store.create('https://youtube.com/b', 'youtube');
  store.deleteAll();

  assert.equal(store.create('https://youtube.com/c', 'youtube').id, 3);
});

test('reopening the store marks jobs left active by a previous run as failed', () => {
  const sqlitePath = join(createTempDir('recovery'), 'queue.sqlite');
  const firstRun = createQueueDatabase(sqlitePath);
  firstRun.initialize();
  const before = createJobStore(firstRun);
  const interrupted = before.create('https://youtube.com/a', 'youtube');
  const waiting = before.create('https://tiktok.com/b', 'tiktok');
  before.transition(interrupted.id, 'pending', 'active');
  assert.equal(before.recoveredOnOpen, 0);
  firstRun.close();

  const secondRun = createQueueDatabase(sqlitePath);
  secondRun.initialize();
  const after = createJobStore(secondRun, { now: fixedClock('2026-03-02T08:00:00.000Z') });

  assert.equal(after.recoveredOnOpen, 1);
  const recovered = after.get(interrupted.id);
  assert.equal(recovered?.status, 'failed');
  assert.equal(recovered?.resultNote, INTERRUPTED_NOTE);
  assert.equal(recovered?.finishedAt, '2026-03-02T08:00:00.000Z');
  assert.equal(after.get(waiting.id)?.status, 'pending');
  secondRun.close();
});
