import type { QueueDatabase } from '../db.js';
import { QueueError } from './errors.js';
import type { Job, JobStatus } from './types.js';

export const INTERRUPTED_NOTE = 'interrupted: worker was not supervised after restart';

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['active'],
  active: ['completed', 'failed'],
  completed: [],
  failed: ['pending'],
};

interface JobRow {
  id: number;
  url: string;
  site_key: string;
  status: JobStatus;
  submitted_at: string;
  started_at: string | null;
  finished_at: string | null;
  result_note: string | null;
  log: string | null;
}

export interface JobStore {
  /** Number of `active` jobs reset to `failed` when the store was opened. */
  readonly recoveredOnOpen: number;
  create: (url: string, siteKey: string) => Job;
  get: (id: number) => Job | undefined;
  list: () => Job[];
  listByStatus: (status: JobStatus) => Job[];
  /**
   * Compare-and-set status change. Throws `job_not_found` when the job is gone and
   * `invalid_transition` when its status is not `expected` or the move is not allowed.
   */
  transition: (id: number, expected: JobStatus, next: JobStatus, note?: string) => Job;
  updateLog: (id: number, log: string) => void;
  deleteWhere: (statuses: readonly JobStatus[]) => number;
  deleteAll: () => number;
  recoverInterrupted: () => number;
}

function toJob(row: JobRow): Job {
  return {
    id: row.id,
    url: row.url,
    siteKey: row.site_key,
    status: row.status,
    submittedAt: row.submitted_at,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    resultNote: row.result_note,
    log: row.log,
  };
}

export function createJobStore(database: QueueDatabase, options?: { now?: () => Date }): JobStore {
  const db = database.connection;
  const now = options?.now ?? (() => new Date());

  const selectById = db.prepare<[number], JobRow>('SELECT * FROM jobs WHERE id = ?');
  const selectAll = db.prepare<[], JobRow>('SELECT * FROM jobs ORDER BY id ASC');
  const selectByStatus = db.prepare<[JobStatus], JobRow>('SELECT * FROM jobs WHERE status = ? ORDER BY id ASC');
  const insertJob = db.prepare<{ url: string; siteKey: string; submittedAt: string }>(
    "INSERT INTO jobs (url, site_key, status, submitted_at) VALUES (@url, @siteKey, 'pending', @submittedAt)",
  );
  const activate = db.prepare<{ id: number; expected: JobStatus; at: string }>(
    "UPDATE jobs SET status = 'active', started_at = @at WHERE id = @id AND status = @expected",
  );
  const finish = db.prepare<{ id: number; expected: JobStatus; next: JobStatus; at: string; note: string | null }>(
    'UPDATE jobs SET status = @next, finished_at = @at, result_note = @note WHERE id = @id AND status = @expected',
  );
  const rewind = db.prepare<{ id: number; expected: JobStatus }>(
    "UPDATE jobs SET status = 'pending', started_at = NULL, finished_at = NULL, result_note = NULL, log = NULL WHERE id = @id AND status = @expected",
  );
  const writeLog = db.prepare<{ id: number; log: string }>('UPDATE jobs SET log = @log WHERE id = @id');
  const removeAll = db.prepare<[]>('DELETE FROM jobs');
  const failActive = db.prepare<{ at: string; note: string }>(
    "UPDATE jobs SET status = 'failed', finished_at = @at, result_note = @note WHERE status = 'active'",
  );

  const requireJob = (id: number): Job => {
    const row = selectById.get(id);
    if (!row) {
      throw new QueueError('job_not_found', `Job ${id} not found`);
    }
    return toJob(row);
  };

  const runTransition = db.transaction((id: number, expected: JobStatus, next: JobStatus, note?: string): Job => {
    const current = requireJob(id);
    if (current.status !== expected) {
      throw new QueueError('invalid_transition', `Job ${id} is ${current.status}, expected ${expected}`);
    }

    const at = now().toISOString();
    if (next === 'active') {
      activate.run({ id, expected, at });
    } else if (next === 'pending') {
      rewind.run({ id, expected });
    } else {
      finish.run({ id, expected, next, at, note: note ?? null });
    }

    return requireJob(id);
  });

  const recoverInterrupted = (): number =>
    failActive.run({ at: now().toISOString(), note: INTERRUPTED_NOTE }).changes;

  const recoveredOnOpen = recoverInterrupted();

  return {
    recoveredOnOpen,
    create: (url, siteKey) => {
      const result = insertJob.run({ url, siteKey, submittedAt: now().toISOString() });
      return requireJob(Number(result.lastInsertRowid));
    },
    get: (id) => {
      const row = selectById.get(id);
      return row ? toJob(row) : undefined;
    },
    list: () => selectAll.all().map(toJob),
    listByStatus: (status) => selectByStatus.all(status).map(toJob),
    transition: (id, expected, next, note) => {
      if (!ALLOWED_TRANSITIONS[expected].includes(next)) {
        throw new QueueError('invalid_transition', `Transition ${expected} -> ${next} is not allowed`);
      }
      return runTransition(id, expected, next, note);
    },
    updateLog: (id, log) => {
      writeLog.run({ id, log });
    },
    deleteWhere: (statuses) => {
      if (statuses.length === 0) {
        return 0;
      }
      const placeholders = statuses.map(() => '?').join(', ');
      return db.prepare<JobStatus[]>(`DELETE FROM jobs WHERE status IN (${placeholders})`).run(...statuses).changes;
    },
    deleteAll: () => removeAll.run().changes,
    recoverInterrupted,
  };
}
