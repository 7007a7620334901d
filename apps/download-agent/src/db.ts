import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import Database from 'better-sqlite3';

export interface QueueDatabase {
  connection: Database.Database;
  initialize: () => void;
  getSetting: (key: string) => string | undefined;
  setSetting: (key: string, value: string) => void;
  close: () => void;
}

function ensureDirectory(sqlitePath: string): string {
  const absolutePath = resolve(sqlitePath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  return absolutePath;
}

export function createQueueDatabase(sqlitePath: string): QueueDatabase {
  const db = new Database(ensureDirectory(sqlitePath));
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  return {
    connection: db,
    initialize: () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS jobs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          url TEXT NOT NULL,
          site_key TEXT NOT NULL,
          status TEXT NOT NULL,
          submitted_at TEXT NOT NULL,
          started_at TEXT,
          finished_at TEXT,
          result_note TEXT,
          log TEXT
        );

        CREATE INDEX IF NOT EXISTS jobs_status_idx ON jobs (status, id);

        CREATE TABLE IF NOT EXISTS settings (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL
        );
      `);
    },
    getSetting: (key) => {
      const row = db.prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?').get(key);
      return row?.value;
    },
    setSetting: (key, value) => {
      db.prepare(
        'INSERT INTO settings (key, value) VALUES (@key, @value) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
      ).run({ key, value });
    },
    close: () => {
      db.close();
    },
  };
}
