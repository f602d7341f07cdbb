import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import sqlite3 from 'sqlite3';

import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import type { CacheStore } from '../types';

const OPEN_FLAGS = sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;
const IN_MEMORY = ':memory:';

interface CacheRow {
  key: string;
  value: string;
}

export class SqliteCacheStore implements CacheStore {
  readonly name = 'sqlite';

  private constructor(private readonly db: sqlite3.Database, private readonly clock: Pick<Clock, 'now'>) {}

  static async initialize(dbFile: string, clock: Pick<Clock, 'now'> = systemClock): Promise<SqliteCacheStore> {
    let target = IN_MEMORY;
    if (dbFile !== IN_MEMORY) {
      target = resolve(process.cwd(), dbFile);
      mkdirSync(dirname(target), { recursive: true });
    }

    const database = await new Promise<sqlite3.Database>((resolveDb, rejectDb) => {
      const db = new sqlite3.Database(target, OPEN_FLAGS, (err) => {
        if (err) {
          rejectDb(err);
          return;
        }
        resolveDb(db);
      });
    });

    const store = new SqliteCacheStore(database, clock);
    await store.bootstrap();
    await store.purgeExpired();
    return store;
  }

  private exec(sql: string): Promise<void> {
    return new Promise((resolveExec, rejectExec) => {
      this.db.exec(sql, (err) => {
        if (err) {
          rejectExec(err);
          return;
        }
        resolveExec();
      });
    });
  }

  private run(sql: string, params: unknown[]): Promise<number> {
    return new Promise((resolveRun, rejectRun) => {
      this.db.run(sql, params, function runCallback(err) {
        if (err) {
          rejectRun(err);
          return;
        }
        resolveRun(this.changes ?? 0);
      });
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolveAll, rejectAll) => {
      this.db.all(sql, params, (err, rows) => {
        if (err) {
          rejectAll(err);
          return;
        }
        resolveAll(rows as T[]);
      });
    });
  }

  private async bootstrap(): Promise<void> {
    await this.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        stored_ts INTEGER NOT NULL,
        ttl_seconds INTEGER NOT NULL,
        expires_ts INTEGER
      )
    `);
    await this.exec('CREATE INDEX IF NOT EXISTS idx_cache_entries_expires ON cache_entries(expires_ts)');
  }

  async purgeExpired(): Promise<number> {
    return this.run('DELETE FROM cache_entries WHERE expires_ts IS NOT NULL AND expires_ts <= ?', [this.clock.now()]);
  }

  async ping(): Promise<void> {
    await this.all('SELECT 1 AS ok');
  }

  async get(key: string): Promise<string | null> {
    const rows = await this.all<CacheRow>(
      'SELECT key, value FROM cache_entries WHERE key = ? AND (expires_ts IS NULL OR expires_ts > ?)',
      [key, this.clock.now()]
    );
    return rows[0]?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.clock.now();
    const expiresAt = ttlSeconds > 0 ? now + ttlSeconds * 1000 : null;
    await this.run(
      `
        INSERT INTO cache_entries (key, value, stored_ts, ttl_seconds, expires_ts)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          value = excluded.value,
          stored_ts = excluded.stored_ts,
          ttl_seconds = excluded.ttl_seconds,
          expires_ts = excluded.expires_ts
      `,
      [key, value, now, ttlSeconds, expiresAt]
    );
  }

  async keys(pattern: string): Promise<string[]> {
    const rows = await this.all<Pick<CacheRow, 'key'>>(
      'SELECT key FROM cache_entries WHERE key GLOB ? AND (expires_ts IS NULL OR expires_ts > ?) ORDER BY key',
      [pattern, this.clock.now()]
    );
    return rows.map((row) => row.key);
  }

  async deleteByPattern(pattern: string): Promise<number> {
    await this.purgeExpired();
    return this.run('DELETE FROM cache_entries WHERE key GLOB ?', [pattern]);
  }

  async close(): Promise<void> {
    await new Promise<void>((resolveClose, rejectClose) => {
      this.db.close((err) => {
        if (err) {
          rejectClose(err);
          return;
        }
        resolveClose();
      });
    });
  }
}
