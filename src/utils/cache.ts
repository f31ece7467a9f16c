import Database from 'better-sqlite3';

export interface ICache<T> {
  get(key: string): Promise<T | null>;
  set(key: string, value: T, ttlSeconds?: number): Promise<void>;
}

const DEFAULT_TTL_SECONDS = 10 * 60;
const DEFAULT_PURGE_EVERY = 100;

interface ICacheRow {
  value: string;
  expires_at: number;
}

/**
 * Persistent cache backed by a single SQLite table. Values are stored as
 * JSON, so a hit hands back `unknown` and callers validate what they read.
 * Writes to the same key are last-write-wins. Expired rows are removed on
 * read and, in bulk, every `purgeEvery` writes.
 */
export class SqliteCache implements ICache<unknown> {
  private readonly selectStmt: Database.Statement<[string], ICacheRow>;
  private readonly upsertStmt: Database.Statement<[string, string, number]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly purgeStmt: Database.Statement<[number]>;
  private writes = 0;

  constructor(
    db: Database.Database,
    private readonly purgeEvery = DEFAULT_PURGE_EVERY,
  ) {
    db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      )
    `);
    this.selectStmt = db.prepare<[string], ICacheRow>(
      'SELECT value, expires_at FROM cache_entries WHERE key = ?',
    );
    this.upsertStmt = db.prepare<[string, string, number]>(
      'INSERT OR REPLACE INTO cache_entries (key, value, expires_at) VALUES (?, ?, ?)',
    );
    this.deleteStmt = db.prepare<[string]>('DELETE FROM cache_entries WHERE key = ?');
    this.purgeStmt = db.prepare<[number]>('DELETE FROM cache_entries WHERE expires_at < ?');
  }

  async get(key: string): Promise<unknown | null> {
    const row = this.selectStmt.get(key);
    if (!row) return null;
    if (Date.now() > row.expires_at) {
      this.deleteStmt.run(key);
      return null;
    }
    return JSON.parse(row.value);
  }

  async set(key: string, value: unknown, ttlSeconds = DEFAULT_TTL_SECONDS): Promise<void> {
    this.upsertStmt.run(key, JSON.stringify(value), Date.now() + ttlSeconds * 1000);
    this.writes += 1;
    if (this.writes >= this.purgeEvery) {
      this.purgeExpired();
    }
  }

  /** Deletes every expired row and returns how many went. */
  purgeExpired(): number {
    this.writes = 0;
    return this.purgeStmt.run(Date.now()).changes;
  }
}
