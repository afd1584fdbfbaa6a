import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { StoreError, describeError } from './errors.js';
import type { KeyValueStore } from './types.js';

export interface OpenStoreOptions {
  /** Milliseconds to wait for a lock held by another handle before failing. */
  timeout?: number;
}

interface ValueRow {
  value: Buffer;
}

function isValueRow(row: unknown): row is ValueRow {
  return typeof row === 'object' && row !== null && 'value' in row && Buffer.isBuffer(row.value);
}

class SqliteStore implements KeyValueStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  get(key: string): Buffer | undefined {
    try {
      const row: unknown = this.db.prepare('SELECT value FROM kv WHERE key = ?').get(key);
      return isValueRow(row) ? row.value : undefined;
    } catch (error) {
      throw new StoreError('read', `Failed to read "${key}": ${describeError(error)}`, { cause: error });
    }
  }

  set(key: string, value: Buffer): void {
    try {
      this.db
        .prepare('INSERT INTO kv (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value')
        .run(key, value);
    } catch (error) {
      throw new StoreError('write', `Failed to write "${key}": ${describeError(error)}`, { cause: error });
    }
  }

  delete(key: string): void {
    try {
      this.db.prepare('DELETE FROM kv WHERE key = ?').run(key);
    } catch (error) {
      throw new StoreError('delete', `Failed to delete "${key}": ${describeError(error)}`, { cause: error });
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

/**
 * Opens (or creates) the cache database at `path`. The handle keeps an
 * exclusive lock until `close()`, so a second handle on the same file fails
 * with a `StoreError` instead of interleaving writes.
 */
export function openStore(path: string, options: OpenStoreOptions = {}): KeyValueStore {
  let db: Database.Database | null = null;

  try {
    mkdirSync(dirname(path), { recursive: true });
    db = new Database(path, { timeout: options.timeout ?? 5000 });
    db.pragma('locking_mode = EXCLUSIVE');
    db.exec('BEGIN EXCLUSIVE; CREATE TABLE IF NOT EXISTS kv (key TEXT PRIMARY KEY, value BLOB NOT NULL); COMMIT;');
    return new SqliteStore(db);
  } catch (error) {
    db?.close();
    throw new StoreError('open', `Failed to open cache store at ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

export function createMemoryStore(): KeyValueStore {
  const entries = new Map<string, Buffer>();

  return {
    get: (key) => entries.get(key),
    set: (key, value) => {
      entries.set(key, Buffer.from(value));
    },
    delete: (key) => {
      entries.delete(key);
    },
    close: () => {
      entries.clear();
    },
  };
}
