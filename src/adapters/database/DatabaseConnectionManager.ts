import sqlite3 from 'sqlite3';
import fs from 'fs';
import path from 'path';
import { StorageUnavailableError } from '../../core/errors';

const SCHEMA = `
  PRAGMA journal_mode = WAL;
  PRAGMA synchronous = FULL;
  PRAGMA busy_timeout = 5000;
  CREATE TABLE IF NOT EXISTS sent_words (
    term TEXT PRIMARY KEY,
    definition TEXT NOT NULL,
    part_of_speech TEXT,
    example TEXT,
    sent_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_sent_words_sent_at ON sent_words(sent_at);
  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  );
`;

// One shared connection per database file; repositories on the same path reuse it.
export class DatabaseConnectionManager {
  private static instances = new Map<string, DatabaseConnectionManager>();
  private initPromise: Promise<sqlite3.Database> | null = null;
  private users = 0;
  private tail: Promise<unknown> = Promise.resolve();

  private constructor(private readonly dbPath: string) {}

  public static forPath(dbPath: string): DatabaseConnectionManager {
    const key = path.resolve(dbPath);
    let manager = DatabaseConnectionManager.instances.get(key);
    if (!manager) {
      manager = new DatabaseConnectionManager(dbPath);
      DatabaseConnectionManager.instances.set(key, manager);
    }
    manager.users += 1;
    return manager;
  }

  public async getConnection(): Promise<sqlite3.Database> {
    if (!this.initPromise) {
      this.initPromise = this.open().catch((err: unknown) => {
        this.initPromise = null;
        throw new StorageUnavailableError('open', { cause: err });
      });
    }
    return this.initPromise;
  }

  private async open(): Promise<sqlite3.Database> {
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });

    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(this.dbPath, (openErr) => {
        if (openErr) return reject(openErr);

        db.exec(SCHEMA, (schemaErr) => {
          if (schemaErr) {
            db.close(() => reject(schemaErr));
            return;
          }
          resolve(db);
        });
      });
    });
  }

  // Runs work after every earlier exclusive section on this connection has settled.
  // Repositories sharing the file must not interleave BEGIN ... COMMIT blocks.
  public exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  // Closes the connection once the last repository using it lets go.
  public async release(): Promise<void> {
    this.users = Math.max(0, this.users - 1);
    if (this.users === 0) {
      DatabaseConnectionManager.instances.delete(path.resolve(this.dbPath));
      await this.close();
    }
  }

  public async close(): Promise<void> {
    const pending = this.initPromise;
    if (!pending) return;
    this.initPromise = null;
    let db: sqlite3.Database;
    try {
      db = await pending;
    } catch {
      // open never succeeded; nothing to close
      return;
    }
    await new Promise<void>((resolve, reject) => {
      db.close((err) => (err ? reject(new StorageUnavailableError('close', { cause: err })) : resolve()));
    });
  }
}
