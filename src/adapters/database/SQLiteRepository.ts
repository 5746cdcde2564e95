import sqlite3 from 'sqlite3';
import { StorageUnavailableError } from '../../core/errors';
import { DatabaseConnectionManager } from './DatabaseConnectionManager';

export type SqlParams = Array<string | number | null>;

// Promise wrappers over the callback API; every failure becomes StorageUnavailableError.
export abstract class SQLiteRepository {
  protected connectionManager: DatabaseConnectionManager;

  constructor(dbPath: string) {
    this.connectionManager = DatabaseConnectionManager.forPath(dbPath);
  }

  protected async getDb(): Promise<sqlite3.Database> {
    return this.connectionManager.getConnection();
  }

  protected async run(operation: string, sql: string, params: SqlParams = []): Promise<number> {
    const db = await this.getDb();
    return new Promise((resolve, reject) => {
      db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) reject(new StorageUnavailableError(operation, { cause: err }));
        else resolve(this.changes);
      });
    });
  }

  protected async get<T>(operation: string, sql: string, params: SqlParams = []): Promise<T | undefined> {
    const db = await this.getDb();
    return new Promise((resolve, reject) => {
      db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) reject(new StorageUnavailableError(operation, { cause: err }));
        else resolve(row);
      });
    });
  }

  protected async all<T>(operation: string, sql: string, params: SqlParams = []): Promise<T[]> {
    const db = await this.getDb();
    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) reject(new StorageUnavailableError(operation, { cause: err }));
        else resolve(rows ?? []);
      });
    });
  }

  // Runs work inside BEGIN IMMEDIATE / COMMIT; rolls back and rethrows on failure.
  // Transactions on a shared connection are queued one after another.
  protected transaction<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return this.connectionManager.exclusive(async () => {
      await this.run(operation, 'BEGIN IMMEDIATE');
      try {
        const result = await work();
        await this.run(operation, 'COMMIT');
        return result;
      } catch (error) {
        await this.run(operation, 'ROLLBACK').catch((rollbackErr: unknown) => {
          throw new StorageUnavailableError(`${operation} rollback`, { cause: rollbackErr });
        });
        throw error;
      }
    });
  }

  close(): Promise<void> {
    return this.connectionManager.release();
  }
}
