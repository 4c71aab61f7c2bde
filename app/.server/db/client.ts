import type BetterSqlite3 from 'better-sqlite3';
import { closeDatabaseInternal, getDatabaseInternal } from './connection';
import { StorageError } from '~/.server/errors';
import { getLogger } from '~/.server/log/logger';

type QueryParam = unknown;
type QueryParams = QueryParam[] | readonly QueryParam[];

const log = getLogger({ module: 'DBClient' });

function shouldLogQueries(): boolean {
  return process.env.DB_LOG_QUERIES === '1';
}

function logQuery(kind: 'select' | 'get' | 'run' | 'tx', sql: string, params: QueryParams): void {
  if (!shouldLogQueries()) return;
  log.debug({ kind, sql, params }, 'db query');
}

/**
 * Query helpers bound to one connection.
 * Every failure of the underlying driver surfaces as a StorageError.
 */
export class DbClient {
  constructor(private readonly db: BetterSqlite3.Database) {}

  /**
   * Run a SELECT returning multiple rows
   */
  select<T>(sql: string, params: QueryParams = []): T[] {
    logQuery('select', sql, params);
    try {
      return this.db.prepare(sql).all(...params) as T[];
    } catch (error) {
      throw new StorageError(`Query failed: ${firstLine(sql)}`, { cause: error });
    }
  }

  /**
   * Run a SELECT returning a single row (or null)
   */
  selectOne<T>(sql: string, params: QueryParams = []): T | null {
    logQuery('get', sql, params);
    try {
      const row = this.db.prepare(sql).get(...params) as T | undefined;
      return row ?? null;
    } catch (error) {
      throw new StorageError(`Query failed: ${firstLine(sql)}`, { cause: error });
    }
  }

  /**
   * Run INSERT/UPDATE/DELETE
   */
  run(sql: string, params: QueryParams = []): BetterSqlite3.RunResult {
    logQuery('run', sql, params);
    try {
      return this.db.prepare(sql).run(...params);
    } catch (error) {
      throw new StorageError(`Statement failed: ${firstLine(sql)}`, { cause: error });
    }
  }

  /**
   * Execute a function inside a SQLite transaction.
   * Errors thrown by `fn` roll back and propagate unchanged; anything the
   * driver throws around it (BEGIN, COMMIT, a closed connection) becomes a
   * StorageError.
   */
  transaction<T>(fn: () => T): T {
    logQuery('tx', 'BEGIN', []);
    const outcome: { failed: boolean; error: unknown } = { failed: false, error: undefined };
    const body = (): T => {
      try {
        return fn();
      } catch (error) {
        outcome.failed = true;
        outcome.error = error;
        throw error;
      }
    };

    try {
      return this.db.transaction(body)();
    } catch (error) {
      if (outcome.failed && outcome.error === error) {
        throw error;
      }
      throw new StorageError('Transaction failed', { cause: error });
    }
  }
}

function firstLine(sql: string): string {
  return sql.trim().split('\n')[0];
}

let defaultClient: DbClient | null = null;

/**
 * Client over the process-wide database (opened and migrated on first use)
 */
export function getDbClient(): DbClient {
  if (!defaultClient) {
    defaultClient = new DbClient(getDatabaseInternal());
  }
  return defaultClient;
}

/**
 * Ensure the database is opened and migrations have run
 */
export function ensureDatabaseReady(): void {
  getDbClient();
}

export function closeDbClient(): void {
  defaultClient = null;
  closeDatabaseInternal();
}
