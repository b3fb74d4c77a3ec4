import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError, StorageUnavailableError, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_TIMEOUT']);

function sqliteCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * SQLite database adapter
 * Domain layer never imports this - accessed via dependency injection.
 * Every statement runs under the configured busy timeout; a busy or locked
 * database surfaces as StorageUnavailableError.
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH' | 'STORAGE_TIMEOUT_MS'>) {
    try {
      if (env.SQLITE_DB_PATH !== ':memory:') {
        mkdirSync(dirname(env.SQLITE_DB_PATH), { recursive: true });
      }
      this.db = new Database(env.SQLITE_DB_PATH, { timeout: env.STORAGE_TIMEOUT_MS });
      this.db.pragma('journal_mode = WAL'); // Write-Ahead Logging for better concurrency
      this.db.pragma('foreign_keys = ON');
      logger.info('Database initialized', { path: env.SQLITE_DB_PATH });
    } catch (error) {
      throw this.translate('Failed to initialize database', error, {});
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare<unknown[], T>(sql);
      return stmt.all(...params);
    } catch (error) {
      throw this.translate('Query execution failed', error, { sql });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare<unknown[], T>(sql);
      return stmt.get(...params) ?? null;
    } catch (error) {
      throw this.translate('QueryOne execution failed', error, { sql });
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Returns the number of affected rows
   */
  execute(sql: string, params: unknown[] = []): number {
    try {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return result.changes;
    } catch (error) {
      throw this.translate('Statement execution failed', error, { sql });
    }
  }

  /**
   * Execute an INSERT and return the new rowid
   */
  insert(sql: string, params: unknown[] = []): number {
    try {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return Number(result.lastInsertRowid);
    } catch (error) {
      throw this.translate('Insert execution failed', error, { sql });
    }
  }

  /**
   * Execute multiple statements in one IMMEDIATE transaction
   * Rolls back on any error; domain errors raised inside pass through unchanged
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn.immediate();
    } catch (error) {
      if (isAppError(error) && !(error instanceof DatabaseError)) {
        throw error;
      }
      logger.warn('Transaction rolled back', { error });
      if (error instanceof DatabaseError) {
        throw error;
      }
      throw this.translate('Transaction failed', error, {});
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }

  private translate(
    message: string,
    error: unknown,
    context: Record<string, unknown>
  ): DatabaseError | StorageUnavailableError {
    if (error instanceof DatabaseError || error instanceof StorageUnavailableError) {
      return error;
    }

    const code = sqliteCodeOf(error);
    if (code && TRANSIENT_CODES.has(code)) {
      logger.warn('Database unavailable', { ...context, code });
      return new StorageUnavailableError('Storage is busy or unavailable', { code });
    }

    if (!code?.startsWith('SQLITE_CONSTRAINT')) {
      logger.error(message, { ...context, error });
    }
    return new DatabaseError(message, { ...context, code }, code);
  }
}
