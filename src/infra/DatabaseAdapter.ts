import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DatabaseError, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const IN_MEMORY = ':memory:';

function sqliteCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : null;
  }
  return null;
}

/**
 * SQLite database adapter
 * Services never import this - repositories receive it via constructor injection.
 * better-sqlite3 is synchronous: a statement has committed (or failed) when the call returns.
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    const dbPath = env.SQLITE_DB_PATH;
    try {
      if (dbPath !== IN_MEMORY) {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      if (dbPath !== IN_MEMORY) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = FULL');
      this.db.pragma('busy_timeout = 5000');
      this.db.pragma('foreign_keys = ON');
      this.initializeSchema();
      logger.debug('Database initialized', { path: dbPath });
    } catch (error) {
      throw new DatabaseError('Failed to initialize database', { path: dbPath, error });
    }
  }

  private initializeSchema(): void {
    try {
      const schemaPath = join(__dirname, 'db', 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');
      this.db.exec(schema);
    } catch (error) {
      throw new DatabaseError('Failed to initialize database schema', { error });
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
      logger.error('Database query failed', { sql, error });
      throw new DatabaseError('Query execution failed', { sql, error }, sqliteCode(error));
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
      logger.error('Database queryOne failed', { sql, error });
      throw new DatabaseError('QueryOne execution failed', { sql, error }, sqliteCode(error));
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
      const code = sqliteCode(error);
      if (code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        logger.debug('Database execute hit primary key constraint', { sql });
      } else {
        logger.error('Database execute failed', { sql, error });
      }
      throw new DatabaseError('Execute failed', { sql, error }, code);
    }
  }

  /**
   * Execute multiple statements in one IMMEDIATE transaction
   * Rolls back on any error; application errors propagate unchanged
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn.immediate();
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      logger.error('Transaction failed, rolling back', { error });
      throw new DatabaseError('Transaction failed', { error }, sqliteCode(error));
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.debug('Database connection closed');
  }
}
