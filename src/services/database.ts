/**
 * Database service using Knex.js.
 * Supports PostgreSQL, MySQL and SQLite.
 *
 * Every physical connection is put into a read-only session with a
 * statement timeout when it is created. Both directives are best-effort:
 * whatever the engine refuses is recorded in the session capabilities,
 * logged once, and not retried.
 */

import knex from 'knex';
import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import type { DatabaseDialect } from '../config.js';
import type { SchemaMap } from '../types/models.js';
import { logger } from '../utils/logger.js';
import type { SchemaSource } from './schema-cache.js';

/**
 * Which session guarantees the engine accepted.
 */
export interface SessionCapabilities {
  readOnly: boolean;
  statementTimeout: boolean;
}

interface SessionDirectives {
  readOnly: string;
  statementTimeout: ((ms: number) => string) | null;
}

const SESSION_DIRECTIVES: Record<DatabaseDialect, SessionDirectives> = {
  pg: {
    readOnly: 'SET SESSION CHARACTERISTICS AS TRANSACTION READ ONLY',
    statementTimeout: (ms) => `SET statement_timeout TO ${ms}`,
  },
  mysql2: {
    readOnly: 'SET SESSION TRANSACTION READ ONLY',
    statementTimeout: (ms) => `SET SESSION MAX_EXECUTION_TIME = ${ms}`,
  },
  'better-sqlite3': {
    readOnly: 'PRAGMA query_only = ON',
    statementTimeout: null,
  },
};

export interface SessionGuardOptions {
  readOnly: boolean;
  statementTimeoutMs: number;
}

/**
 * Runs one statement directly on a driver connection, outside the pool.
 */
export type RawStatementRunner = (sql: string) => Promise<void>;

interface SyncExecutable {
  exec(sql: string): unknown;
}

interface CallbackQueryable {
  query(sql: string, callback: (error: Error | null) => void): unknown;
}

function hasExec(connection: unknown): connection is SyncExecutable {
  return (
    typeof connection === 'object' &&
    connection !== null &&
    'exec' in connection &&
    typeof connection.exec === 'function'
  );
}

function hasCallbackQuery(connection: unknown): connection is CallbackQueryable {
  return (
    typeof connection === 'object' &&
    connection !== null &&
    'query' in connection &&
    typeof connection.query === 'function'
  );
}

/**
 * Adapt a raw driver connection (better-sqlite3, pg, mysql2) to a runner.
 */
export function rawRunner(connection: unknown): RawStatementRunner | null {
  if (hasExec(connection)) {
    return async (sql) => {
      connection.exec(sql);
    };
  }
  if (hasCallbackQuery(connection)) {
    return (sql) =>
      new Promise<void>((resolve, reject) => {
        connection.query(sql, (error) => (error ? reject(error) : resolve()));
      });
  }
  return null;
}

/**
 * Apply the read-only and timeout directives for a dialect, reporting which
 * ones the engine accepted. Never rejects.
 */
export async function applySessionGuards(
  run: RawStatementRunner,
  dialect: DatabaseDialect,
  options: SessionGuardOptions
): Promise<SessionCapabilities> {
  const directives = SESSION_DIRECTIVES[dialect];
  const capabilities: SessionCapabilities = { readOnly: false, statementTimeout: false };

  if (options.readOnly) {
    capabilities.readOnly = await tryDirective(run, directives.readOnly);
  }
  if (directives.statementTimeout) {
    capabilities.statementTimeout = await tryDirective(
      run,
      directives.statementTimeout(options.statementTimeoutMs)
    );
  }
  return capabilities;
}

async function tryDirective(run: RawStatementRunner, sql: string): Promise<boolean> {
  try {
    await run(sql);
    return true;
  } catch (error) {
    logger.debug(`Session directive not supported (${sql}): ${error}`);
    return false;
  }
}

export interface DatabaseOptions extends SessionGuardOptions {
  knexConfig: Knex.Config;
  dialect: DatabaseDialect;
}

/**
 * A Knex pool with the session guards its connections accepted.
 */
export interface DatabaseHandle {
  readonly db: Knex;
  readonly dialect: DatabaseDialect;
  /** Guards accepted by the first connection, null until one is opened. */
  capabilities(): SessionCapabilities | null;
  close(): Promise<void>;
}

/**
 * Create the connection pool. Connections are opened lazily.
 */
export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const { knexConfig, dialect } = options;
  let accepted: SessionCapabilities | null = null;

  const afterCreate = (
    connection: unknown,
    done: (error: Error | null, connection: unknown) => void
  ): void => {
    const run = rawRunner(connection);
    const guarded = run
      ? applySessionGuards(run, dialect, options)
      : Promise.resolve<SessionCapabilities>({ readOnly: false, statementTimeout: false });

    guarded.then(
      (capabilities) => {
        if (!accepted) {
          accepted = capabilities;
          const level = capabilities.readOnly === options.readOnly ? 'info' : 'warn';
          logger[level](
            { dialect, ...capabilities },
            'Session guards applied (read-only / statement timeout)'
          );
        }
        done(null, connection);
      },
      (error: Error) => done(error, connection)
    );
  };

  const db = knex({
    ...knexConfig,
    pool: { ...knexConfig.pool, afterCreate },
  });

  logger.info(`Database pool created: ${dialect}`);

  return {
    db,
    dialect,
    capabilities: () => accepted,
    close: async () => {
      await db.destroy();
      logger.info('Database connection closed');
    },
  };
}

/**
 * Schema introspection through knex-schema-inspector.
 */
export class KnexSchemaSource implements SchemaSource {
  private readonly inspector: ReturnType<typeof SchemaInspector>;

  constructor(db: Knex) {
    this.inspector = SchemaInspector(db);
  }

  async introspect(): Promise<SchemaMap> {
    const tables = await this.inspector.tables();

    // Fetch all table schemas in parallel
    const entries = await Promise.all(
      tables.map(async (table) => {
        const columns = await this.inspector.columnInfo(table);
        return [table, columns.map((column) => column.name)] as const;
      })
    );

    return Object.fromEntries(entries);
  }
}
