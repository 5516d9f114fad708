/**
 * Execution engine: runs validated statements against the pool.
 */

import { ExecutionFailed, ServiceUnavailable, errorMessage } from '../types/errors.js';
import type { QueryRows } from '../types/models.js';
import { isRecord, type Row } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import type { DatabaseHandle, SessionCapabilities } from './database.js';
import type { ValidatedStatement } from './validator.js';

/**
 * Anything that can run a validated statement. The pipeline depends on
 * this, not on Knex.
 */
export interface StatementExecutor {
  execute(statement: ValidatedStatement): Promise<QueryRows>;
  ping(): Promise<void>;
  capabilities(): SessionCapabilities | null;
}

/**
 * The slice of a Knex raw query the engine relies on.
 */
export interface RawQuery extends PromiseLike<unknown> {
  timeout(ms: number, options: { cancel: boolean }): PromiseLike<unknown>;
}

/**
 * The slice of a DatabaseHandle the engine relies on.
 */
export interface ExecutionTarget extends Pick<DatabaseHandle, 'dialect' | 'capabilities'> {
  readonly db: { raw(sql: string): RawQuery };
}

export class ExecutionEngine implements StatementExecutor {
  constructor(
    private readonly database: ExecutionTarget,
    private readonly timeoutMs: number = 5000
  ) {}

  /**
   * Run a statement once, bounded by the statement timeout. No retries.
   */
  async execute(statement: ValidatedStatement): Promise<QueryRows> {
    const { db, dialect } = this.database;
    // Server-side cancellation exists for pg and mysql2 only
    const cancel = dialect === 'pg' || dialect === 'mysql2';

    let result: unknown;
    try {
      result = await db.raw(statement.sql).timeout(this.timeoutMs, { cancel });
    } catch (error) {
      logger.error(`SQL execution failed: ${error}`);
      logger.error(`SQL: ${statement.sql}`);
      throw new ExecutionFailed(errorMessage(error));
    }

    const rows = normalizeResult(result);
    logger.debug(`Query returned ${rows.rows.length} rows`);
    return rows;
  }

  /**
   * Cheap connectivity check.
   */
  async ping(): Promise<void> {
    try {
      await this.database.db.raw('SELECT 1');
    } catch (error) {
      throw new ServiceUnavailable(`Database unavailable: ${errorMessage(error)}`);
    }
  }

  capabilities(): SessionCapabilities | null {
    return this.database.capabilities();
  }
}

/**
 * Normalize the driver-specific shape `knex.raw` resolves to.
 * pg: `{ rows, fields }`; mysql2: `[rows, fields]`; better-sqlite3: `rows`.
 */
export function normalizeResult(result: unknown): QueryRows {
  if (isRecord(result) && Array.isArray(result.rows)) {
    const rows = result.rows.filter(isRecord);
    return { columns: fieldNames(result.fields) ?? columnsOf(rows), rows };
  }

  if (Array.isArray(result) && Array.isArray(result[0])) {
    const rows = result[0].filter(isRecord);
    return { columns: fieldNames(result[1]) ?? columnsOf(rows), rows };
  }

  if (Array.isArray(result)) {
    const rows = result.filter(isRecord);
    return { columns: columnsOf(rows), rows };
  }

  return { columns: [], rows: [] };
}

function fieldNames(fields: unknown): string[] | null {
  if (!Array.isArray(fields)) {
    return null;
  }
  const names: string[] = [];
  for (const field of fields) {
    if (isRecord(field) && typeof field.name === 'string') {
      names.push(field.name);
    }
  }
  return names;
}

function columnsOf(rows: Row[]): string[] {
  return rows.length > 0 ? Object.keys(rows[0]) : [];
}
