/**
 * SQL validation and sanitization.
 *
 * Generated SQL is untrusted. A statement reaches the database only as a
 * ValidatedStatement, and only this module can construct one. Checks run in
 * a fixed order and the first failure wins; nothing is partially rewritten
 * except the trailing LIMIT.
 */

import { ValidationRejected } from '../types/errors.js';
import type { AllowedTableSet } from '../types/models.js';
import { scanTableReferences } from './table-refs.js';

/**
 * Mutating, DDL and administration verbs, matched as whole words.
 */
export const FORBIDDEN_KEYWORDS = [
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'TRUNCATE', 'CREATE',
  'GRANT', 'REVOKE', 'COPY', 'VACUUM', 'ANALYZE', 'LOCK', 'MERGE', 'CALL',
  'EXEC', 'EXECUTE', 'ATTACH', 'DETACH', 'PRAGMA',
] as const;

interface ForbiddenPattern {
  pattern: RegExp;
  reason: string;
}

/**
 * Unsafe constructs, checked in order.
 */
export const FORBIDDEN_PATTERNS: readonly ForbiddenPattern[] = [
  { pattern: /;/, reason: 'Multi-statement queries (semicolon) are not allowed' },
  { pattern: /--/, reason: 'Inline comments are not allowed' },
  { pattern: /\/\*/, reason: 'Block comments are not allowed' },
  { pattern: /\bUNION\b/i, reason: 'UNION queries are not allowed' },
  { pattern: /\bINTERSECT\b/i, reason: 'INTERSECT queries are not allowed' },
  { pattern: /\bEXCEPT\b/i, reason: 'EXCEPT queries are not allowed' },
  { pattern: /\bWITH\s*\(/i, reason: 'Complex CTEs are not allowed' },
  { pattern: /\bFOR\s+UPDATE\b/i, reason: 'FOR UPDATE clauses are not allowed' },
  { pattern: /\bFOR\s+SHARE\b/i, reason: 'FOR SHARE clauses are not allowed' },
  { pattern: /\bINTO\b/i, reason: 'SELECT INTO is not allowed' },
  { pattern: /\bINFORMATION_SCHEMA\b/i, reason: 'System schema access is not allowed' },
  { pattern: /\bpg_\w+/i, reason: 'PostgreSQL system objects are not allowed' },
  { pattern: /\bsqlite_\w+/i, reason: 'SQLite system objects are not allowed' },
  { pattern: /\b(?:performance_schema|mysql\s*\.)/i, reason: 'MySQL system schemas are not allowed' },
];

const KEYWORD_MATCHERS = FORBIDDEN_KEYWORDS.map(
  (keyword) => [keyword, new RegExp(`\\b${keyword}\\b`, 'i')] as const
);

const LIMIT_CLAUSE = /\bLIMIT\s+\d+|\bFETCH\s+(?:FIRST|NEXT)\s+\d+/i;

/**
 * A statement that passed every check. Instances are frozen and can only be
 * created by `validate`.
 */
class ValidatedStatement {
  constructor(
    readonly sql: string,
    readonly tables: readonly string[]
  ) {
    Object.freeze(this);
  }

  toString(): string {
    return this.sql;
  }
}

export type { ValidatedStatement };

export type ValidationResult =
  | { ok: true; statement: ValidatedStatement }
  | { ok: false; reason: string };

/**
 * Validate and sanitize a candidate SQL statement.
 *
 * Pure: the same input always yields the same result.
 */
export function validate(
  rawSql: string,
  allowedTables: AllowedTableSet,
  maxLimit: number
): ValidationResult {
  if (!Number.isInteger(maxLimit) || maxLimit <= 0) {
    throw new RangeError(`maxLimit must be a positive integer, got ${maxLimit}`);
  }

  const sql = rawSql.trim();

  const semicolons = sql.split(';').length - 1;
  if (semicolons > 1) {
    return reject('Only single SQL statements are allowed');
  }

  if (!/^SELECT\b/i.test(sql)) {
    const leading = /^[A-Za-z_]+/.exec(sql);
    const got = leading ? leading[0].toUpperCase() : 'an unrecognized statement';
    return reject(
      `Only SELECT statements are allowed (got ${got}). ` +
        'This system is read-only and cannot modify data. ' +
        'Try rephrasing your question to retrieve data instead of changing it.'
    );
  }

  for (const [keyword, matcher] of KEYWORD_MATCHERS) {
    if (matcher.test(sql)) {
      return reject(
        `Forbidden keyword detected: ${keyword}. ` +
          'This system is read-only and only supports SELECT queries. ' +
          'Please rephrase your question to retrieve information instead of modifying data.'
      );
    }
  }

  for (const { pattern, reason } of FORBIDDEN_PATTERNS) {
    if (pattern.test(sql)) {
      return reject(`Unsafe SQL pattern: ${reason}`);
    }
  }

  const { tables, complete } = scanTableReferences(sql);
  if (!complete) {
    return reject(
      'Could not determine which tables this query reads. ' +
        'Name tables directly in FROM and JOIN clauses, without escapes or comments.'
    );
  }

  if (allowedTables.kind === 'tables') {
    const allowed = new Set([...allowedTables.tables].map((t) => t.toLowerCase()));
    for (const table of tables) {
      if (!allowed.has(table)) {
        return reject(
          `Access to table '${table}' is not permitted. ` +
            `Available tables: ${describeAllowed(allowed)}. ` +
            'Please use one of the available tables in your question.'
        );
      }
    }
  }

  const bounded = LIMIT_CLAUSE.test(sql) ? sql : `${sql} LIMIT ${maxLimit}`;

  return { ok: true, statement: new ValidatedStatement(bounded, tables) };
}

/**
 * Like `validate`, but raises ValidationRejected on failure.
 */
export function validateOrThrow(
  rawSql: string,
  allowedTables: AllowedTableSet,
  maxLimit: number
): ValidatedStatement {
  const result = validate(rawSql, allowedTables, maxLimit);
  if (!result.ok) {
    throw new ValidationRejected(result.reason);
  }
  return result.statement;
}

function reject(reason: string): ValidationResult {
  return { ok: false, reason };
}

function describeAllowed(tables: ReadonlySet<string>): string {
  return tables.size > 0 ? [...tables].sort().join(', ') : '(none)';
}
