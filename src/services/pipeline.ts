/**
 * Query orchestration: question in, validated and executed result out.
 *
 * Flow: RBAC → schema → cache → generate → validate → execute → explain →
 * audit → cache. Every terminal failure is audited before it propagates.
 */

import {
  AuthorizationDenied,
  ExecutionFailed,
  ValidationRejected,
  errorMessage,
} from '../types/errors.js';
import type { Principal, QueryResult, SchemaMap } from '../types/models.js';
import { systemClock, type Clock, type Row } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import type { AuditRecorder } from './audit.js';
import type { ResultCacheProvider } from './cache/index.js';
import type { StatementExecutor } from './executor.js';
import { summarizeResult } from './fallback-sql.js';
import type { Explainer, SqlGenerator } from './llm.js';
import type { RbacResolver } from './rbac.js';
import type { SchemaCache, SchemaSource } from './schema-cache.js';
import { validateOrThrow } from './validator.js';

export interface QueryPipelineDeps {
  rbac: RbacResolver;
  schemaCache: SchemaCache;
  schemaSource: SchemaSource;
  resultCache: ResultCacheProvider;
  audit: AuditRecorder;
  executor: StatementExecutor;
  /** Primary generator; null runs the fallback generator only. */
  generator: SqlGenerator | null;
  fallbackGenerator: SqlGenerator;
  /** Its failures fall back to the row/column summary. */
  explainer: Explainer;
  maxLimit: number;
  maxQuestionLength: number;
  clock?: Clock;
}

export interface QueryRunRequest {
  principal: Principal;
  question: string;
  useCache?: boolean;
}

interface Generation {
  sql: string;
  degraded: boolean;
  warning?: string;
}

export class QueryPipeline {
  private readonly clock: Clock;

  constructor(private readonly deps: QueryPipelineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * The principal's role-filtered schema.
   */
  async visibleSchema(principal: Principal): Promise<SchemaMap> {
    const { rbac, schemaCache, schemaSource } = this.deps;
    let schema: SchemaMap;
    try {
      schema = await schemaCache.get(schemaSource);
    } catch (error) {
      throw new ExecutionFailed(`Schema introspection failed: ${errorMessage(error)}`);
    }
    return rbac.filterSchema(schema, rbac.resolve(principal));
  }

  async run({ principal, question: rawQuestion, useCache = true }: QueryRunRequest): Promise<QueryResult> {
    const { rbac, resultCache, audit, executor, maxLimit, maxQuestionLength } = this.deps;
    const started = this.clock();
    const question = rawQuestion.trim();
    let sql = '';

    try {
      if (!question) {
        throw new ValidationRejected('Question is required');
      }
      if (question.length > maxQuestionLength) {
        throw new ValidationRejected(
          `Question is too long (${question.length} characters, maximum ${maxQuestionLength})`
        );
      }

      const allowed = rbac.resolve(principal);
      const schema = await this.visibleSchema(principal);
      if (Object.keys(schema).length === 0) {
        throw new AuthorizationDenied('No accessible tables for this user');
      }

      if (useCache) {
        const hit = resultCache.get(principal.id, question);
        // A policy change since the entry was stored must not leak rows
        if (hit && rbac.authorize(principal, hit.tables).ok) {
          const latencyMs = this.elapsed(started);
          audit.record({
            userId: principal.id,
            question,
            generatedSql: hit.sql,
            status: 'success',
            latencyMs,
            rowsReturned: hit.rows.length,
            error: null,
            cached: true,
          });
          logger.info(`Result cache hit for user ${principal.id}`);
          return {
            question,
            sql: hit.sql,
            columns: hit.columns,
            rows: hit.rows,
            explanation: hit.explanation,
            latencyMs,
            cached: true,
            degraded: false,
          };
        }
      }

      const generation = await this.generate(question, schema);
      sql = generation.sql;

      const statement = validateOrThrow(sql, allowed, maxLimit);
      sql = statement.sql;

      const { columns, rows } = await executor.execute(statement);
      const explanation = await this.explain(question, sql, columns, rows);
      const latencyMs = this.elapsed(started);

      audit.record({
        userId: principal.id,
        question,
        generatedSql: sql,
        status: 'success',
        latencyMs,
        rowsReturned: rows.length,
        error: null,
      });

      try {
        resultCache.put(principal.id, question, {
          columns,
          rows,
          explanation,
          sql,
          tables: statement.tables,
        });
      } catch (error) {
        logger.warn(`Result cache write failed: ${error}`);
      }

      return {
        question,
        sql,
        columns,
        rows,
        explanation,
        latencyMs,
        cached: false,
        degraded: generation.degraded,
        ...(generation.warning ? { warning: generation.warning } : {}),
      };
    } catch (error) {
      audit.record({
        userId: principal.id,
        question,
        generatedSql: sql,
        status: 'error',
        latencyMs: this.elapsed(started),
        rowsReturned: 0,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  private async generate(question: string, schema: SchemaMap): Promise<Generation> {
    const { generator, fallbackGenerator } = this.deps;

    if (!generator) {
      return { sql: await fallbackGenerator.generate({ question, schema }), degraded: false };
    }

    try {
      return { sql: await generator.generate({ question, schema }), degraded: false };
    } catch (error) {
      logger.warn(`SQL generation via ${generator.name} failed, using ${fallbackGenerator.name}: ${error}`);
      const sql = await fallbackGenerator.generate({ question, schema });
      return {
        sql,
        degraded: true,
        warning: `AI unavailable (${errorMessage(error).slice(0, 50)}). Showing results based on keywords.`,
      };
    }
  }

  private async explain(question: string, sql: string, columns: string[], rows: Row[]): Promise<string> {
    try {
      return await this.deps.explainer.explain({ question, sql, columns, rows });
    } catch (error) {
      logger.warn(`Explanation generation failed, using summary: ${error}`);
      return summarizeResult(columns, rows.length);
    }
  }

  private elapsed(started: number): number {
    return Math.round((this.clock() - started) * 100) / 100;
  }
}
