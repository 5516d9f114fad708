/**
 * Wires the gateway's collaborators from configuration. Every cache and log
 * is an explicit instance owned by the returned container.
 */

import type { Config } from './config.js';
import { AuditRecorder } from './services/audit.js';
import { createResultCache, type ResultCacheProvider } from './services/cache/index.js';
import { createDatabase, KnexSchemaSource, type DatabaseHandle } from './services/database.js';
import { ExecutionEngine, type StatementExecutor } from './services/executor.js';
import { RuleBasedSqlGenerator, SummaryExplainer } from './services/fallback-sql.js';
import { createCompletion, LlmExplainer, LlmSqlGenerator } from './services/llm.js';
import { QueryPipeline } from './services/pipeline.js';
import { DEFAULT_ROLE_POLICY, loadRolePolicy, RbacResolver } from './services/rbac.js';
import { SavedQueryStore } from './services/saved-queries.js';
import { SchemaCache, type SchemaSource } from './services/schema-cache.js';
import { logger } from './utils/logger.js';

export interface Services {
  rbac: RbacResolver;
  schemaCache: SchemaCache;
  schemaSource: SchemaSource;
  resultCache: ResultCacheProvider;
  audit: AuditRecorder;
  executor: StatementExecutor;
  pipeline: QueryPipeline;
  savedQueries: SavedQueryStore;
  maxLimit: number;
  /** Hide execution error detail from clients. */
  production: boolean;
  close(): Promise<void>;
}

export function createServices(config: Config, database?: DatabaseHandle): Services {
  const db =
    database ??
    createDatabase({
      knexConfig: config.KNEX_CONFIG,
      dialect: config.DIALECT,
      readOnly: config.DB_READONLY,
      statementTimeoutMs: config.STATEMENT_TIMEOUT_MS,
    });

  const policy = config.RBAC_POLICY_PATH ? loadRolePolicy(config.RBAC_POLICY_PATH) : DEFAULT_ROLE_POLICY;
  const rbac = new RbacResolver(policy, config.ENABLE_RBAC);
  if (!config.ENABLE_RBAC) {
    logger.warn('RBAC disabled: every principal sees every table');
  }

  const schemaSource = new KnexSchemaSource(db.db);
  const schemaCache = new SchemaCache(config.SCHEMA_CACHE_TTL_S);
  const resultCache = createResultCache({
    maxEntries: config.RESULT_CACHE_MAX_ENTRIES,
    ttlSeconds: config.RESULT_CACHE_TTL_S,
  });
  const audit = new AuditRecorder(config.AUDIT_MAX_RECORDS);
  const executor = new ExecutionEngine(db, config.STATEMENT_TIMEOUT_MS);

  const useLlm = Boolean(config.LLM_CONFIG.apiKey) && !config.FALLBACK_ONLY;
  const completion = useLlm ? createCompletion(config.LLM_CONFIG) : null;
  if (!completion) {
    logger.info('No LLM configured: using rule-based SQL generation');
  }

  const pipeline = new QueryPipeline({
    rbac,
    schemaCache,
    schemaSource,
    resultCache,
    audit,
    executor,
    generator: completion ? new LlmSqlGenerator(completion) : null,
    fallbackGenerator: new RuleBasedSqlGenerator(),
    explainer: completion ? new LlmExplainer(completion) : new SummaryExplainer(),
    maxLimit: config.MAX_LIMIT,
    maxQuestionLength: config.MAX_QUESTION_LENGTH,
  });

  return {
    rbac,
    schemaCache,
    schemaSource,
    resultCache,
    audit,
    executor,
    pipeline,
    savedQueries: new SavedQueryStore(config.SAVED_QUERIES_MAX),
    maxLimit: config.MAX_LIMIT,
    production: process.env.NODE_ENV === 'production',
    close: () => db.close(),
  };
}
