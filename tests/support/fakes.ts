/**
 * In-process stand-ins for the pipeline's collaborators.
 */

import { jest } from '@jest/globals';
import { AuditRecorder } from '../../src/services/audit.js';
import { MemoryResultCache } from '../../src/services/cache/index.js';
import type { Services } from '../../src/container.js';
import type { SessionCapabilities } from '../../src/services/database.js';
import type { StatementExecutor } from '../../src/services/executor.js';
import { RuleBasedSqlGenerator } from '../../src/services/fallback-sql.js';
import type { ExplanationRequest, Explainer, GenerationRequest, SqlGenerator } from '../../src/services/llm.js';
import { QueryPipeline } from '../../src/services/pipeline.js';
import { RbacResolver } from '../../src/services/rbac.js';
import { SavedQueryStore } from '../../src/services/saved-queries.js';
import { SchemaCache, type SchemaSource } from '../../src/services/schema-cache.js';
import type { ValidatedStatement } from '../../src/services/validator.js';
import type { QueryRows, RolePolicy, SchemaMap } from '../../src/types/models.js';

export const WAREHOUSE: SchemaMap = {
  sales: ['id', 'region', 'amount'],
  users: ['id', 'name'],
  secrets: ['token'],
};

export class FakeSchemaSource implements SchemaSource {
  failWith: Error | null = null;

  constructor(private readonly schema: SchemaMap = WAREHOUSE) {}

  async introspect(): Promise<SchemaMap> {
    if (this.failWith) throw this.failWith;
    return this.schema;
  }
}

export class FakeExecutor implements StatementExecutor {
  executed: string[] = [];
  failWith: Error | null = null;
  pingError: Error | null = null;

  constructor(private readonly result: QueryRows = { columns: ['region'], rows: [{ region: 'North' }, { region: 'South' }] }) {}

  async execute(statement: ValidatedStatement): Promise<QueryRows> {
    this.executed.push(statement.sql);
    if (this.failWith) throw this.failWith;
    return this.result;
  }

  async ping(): Promise<void> {
    if (this.pingError) throw this.pingError;
  }

  capabilities(): SessionCapabilities | null {
    return { readOnly: true, statementTimeout: true };
  }
}

export class FakeGenerator implements SqlGenerator {
  readonly name = 'fake';
  readonly generate = jest.fn(async (_request: GenerationRequest): Promise<string> => {
    if (this.failWith) throw this.failWith;
    return this.sql;
  });
  failWith: Error | null = null;

  constructor(public sql: string = 'SELECT region FROM sales') {}
}

export class FakeExplainer implements Explainer {
  failWith: Error | null = null;

  async explain({ rows }: ExplanationRequest): Promise<string> {
    if (this.failWith) throw this.failWith;
    return `There are ${rows.length} regions.`;
  }
}

export interface Harness {
  source: FakeSchemaSource;
  executor: FakeExecutor;
  generator: FakeGenerator;
  explainer: FakeExplainer;
  resultCache: MemoryResultCache;
  audit: AuditRecorder;
  rbac: RbacResolver;
  schemaCache: SchemaCache;
  pipeline: QueryPipeline;
  services: Services;
}

export interface HarnessOptions {
  policy?: RolePolicy;
  resultCache?: MemoryResultCache;
  useGenerator?: boolean;
  maxQuestionLength?: number;
  production?: boolean;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const source = new FakeSchemaSource();
  const executor = new FakeExecutor();
  const generator = new FakeGenerator();
  const explainer = new FakeExplainer();
  const resultCache = options.resultCache ?? new MemoryResultCache();
  const audit = new AuditRecorder(100);
  const rbac = new RbacResolver(options.policy);
  const schemaCache = new SchemaCache(60);

  const pipeline = new QueryPipeline({
    rbac,
    schemaCache,
    schemaSource: source,
    resultCache,
    audit,
    executor,
    generator: options.useGenerator === false ? null : generator,
    fallbackGenerator: new RuleBasedSqlGenerator(),
    explainer,
    maxLimit: 100,
    maxQuestionLength: options.maxQuestionLength ?? 500,
  });

  const services: Services = {
    rbac,
    schemaCache,
    schemaSource: source,
    resultCache,
    audit,
    executor,
    pipeline,
    savedQueries: new SavedQueryStore(10),
    maxLimit: 100,
    production: options.production ?? false,
    close: async () => undefined,
  };

  return { source, executor, generator, explainer, resultCache, audit, rbac, schemaCache, pipeline, services };
}
