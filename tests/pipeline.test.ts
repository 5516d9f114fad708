/**
 * Query Pipeline Unit Tests
 *
 * Every collaborator is faked. Each failure path must leave an audit record.
 */

import { describe, it, expect } from '@jest/globals';
import { MemoryResultCache } from '../src/services/cache/index.js';
import {
  AuthorizationDenied,
  ExecutionFailed,
  UpstreamGenerationFailed,
  ValidationRejected,
} from '../src/types/errors.js';
import type { Principal } from '../src/types/models.js';
import { createHarness } from './support/fakes.js';

const ALICE: Principal = { id: 'u1', displayName: 'alice', role: 'analyst' };

describe('QueryPipeline', () => {
  describe('successful runs', () => {
    it('should generate, validate, execute and explain', async () => {
      const { pipeline, executor, audit } = createHarness();

      const result = await pipeline.run({ principal: ALICE, question: '  which regions?  ' });

      expect(result).toMatchObject({
        question: 'which regions?',
        sql: 'SELECT region FROM sales LIMIT 100',
        columns: ['region'],
        rows: [{ region: 'North' }, { region: 'South' }],
        explanation: 'There are 2 regions.',
        cached: false,
        degraded: false,
      });
      expect(result.warning).toBeUndefined();
      expect(executor.executed).toEqual(['SELECT region FROM sales LIMIT 100']);

      const [record] = audit.recentLogs();
      expect(record).toMatchObject({
        userId: 'u1',
        question: 'which regions?',
        generatedSql: 'SELECT region FROM sales LIMIT 100',
        status: 'success',
        rowsReturned: 2,
        error: null,
        cached: false,
      });
    });

    it('should only show the generator the role-filtered schema', async () => {
      const { pipeline, generator } = createHarness();

      await pipeline.run({ principal: ALICE, question: 'which regions?' });

      expect(generator.generate.mock.calls[0][0].schema).toEqual({
        sales: ['id', 'region', 'amount'],
        users: ['id', 'name'],
      });
    });

    it('should serve a repeated question from the cache', async () => {
      const { pipeline, executor, generator, audit } = createHarness();

      await pipeline.run({ principal: ALICE, question: 'which regions?' });
      const second = await pipeline.run({ principal: ALICE, question: 'which regions?' });

      expect(second.cached).toBe(true);
      expect(second.rows).toEqual([{ region: 'North' }, { region: 'South' }]);
      expect(executor.executed).toHaveLength(1);
      expect(generator.generate).toHaveBeenCalledTimes(1);
      expect(audit.recentLogs().map((r) => r.cached)).toEqual([false, true]);
    });

    it('should bypass the cache on request', async () => {
      const { pipeline, executor } = createHarness();

      await pipeline.run({ principal: ALICE, question: 'which regions?' });
      const second = await pipeline.run({ principal: ALICE, question: 'which regions?', useCache: false });

      expect(second.cached).toBe(false);
      expect(executor.executed).toHaveLength(2);
    });

    it('should not serve a cached result the role can no longer see', async () => {
      const resultCache = new MemoryResultCache();
      const before = createHarness({ resultCache });
      await before.pipeline.run({ principal: ALICE, question: 'which regions?' });

      const after = createHarness({ resultCache, policy: { analyst: ['users'] } });
      after.generator.sql = 'SELECT name FROM users';
      const result = await after.pipeline.run({ principal: ALICE, question: 'which regions?' });

      expect(result.cached).toBe(false);
      expect(result.sql).toBe('SELECT name FROM users LIMIT 100');
      expect(after.generator.generate).toHaveBeenCalledTimes(1);
    });
  });

  describe('degraded runs', () => {
    it('should fall back to rule-based SQL when the generator fails', async () => {
      const { pipeline, generator, executor } = createHarness();
      generator.failWith = new UpstreamGenerationFailed('boom');

      const result = await pipeline.run({ principal: ALICE, question: 'show sales' });

      expect(result.degraded).toBe(true);
      expect(result.warning).toBe('AI unavailable (boom). Showing results based on keywords.');
      expect(executor.executed).toEqual(['SELECT * FROM sales LIMIT 100']);
    });

    it('should use rule-based SQL without a generator', async () => {
      const { pipeline, executor } = createHarness({ useGenerator: false });

      const result = await pipeline.run({ principal: ALICE, question: 'top 3 users' });

      expect(result.degraded).toBe(false);
      expect(executor.executed).toEqual(['SELECT * FROM users LIMIT 3']);
    });

    it('should summarize when the explainer fails', async () => {
      const { pipeline, explainer } = createHarness();
      explainer.failWith = new Error('quota');

      const result = await pipeline.run({ principal: ALICE, question: 'which regions?' });

      expect(result.explanation).toBe('Retrieved 2 record(s) with columns: region.');
    });

    it('should still answer when the cache write fails', async () => {
      const { pipeline, resultCache } = createHarness();
      resultCache.put = () => {
        throw new Error('cache full');
      };

      await expect(pipeline.run({ principal: ALICE, question: 'which regions?' })).resolves.toMatchObject({
        cached: false,
      });
    });
  });

  describe('failures', () => {
    it('should reject and audit unsafe SQL without executing it', async () => {
      const { pipeline, generator, executor, audit } = createHarness();
      generator.sql = 'SELECT * FROM secrets';

      await expect(pipeline.run({ principal: ALICE, question: 'show secrets' })).rejects.toThrow(
        ValidationRejected
      );

      expect(executor.executed).toEqual([]);
      const [record] = audit.recentLogs();
      expect(record.status).toBe('error');
      expect(record.generatedSql).toBe('SELECT * FROM secrets');
      expect(record.error).toMatch(/^Access to table 'secrets' is not permitted/);
    });

    it('should audit execution failures with the executed SQL', async () => {
      const { pipeline, executor, audit } = createHarness();
      executor.failWith = new ExecutionFailed('disk I/O error');

      await expect(pipeline.run({ principal: ALICE, question: 'which regions?' })).rejects.toThrow(
        'Query execution failed: disk I/O error'
      );

      const [record] = audit.recentLogs();
      expect(record).toMatchObject({
        status: 'error',
        generatedSql: 'SELECT region FROM sales LIMIT 100',
        rowsReturned: 0,
        error: 'Query execution failed: disk I/O error',
      });
    });

    it('should turn schema failures into ExecutionFailed', async () => {
      const { pipeline, source, audit } = createHarness();
      source.failWith = new Error('db down');

      await expect(pipeline.run({ principal: ALICE, question: 'which regions?' })).rejects.toThrow(
        'Query execution failed: Schema introspection failed: db down'
      );
      expect(audit.recentLogs()[0].generatedSql).toBe('');
    });

    it('should deny a principal with no visible tables', async () => {
      const { pipeline, audit } = createHarness({ policy: { analyst: ['sales'] } });
      const guest: Principal = { id: 'u9', displayName: 'guest', role: 'readonly' };

      await expect(pipeline.run({ principal: guest, question: 'anything' })).rejects.toThrow(
        new AuthorizationDenied('No accessible tables for this user')
      );
      expect(audit.recentLogs()[0]).toMatchObject({ userId: 'u9', status: 'error' });
    });

    it('should reject empty and overlong questions', async () => {
      const { pipeline, audit } = createHarness({ maxQuestionLength: 10 });

      await expect(pipeline.run({ principal: ALICE, question: '   ' })).rejects.toThrow('Question is required');
      await expect(pipeline.run({ principal: ALICE, question: 'a'.repeat(11) })).rejects.toThrow(
        'Question is too long (11 characters, maximum 10)'
      );
      expect(audit.size).toBe(2);
    });
  });
});
