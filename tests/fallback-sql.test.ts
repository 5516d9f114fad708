/**
 * Rule-Based SQL Generator Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildFallbackSql,
  RuleBasedSqlGenerator,
  summarizeResult,
  SummaryExplainer,
} from '../src/services/fallback-sql.js';
import { UpstreamGenerationFailed } from '../src/types/errors.js';

const SCHEMA = {
  sales: ['id', 'region', 'amount', 'sale_date'],
  users: ['id', 'name', 'email'],
};

describe('buildFallbackSql', () => {
  it('should count rows of the named table', () => {
    expect(buildFallbackSql('How many users are there?', SCHEMA)).toBe('SELECT COUNT(*) FROM users');
  });

  it('should average a named column', () => {
    expect(buildFallbackSql('average amount of sales', SCHEMA)).toBe('SELECT AVG(amount) FROM sales');
  });

  it('should sum a named column', () => {
    expect(buildFallbackSql('sum of amount in sales', SCHEMA)).toBe('SELECT SUM(amount) FROM sales');
  });

  it('should honor top N', () => {
    expect(buildFallbackSql('top 5 sales', SCHEMA)).toBe('SELECT * FROM sales LIMIT 5');
  });

  it('should default top to 10 rows', () => {
    expect(buildFallbackSql('top sales', SCHEMA)).toBe('SELECT * FROM sales LIMIT 10');
  });

  it('should select named columns with a wider limit', () => {
    expect(buildFallbackSql('show region and amount from sales', SCHEMA)).toBe(
      'SELECT region, amount FROM sales LIMIT 1000'
    );
  });

  it('should filter on a quoted value for a named column', () => {
    expect(buildFallbackSql("sales in region 'North'", SCHEMA)).toBe(
      "SELECT region FROM sales WHERE region = 'North' LIMIT 1000"
    );
  });

  it('should escape quotes in the filter value', () => {
    expect(buildFallbackSql('users with name "O\'Brien"', SCHEMA)).toBe(
      "SELECT name FROM users WHERE name = 'O''Brien' LIMIT 1000"
    );
  });

  it('should fall back to the first table', () => {
    expect(buildFallbackSql('show me everything', SCHEMA)).toBe('SELECT * FROM sales LIMIT 100');
  });

  it('should fail without tables', () => {
    expect(() => buildFallbackSql('anything', {})).toThrow(UpstreamGenerationFailed);
  });

  it('should back the generator interface', async () => {
    const generator = new RuleBasedSqlGenerator();
    await expect(generator.generate({ question: 'top 3 users', schema: SCHEMA })).resolves.toBe(
      'SELECT * FROM users LIMIT 3'
    );
  });
});

describe('summarizeResult', () => {
  it('should list up to three columns', () => {
    expect(summarizeResult(['a', 'b'], 2)).toBe('Retrieved 2 record(s) with columns: a, b.');
  });

  it('should elide further columns', () => {
    expect(summarizeResult(['a', 'b', 'c', 'd'], 7)).toBe('Retrieved 7 record(s) with columns: a, b, c...');
  });

  it('should back the explainer interface', async () => {
    const explainer = new SummaryExplainer();
    await expect(
      explainer.explain({ question: 'q', sql: 'SELECT 1', columns: ['id'], rows: [{ id: 1 }] })
    ).resolves.toBe('Retrieved 1 record(s) with columns: id.');
  });
});
