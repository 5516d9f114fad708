/**
 * Configuration Parsing Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ConfigError, parseConfig } from '../src/config.js';

describe('parseConfig', () => {
  it('should default to a read-only SQLite file', () => {
    const config = parseConfig({});

    expect(config.DIALECT).toBe('better-sqlite3');
    expect(config.KNEX_CONFIG).toEqual({
      client: 'better-sqlite3',
      connection: { filename: './data/warehouse.db' },
      useNullAsDefault: true,
    });
    expect(config.DB_READONLY).toBe(true);
    expect(config.ENABLE_RBAC).toBe(true);
    expect(config.FALLBACK_ONLY).toBe(false);
    expect(config.MAX_LIMIT).toBe(1000);
    expect(config.STATEMENT_TIMEOUT_MS).toBe(5000);
  });

  it('should coerce numeric and boolean strings', () => {
    const config = parseConfig({ MAX_LIMIT: '250', DB_READONLY: 'false', PORT: '9000' });

    expect(config.MAX_LIMIT).toBe(250);
    expect(config.DB_READONLY).toBe(false);
    expect(config.PORT).toBe(9000);
  });

  it('should pick the API key for the selected provider', () => {
    const config = parseConfig({
      LLM_PROVIDER: 'openai',
      ANTHROPIC_API_KEY: 'test-secret-a',
      OPENAI_API_KEY: 'test-secret-o',
    });

    expect(config.LLM_CONFIG).toEqual({
      provider: 'openai',
      model: 'claude-sonnet-4-5-20250929',
      apiKey: 'test-secret-o',
      timeoutMs: 10000,
      temperature: 0.2,
      maxOutputTokens: 1024,
      maxRetries: 1,
      retryDelayMs: 1000,
    });
    expect(config).not.toHaveProperty('OPENAI_API_KEY');
  });

  it('should build a pooled client for server databases', () => {
    const config = parseConfig({ DATABASE_TYPE: 'pg', DATABASE_URL: 'postgresql://localhost/warehouse' });

    expect(config.DIALECT).toBe('pg');
    expect(config.KNEX_CONFIG).toEqual({
      client: 'pg',
      connection: 'postgresql://localhost/warehouse',
      pool: { min: 2, max: 10 },
    });
  });

  it('should require DATABASE_URL for server databases', () => {
    expect(() => parseConfig({ DATABASE_TYPE: 'mysql2' })).toThrow(
      new ConfigError(['DATABASE_URL: required when DATABASE_TYPE is mysql2'])
    );
  });

  it('should list every invalid variable', () => {
    try {
      parseConfig({ MAX_LIMIT: '-1', DB_READONLY: 'yes' });
      throw new Error('expected parseConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.map((issue) => issue.split(':')[0]).sort()).toEqual(['DB_READONLY', 'MAX_LIMIT']);
      }
    }
  });
});
