/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';

// Load .env file if it exists
const envPath = join(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Boolean flag read from an environment string ("true" / "false").
 */
const flag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true');

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Database Configuration
  DATABASE_TYPE: z.enum(['sqlite3', 'pg', 'mysql2']).default('sqlite3'),
  DATABASE_PATH: z.string().default('./data/warehouse.db'),
  DATABASE_URL: z.string().optional(),
  DB_READONLY: flag(true),
  STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // SQL generation (external collaborator)
  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LLM_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  FALLBACK_ONLY: flag(false),

  // Query constraints
  MAX_LIMIT: z.coerce.number().int().positive().default(1000),
  MAX_QUESTION_LENGTH: z.coerce.number().int().positive().default(500),

  // Caches and audit
  SCHEMA_CACHE_TTL_S: z.coerce.number().int().nonnegative().default(3600),
  RESULT_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
  RESULT_CACHE_TTL_S: z.coerce.number().int().positive().default(3600),
  AUDIT_MAX_RECORDS: z.coerce.number().int().positive().default(10000),
  SAVED_QUERIES_MAX: z.coerce.number().int().positive().default(500),

  // Access control
  ENABLE_RBAC: flag(true),
  RBAC_POLICY_PATH: z.string().optional(),

  // Server Configuration
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type DatabaseDialect = 'better-sqlite3' | 'pg' | 'mysql2';

export interface LLMConfig {
  provider: 'anthropic' | 'openai';
  model: string;
  /** Undefined when no key is configured; generation then runs on the fallback path. */
  apiKey?: string;
  timeoutMs: number;
  temperature: number;
  maxOutputTokens: number;
  /** Extra attempts after the first failure. */
  maxRetries: number;
  /** Backoff before the first retry; doubles for each further one. */
  retryDelayMs: number;
}

/**
 * Extended configuration with parsed KNEX_CONFIG and LLM_CONFIG.
 */
export interface Config extends Omit<BaseConfig,
  'DATABASE_TYPE' | 'DATABASE_PATH' | 'DATABASE_URL' |
  'LLM_PROVIDER' | 'LLM_MODEL' | 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY' |
  'LLM_TIMEOUT_MS' | 'LLM_TEMPERATURE' | 'LLM_MAX_OUTPUT_TOKENS' |
  'LLM_MAX_RETRIES' | 'LLM_RETRY_DELAY_MS'
> {
  DIALECT: DatabaseDialect;
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: LLMConfig;
}

/**
 * Error raised when the environment does not describe a usable configuration.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Parse and validate configuration from an environment map.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const baseConfig = parsed.data;

  // Build Knex config based on database type
  let dialect: DatabaseDialect;
  let knexConfig: Knex.Config;

  switch (baseConfig.DATABASE_TYPE) {
    case 'sqlite3':
      dialect = 'better-sqlite3';
      knexConfig = {
        client: 'better-sqlite3',
        connection: {
          filename: baseConfig.DATABASE_PATH,
        },
        useNullAsDefault: true,
      };
      break;

    case 'pg':
    case 'mysql2':
      if (!baseConfig.DATABASE_URL) {
        throw new ConfigError([
          `DATABASE_URL: required when DATABASE_TYPE is ${baseConfig.DATABASE_TYPE}`,
        ]);
      }
      dialect = baseConfig.DATABASE_TYPE;
      knexConfig = {
        client: baseConfig.DATABASE_TYPE,
        connection: baseConfig.DATABASE_URL,
        pool: { min: 2, max: 10 },
      };
      break;

    default:
      throw new ConfigError([`DATABASE_TYPE: unsupported value ${String(baseConfig.DATABASE_TYPE)}`]);
  }

  const llmConfig: LLMConfig = {
    provider: baseConfig.LLM_PROVIDER,
    model: baseConfig.LLM_MODEL,
    apiKey:
      baseConfig.LLM_PROVIDER === 'anthropic'
        ? baseConfig.ANTHROPIC_API_KEY
        : baseConfig.OPENAI_API_KEY,
    timeoutMs: baseConfig.LLM_TIMEOUT_MS,
    temperature: baseConfig.LLM_TEMPERATURE,
    maxOutputTokens: baseConfig.LLM_MAX_OUTPUT_TOKENS,
    maxRetries: baseConfig.LLM_MAX_RETRIES,
    retryDelayMs: baseConfig.LLM_RETRY_DELAY_MS,
  };

  const {
    DATABASE_TYPE,
    DATABASE_PATH,
    DATABASE_URL,
    LLM_PROVIDER,
    LLM_MODEL,
    ANTHROPIC_API_KEY,
    OPENAI_API_KEY,
    LLM_TIMEOUT_MS,
    LLM_TEMPERATURE,
    LLM_MAX_OUTPUT_TOKENS,
    LLM_MAX_RETRIES,
    LLM_RETRY_DELAY_MS,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    DIALECT: dialect,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: llmConfig,
  };
}

/**
 * Load configuration from process.env, exiting with a readable report on failure.
 */
function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
