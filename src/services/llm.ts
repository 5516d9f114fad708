/**
 * LLM integration layer using Vercel AI SDK.
 * Supports Anthropic and OpenAI as SQL generators and result explainers.
 *
 * The model is an untrusted collaborator: nothing it returns reaches the
 * database without passing the validator.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import type { LLMConfig } from '../config.js';
import { UpstreamGenerationFailed, errorMessage } from '../types/errors.js';
import type { SchemaMap } from '../types/models.js';
import type { Row } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export interface GenerationRequest {
  question: string;
  /** Role-filtered schema; the only tables the generator learns about. */
  schema: SchemaMap;
}

/**
 * Turns a question into candidate SQL.
 */
export interface SqlGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<string>;
}

export interface ExplanationRequest {
  question: string;
  sql: string;
  columns: string[];
  rows: Row[];
}

/**
 * Describes a result set in plain language.
 */
export interface Explainer {
  explain(request: ExplanationRequest): Promise<string>;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxOutputTokens?: number;
}

/**
 * One text completion round trip. Rejects with UpstreamGenerationFailed.
 */
export type TextCompletion = (request: CompletionRequest) => Promise<string>;

/**
 * Initialize the language model for the configured provider.
 */
function createModel(llm: LLMConfig): LanguageModel {
  switch (llm.provider) {
    case 'anthropic':
      return createAnthropic({ apiKey: llm.apiKey })(llm.model);
    case 'openai':
      return createOpenAI({ apiKey: llm.apiKey })(llm.model);
    default:
      throw new Error(`Unsupported LLM provider: ${String(llm.provider)}`);
  }
}

export interface ModelCallOptions {
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  abortSignal: AbortSignal;
}

export interface ModelCallResult {
  text: string;
  usage: { inputTokens?: number; outputTokens?: number };
}

/**
 * A single model request, without retries.
 */
export type ModelCall = (options: ModelCallOptions) => Promise<ModelCallResult>;

function aiSdkCall(llm: LLMConfig): ModelCall {
  logger.info(`Initializing LLM: ${llm.provider}/${llm.model}`);
  const model = createModel(llm);
  return (options) => generateText({ model, ...options, maxRetries: 0 });
}

/**
 * Build a completion function with the configured temperature, token bound,
 * per-attempt timeout and retry policy. Backoff doubles after each failure.
 */
export function createCompletion(llm: LLMConfig, call: ModelCall = aiSdkCall(llm)): TextCompletion {
  const attempts = llm.maxRetries + 1;

  return async ({ system, prompt, maxOutputTokens }) => {
    let lastError: unknown;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const result = await call({
          system,
          prompt,
          temperature: llm.temperature,
          maxOutputTokens: maxOutputTokens ?? llm.maxOutputTokens,
          abortSignal: AbortSignal.timeout(llm.timeoutMs),
        });

        logger.info(
          `LLM API call successful - ` +
            `Input: ${result.usage.inputTokens}, ` +
            `Output: ${result.usage.outputTokens}`
        );
        return result.text;
      } catch (error) {
        lastError = error;
        logger.warn(`LLM API call failed (attempt ${attempt + 1}/${attempts}): ${error}`);

        if (attempt < attempts - 1) {
          const waitMs = llm.retryDelayMs * Math.pow(2, attempt);
          await new Promise((resolve) => setTimeout(resolve, waitMs));
        }
      }
    }

    throw new UpstreamGenerationFailed(
      `LLM generation failed after ${attempts} attempt(s): ${errorMessage(lastError)}`
    );
  };
}

const SQL_SYSTEM_PROMPT = `You are a senior data analyst.
Convert the user question into a SINGLE safe SQL SELECT query.

Rules:
- ONLY SELECT statements
- NO comments
- NO markdown
- Use ONLY provided schema
- Return ONLY raw SQL`;

const EXPLAIN_SYSTEM_PROMPT = `You are a helpful data analyst. Provide a concise, plain-English explanation of the results.
Keep it under 150 words. Be specific about numbers and trends.`;

/**
 * Render a schema as `table(col, ...)` lines, tables sorted by name.
 */
export function formatSchemaForPrompt(schema: SchemaMap): string {
  return Object.keys(schema)
    .sort()
    .map((table) => `${table}(${schema[table].join(', ')})`)
    .join('\n');
}

/**
 * Strip markdown code fences, a leading `SQL:` label and a trailing semicolon.
 */
export function normalizeSql(output: string): string {
  let sql = output.trim();

  if (sql.startsWith('```')) {
    sql = sql.replace(/^```[a-zA-Z0-9]*\s*/, '').replace(/\s*```\s*$/, '');
  }

  sql = sql.replace(/^SQL\s*:\s*/i, '').trim();

  if (sql.endsWith(';')) {
    sql = sql.slice(0, -1).trim();
  }
  return sql;
}

export class LlmSqlGenerator implements SqlGenerator {
  readonly name = 'llm';

  constructor(private readonly complete: TextCompletion) {}

  async generate({ question, schema }: GenerationRequest): Promise<string> {
    const prompt = `Schema:\n${formatSchemaForPrompt(schema)}\n\nQuestion:\n${question}`;

    let raw: string;
    try {
      raw = await this.complete({ system: SQL_SYSTEM_PROMPT, prompt });
    } catch (error) {
      if (error instanceof UpstreamGenerationFailed) throw error;
      throw new UpstreamGenerationFailed(`LLM generation failed: ${errorMessage(error)}`);
    }

    const sql = normalizeSql(raw);
    if (!sql) {
      throw new UpstreamGenerationFailed('LLM returned an empty response');
    }
    logger.debug(`Generated SQL: ${sql}`);
    return sql;
  }
}

export class LlmExplainer implements Explainer {
  constructor(private readonly complete: TextCompletion) {}

  async explain({ question, sql, rows }: ExplanationRequest): Promise<string> {
    const sample = JSON.stringify(rows.slice(0, 5), (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    );
    const prompt =
      `User question:\n${question}\n\n` +
      `SQL executed:\n${sql}\n\n` +
      `Sample of result rows:\n${sample}\n\n` +
      'Explanation:';

    const text = await this.complete({ system: EXPLAIN_SYSTEM_PROMPT, prompt, maxOutputTokens: 500 });
    return text.trim();
  }
}
