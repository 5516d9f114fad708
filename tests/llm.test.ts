/**
 * LLM Generator Unit Tests
 *
 * The completion function is faked; no network calls are made.
 */

import { describe, it, expect, jest } from '@jest/globals';
import type { LLMConfig } from '../src/config.js';
import {
  createCompletion,
  formatSchemaForPrompt,
  LlmExplainer,
  LlmSqlGenerator,
  normalizeSql,
  type CompletionRequest,
  type ModelCall,
  type TextCompletion,
} from '../src/services/llm.js';
import { UpstreamGenerationFailed } from '../src/types/errors.js';

function completion(response: string | Error) {
  return jest.fn(async (_request: CompletionRequest): Promise<string> => {
    if (response instanceof Error) throw response;
    return response;
  });
}

describe('normalizeSql', () => {
  it('should strip code fences and the trailing semicolon', () => {
    expect(normalizeSql('```sql\nSELECT * FROM sales;\n```')).toBe('SELECT * FROM sales');
  });

  it('should strip an SQL: label', () => {
    expect(normalizeSql('SQL: SELECT 1;')).toBe('SELECT 1');
  });

  it('should leave clean SQL alone', () => {
    expect(normalizeSql('  SELECT id FROM users  ')).toBe('SELECT id FROM users');
  });
});

describe('formatSchemaForPrompt', () => {
  it('should render one sorted line per table', () => {
    expect(formatSchemaForPrompt({ users: ['id', 'name'], sales: ['id'] })).toBe('sales(id)\nusers(id, name)');
  });
});

describe('LlmSqlGenerator', () => {
  it('should prompt with the schema and normalize the answer', async () => {
    const complete = completion('```sql\nSELECT region FROM sales;\n```');
    const generator = new LlmSqlGenerator(complete);

    const sql = await generator.generate({ question: 'regions?', schema: { sales: ['region'] } });

    expect(sql).toBe('SELECT region FROM sales');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0].prompt).toBe('Schema:\nsales(region)\n\nQuestion:\nregions?');
  });

  it('should wrap completion failures', async () => {
    const generator = new LlmSqlGenerator(completion(new Error('quota')));

    await expect(generator.generate({ question: 'q', schema: {} })).rejects.toThrow(
      new UpstreamGenerationFailed('LLM generation failed: quota')
    );
  });

  it('should reject an empty answer', async () => {
    const generator = new LlmSqlGenerator(completion('```\n```'));

    await expect(generator.generate({ question: 'q', schema: {} })).rejects.toThrow(
      'LLM returned an empty response'
    );
  });
});

describe('LlmExplainer', () => {
  it('should send sample rows and trim the answer', async () => {
    const complete: TextCompletion = completion('  Sales are up.  ');
    const explainer = new LlmExplainer(complete);

    const text = await explainer.explain({
      question: 'how are sales?',
      sql: 'SELECT amount FROM sales LIMIT 10',
      columns: ['amount'],
      rows: [{ amount: 10n }],
    });

    expect(text).toBe('Sales are up.');
  });
});

describe('createCompletion', () => {
  const llm: LLMConfig = {
    provider: 'anthropic',
    model: 'test-model',
    apiKey: 'test-secret',
    timeoutMs: 1000,
    temperature: 0.2,
    maxOutputTokens: 256,
    maxRetries: 2,
    retryDelayMs: 1,
  };

  it('should retry a failed call and return the text', async () => {
    const call = jest.fn<ModelCall>();
    call
      .mockRejectedValueOnce(new Error('overloaded'))
      .mockResolvedValueOnce({ text: 'SELECT 1', usage: { inputTokens: 10, outputTokens: 2 } });

    const complete = createCompletion(llm, call);

    await expect(complete({ system: 'sys', prompt: 'q' })).resolves.toBe('SELECT 1');
    expect(call).toHaveBeenCalledTimes(2);
    expect(call.mock.calls[1][0]).toMatchObject({
      system: 'sys',
      prompt: 'q',
      temperature: 0.2,
      maxOutputTokens: 256,
    });
  });

  it('should give up after the configured retries', async () => {
    const call = jest.fn<ModelCall>();
    call.mockRejectedValue(new Error('still down'));

    const complete = createCompletion(llm, call);

    await expect(complete({ system: 'sys', prompt: 'q' })).rejects.toThrow(
      new UpstreamGenerationFailed('LLM generation failed after 3 attempt(s): still down')
    );
    expect(call).toHaveBeenCalledTimes(3);
  });

  it('should make a single attempt without retries and honor the token override', async () => {
    const call = jest.fn<ModelCall>();
    call.mockRejectedValue(new Error('timeout'));

    const complete = createCompletion({ ...llm, maxRetries: 0 }, call);

    await expect(complete({ system: 'sys', prompt: 'q', maxOutputTokens: 50 })).rejects.toThrow(
      'LLM generation failed after 1 attempt(s): timeout'
    );
    expect(call).toHaveBeenCalledTimes(1);
    expect(call.mock.calls[0][0].maxOutputTokens).toBe(50);
  });
});
