/**
 * Rule-based SQL generation and result summaries.
 * Used when no model is configured or the model call fails.
 */

import { UpstreamGenerationFailed } from '../types/errors.js';
import type { SchemaMap } from '../types/models.js';
import type { ExplanationRequest, Explainer, GenerationRequest, SqlGenerator } from './llm.js';

const COUNT_PHRASE = /\b(?:count|how many|total number)\b/;
const AGGREGATE_PHRASE = /\b(sum|total|average|avg)\b/;
const LIMIT_PHRASE = /\b(?:top|limit)\s+(\d+)/;
const QUOTED_VALUE = /(['"])(.*?)\1/;

const DEFAULT_LIMIT = 100;
const COLUMN_SELECTION_LIMIT = 1000;
const TOP_LIMIT = 10;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a single SELECT from keywords in the question.
 */
export function buildFallbackSql(question: string, schema: SchemaMap): string {
  const q = question.toLowerCase().trim();
  const tables = Object.keys(schema);
  if (tables.length === 0) {
    throw new UpstreamGenerationFailed('No tables available for rule-based generation');
  }

  const table = tables.find((t) => q.includes(t.toLowerCase())) ?? tables[0];
  const columns = schema[table];
  const mentioned = columns.find((column) => q.includes(column.toLowerCase()));

  if (COUNT_PHRASE.test(q)) {
    return `SELECT COUNT(*) FROM ${table}`;
  }

  const aggregate = AGGREGATE_PHRASE.exec(q);
  if (aggregate && mentioned) {
    const fn = aggregate[1] === 'average' || aggregate[1] === 'avg' ? 'AVG' : 'SUM';
    return `SELECT ${fn}(${mentioned}) FROM ${table}`;
  }

  // Longest names first so 'user_id' wins over 'id'
  const selected = [...columns]
    .sort((a, b) => b.length - a.length)
    .filter((column) => new RegExp(`\\b${escapeRegExp(column.toLowerCase())}\\b`).test(q));

  let limit = DEFAULT_LIMIT;
  const limitMatch = LIMIT_PHRASE.exec(q);
  if (limitMatch) {
    limit = Number(limitMatch[1]);
  } else if (/\btop\b/.test(q)) {
    limit = TOP_LIMIT;
  }

  let where = '';
  const quoted = QUOTED_VALUE.exec(question);
  if (quoted && mentioned) {
    where = ` WHERE ${mentioned} = '${quoted[2].replace(/'/g, "''")}'`;
  }

  if (selected.length > 0 && limit === DEFAULT_LIMIT) {
    limit = COLUMN_SELECTION_LIMIT;
  }

  const projection = selected.length > 0 ? selected.join(', ') : '*';
  return `SELECT ${projection} FROM ${table}${where} LIMIT ${limit}`;
}

export class RuleBasedSqlGenerator implements SqlGenerator {
  readonly name = 'rules';

  async generate({ question, schema }: GenerationRequest): Promise<string> {
    return buildFallbackSql(question, schema);
  }
}

/**
 * "Retrieved N record(s) with columns: a, b, c..."
 */
export function summarizeResult(columns: string[], rowCount: number): string {
  const shown = columns.slice(0, 3).join(', ');
  const tail = columns.length > 3 ? '...' : '.';
  return `Retrieved ${rowCount} record(s) with columns: ${shown}${tail}`;
}

export class SummaryExplainer implements Explainer {
  async explain({ columns, rows }: ExplanationRequest): Promise<string> {
    return summarizeResult(columns, rows.length);
  }
}
