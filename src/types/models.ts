/**
 * Type definitions and Zod schemas for the gateway's data model.
 */

import { z } from 'zod';
import type { Row } from './utils.js';

// ============================================================================
// PRINCIPALS AND ACCESS
// ============================================================================

export const ROLES = ['analyst', 'admin', 'readonly'] as const;

export const RoleSchema = z.enum(ROLES);

export type Role = z.infer<typeof RoleSchema>;

/**
 * The identified actor behind a request. Derived per request, never stored.
 */
export interface Principal {
	readonly id: string;
	readonly displayName: string;
	readonly role: Role;
}

/**
 * Tables a principal may touch: either everything, or an explicit set of
 * lowercase table names.
 */
export type AllowedTableSet =
	| { readonly kind: 'all' }
	| { readonly kind: 'tables'; readonly tables: ReadonlySet<string> };

/**
 * Role → table policy. `"*"` grants every table.
 */
export const RolePolicySchema = z.record(RoleSchema, z.array(z.string().min(1)));

export type RolePolicy = Partial<Record<Role, readonly string[]>>;

// ============================================================================
// SCHEMA
// ============================================================================

/**
 * Table name → ordered column names.
 */
export type SchemaMap = Readonly<Record<string, readonly string[]>>;

// ============================================================================
// RESULT CACHE
// ============================================================================

/**
 * Materialized statement output.
 */
export interface QueryRows {
	columns: string[];
	rows: Row[];
}

/**
 * What the pipeline hands to the result cache.
 */
export interface CacheValue extends QueryRows {
	explanation: string;
	sql: string;
	/** Tables the statement referenced; re-authorized on every hit. */
	tables: readonly string[];
}

export interface CacheEntry extends CacheValue {
	createdAt: Date;
	hitCount: number;
}

export interface ResultCacheStats {
	entries: number;
	maxEntries: number;
	hits: number;
	misses: number;
	ttlSeconds: number;
}

// ============================================================================
// AUDIT
// ============================================================================

export type AuditStatus = 'success' | 'error';

export interface AuditRecord {
	readonly userId: string;
	readonly question: string;
	readonly generatedSql: string;
	readonly status: AuditStatus;
	readonly latencyMs: number;
	readonly rowsReturned: number;
	readonly error: string | null;
	readonly cached: boolean;
	readonly timestamp: Date;
}

/**
 * Record as supplied by callers; the recorder stamps missing fields.
 */
export type AuditInput = Omit<AuditRecord, 'timestamp' | 'cached'> & {
	timestamp?: Date;
	cached?: boolean;
};

export interface TableCount {
	table: string;
	count: number;
}

export interface UserCount {
	userId: string;
	count: number;
}

export interface SlowQuery {
	userId: string;
	question: string;
	latencyMs: number;
	timestamp: string;
}

export interface DashboardStats {
	windowHours: number;
	totalQueries: number;
	avgLatencyMs: number;
	errorRatePercent: number;
	topTables: TableCount[];
	topUsers: UserCount[];
	slowestQueries: SlowQuery[];
	hourlyTrend: Record<string, number>;
}

// ============================================================================
// REQUESTS AND RESPONSES
// ============================================================================

/**
 * Principal headers as they arrive on a request.
 */
export const PrincipalHeadersSchema = z.object({
	'x-user-id': z.string().min(1).default('user_1'),
	'x-username': z.string().min(1).default('analyst'),
	'x-role': RoleSchema.default('analyst'),
});

export const QueryRequestSchema = z.object({
	question: z.string().trim().min(1).describe('Natural language question'),
	use_cache: z.boolean().default(true).describe('Whether to consult the result cache'),
});
export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const ValidateRequestSchema = z.object({
	sql: z.string().min(1).describe('Candidate SQL statement'),
});
export type ValidateRequest = z.infer<typeof ValidateRequestSchema>;

export const SaveQueryRequestSchema = z.object({
	name: z.string().trim().min(1),
	question: z.string().trim().min(1),
	generated_sql: z.string().trim().min(1),
});
export type SaveQueryRequest = z.infer<typeof SaveQueryRequestSchema>;

/**
 * Outcome of one pipeline run.
 */
export interface QueryResult extends QueryRows {
	question: string;
	sql: string;
	explanation: string;
	latencyMs: number;
	cached: boolean;
	/** True when the rule-based generator stood in for the LLM. */
	degraded: boolean;
	warning?: string;
}

// ============================================================================
// SAVED QUERIES
// ============================================================================

export interface SavedQuery {
	id: string;
	userId: string;
	name: string;
	question: string;
	generatedSql: string;
	createdAt: Date;
	runCount: number;
}
