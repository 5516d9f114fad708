/**
 * Shared value types.
 */

/**
 * A database row keyed by column name. Values come straight from the
 * driver (numbers, strings, Dates, Buffers, null).
 */
export type Row = Record<string, unknown>;

/**
 * Milliseconds-since-epoch clock, injectable for tests.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Narrow an unknown value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
