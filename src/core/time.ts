// Fixed-format timestamp codec: YYYY-MM-DDTHH:MM:SS, interpreted as UTC.
// PURITY: CORE
// INVARIANT: formatTimestamp(parseTimestamp(t)) === t for every valid t
// COMPLEXITY: O(1)

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

export const TIMESTAMP_FORMAT = "YYYY-MM-DDTHH:MM:SS";

/** 0000-01-01T00:00:00 */
export const MIN_TIMESTAMP = -62_167_219_200;
/** 9999-12-31T23:59:59 */
export const MAX_TIMESTAMP = 253_402_300_799;

/**
 * Whole seconds whose timestamp has a four-digit year.
 *
 * @pure true
 * @invariant isRepresentableTimestamp(s) ⇒ formatTimestamp(s).length === 19
 */
export const isRepresentableTimestamp = (seconds: number): boolean =>
	Number.isInteger(seconds) &&
	seconds >= MIN_TIMESTAMP &&
	seconds <= MAX_TIMESTAMP;

/**
 * Parses a timestamp into whole seconds since the Unix epoch.
 *
 * @returns Seconds, or null when the text does not match the format or names
 * an impossible date (month 13, February 30, hour 24, ...)
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * parseTimestamp("1970-01-02T00:00:00"); // 86400
 * parseTimestamp("2024-02-30T00:00:00"); // null
 * ```
 */
export function parseTimestamp(text: string): number | null {
	const found = TIMESTAMP_PATTERN.exec(text);
	if (found === null) return null;

	const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0] = found
		.slice(1)
		.map(Number);
	if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
		return null;
	}

	// setUTCFullYear keeps years below 100 literal, unlike Date.UTC
	const date = new Date(0);
	date.setUTCFullYear(year, month - 1, day);
	date.setUTCHours(hour, minute, second, 0);
	if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
		return null;
	}
	return date.getTime() / 1000;
}

/**
 * Renders seconds since the epoch in the same fixed format (UTC).
 * Callers keep `seconds` within {@link isRepresentableTimestamp}.
 *
 * @pure true
 * @complexity O(1)
 */
export function formatTimestamp(seconds: number): string {
	return new Date(seconds * 1000).toISOString().slice(0, 19);
}
