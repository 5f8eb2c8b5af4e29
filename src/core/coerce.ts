// Text → typed value for the six flag kinds.
// PURITY: CORE
// INVARIANT: A destination is written only after its text coerced successfully
// COMPLEXITY: O(n) where n = |text|

import { Either } from "effect";
import { match } from "ts-pattern";

import { CoercionFailure } from "./errors.js";
import { truncate } from "./ini/text.js";
import { parseTimestamp, TIMESTAMP_FORMAT } from "./time.js";
import type { Destination, FlagKind, FlagSpec } from "./types/index.js";

export const INT32_MIN = -2_147_483_648;
export const INT32_MAX = 2_147_483_647;

const INTEGER_PATTERN = /^[ \t\n\v\f\r]*[+-]?\d+$/;
// Longest leading decimal number; hex floats are not accepted
const DECIMAL_PREFIX =
	/^[ \t\n\v\f\r]*([+-]?)(infinity|inf|nan|(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)/i;

export type Coerced<T> = Either.Either<T, CoercionFailure>;

const failure = <T>(kind: FlagKind, text: string, reason: string): Coerced<T> =>
	Either.left(new CoercionFailure({ kind, text, reason }));

/**
 * Accepts exactly "true" or "false".
 *
 * @pure true
 * @complexity O(1)
 */
export function coerceBool(text: string): Coerced<boolean> {
	if (text === "true") return Either.right(true);
	if (text === "false") return Either.right(false);
	return failure("bool", text, 'expected "true" or "false"');
}

/**
 * Copies text, truncated to `capacity` characters. Never fails.
 *
 * @pure true
 * @invariant result.length <= capacity
 */
export function coerceString(text: string, capacity: number): Coerced<string> {
	return Either.right(truncate(text, capacity));
}

/**
 * Base-10 signed 32-bit integer. Leading whitespace and a sign are accepted;
 * anything after the digits is rejected.
 *
 * @pure true
 * @invariant ∀ n ∈ [INT32_MIN, INT32_MAX]: coerceInt(String(n)) = right(n)
 * @complexity O(n)
 */
export function coerceInt(text: string): Coerced<number> {
	if (!INTEGER_PATTERN.test(text)) {
		return failure("int", text, "expected a base-10 integer");
	}
	const value = Number.parseInt(text, 10);
	if (value < INT32_MIN || value > INT32_MAX) {
		return failure("int", text, "out of 32-bit integer range");
	}
	return Either.right(value === 0 ? 0 : value);
}

/**
 * Reads the longest leading decimal number, ignoring what follows it.
 * Fails only when no character can be consumed.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * coerceDouble("2.5e3ms"); // right(2500)
 * coerceDouble("ms");      // left(CoercionFailure)
 * ```
 */
export function coerceDouble(text: string): Coerced<number> {
	return readDecimal("double", text);
}

/** Same as {@link coerceDouble}, rounded to 32-bit precision. */
export function coerceFloat(text: string): Coerced<number> {
	return Either.map(readDecimal("float", text), Math.fround);
}

function readDecimal(kind: "float" | "double", text: string): Coerced<number> {
	const found = DECIMAL_PREFIX.exec(text);
	const sign = found?.[1];
	const body = found?.[2];
	if (sign === undefined || body === undefined) {
		return failure(kind, text, "expected a decimal number");
	}
	const magnitude = match(body.toLowerCase())
		.with("inf", "infinity", () => Number.POSITIVE_INFINITY)
		.with("nan", () => Number.NaN)
		.otherwise(Number);
	return Either.right(sign === "-" ? -magnitude : magnitude);
}

/**
 * Fixed-format UTC timestamp to whole seconds since the epoch.
 *
 * @pure true
 * @complexity O(1)
 */
export function coerceTime(text: string): Coerced<number> {
	const seconds = parseTimestamp(text);
	return seconds === null
		? failure("time", text, `expected ${TIMESTAMP_FORMAT}`)
		: Either.right(seconds);
}

const write = <T>(
	destination: Destination<T>,
	coerced: Coerced<T>,
): Coerced<void> =>
	Either.map(coerced, (value) => {
		destination.set(value);
	});

/**
 * Coerces `text` per `spec.kind` and stores it in the spec's destination.
 * Bool uses the textual form ("true" / "false").
 *
 * @param valueCapacity Truncation bound for string values
 *
 * @pure false (writes the destination on success only)
 * @invariant left(_) ⇒ destination unchanged
 * @complexity O(n) where n = |text|
 */
export function assignFromText(
	spec: FlagSpec,
	text: string,
	valueCapacity: number,
): Coerced<void> {
	return match(spec)
		.with({ kind: "bool" }, (s) => write(s.destination, coerceBool(text)))
		.with({ kind: "string" }, (s) =>
			write(s.destination, coerceString(text, valueCapacity)),
		)
		.with({ kind: "int" }, (s) => write(s.destination, coerceInt(text)))
		.with({ kind: "float" }, (s) => write(s.destination, coerceFloat(text)))
		.with({ kind: "double" }, (s) => write(s.destination, coerceDouble(text)))
		.with({ kind: "time" }, (s) => write(s.destination, coerceTime(text)))
		.exhaustive();
}
