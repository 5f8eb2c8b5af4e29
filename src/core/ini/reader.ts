// INI key/value extraction on top of the line scanner.
// PURITY: CORE
// INVARIANT: nextValue is only meaningful right after nextKey returned a key
// COMPLEXITY: O(n) per entry where n = characters in its physical lines

import { Either } from "effect";

import { type IniError, IniKeyOverflow, IniSyntaxError } from "../errors.js";
import type { FlagLimits } from "../limits.js";
import type { LineScanner } from "./scanner.js";
import { trimRight, truncate } from "./text.js";

const CONTINUATION = "\\";

export type IniReaderLimits = Pick<FlagLimits, "maxKeyLength" | "maxValueLength">;

/**
 * Yields `key = value` pairs. No sections, no quoting; `;` and `#` start
 * comment lines; a trailing backslash continues a value on the next line.
 *
 * @example
 * ```ts
 * const reader = new IniReader(LineScanner.borrow(source, 511), DEFAULT_LIMITS);
 * reader.nextKey();   // right("name")
 * reader.nextValue(); // "part1 part2" for `name = part1 \` + `part2`
 * ```
 */
export class IniReader {
	constructor(
		private readonly scanner: LineScanner,
		private readonly limits: IniReaderLimits,
	) {}

	get lineNumber(): number {
		return this.scanner.lineNumber;
	}

	/**
	 * Skips blank and comment lines and returns the next key.
	 *
	 * @returns right(null) at end of input; left on a line without a usable
	 * `=` (missing, or at index 0 or 1) or on a key longer than the key capacity
	 */
	nextKey(): Either.Either<string | null, IniError> {
		while (this.scanner.advance()) {
			const line = this.scanner.rest();
			if (line.length === 0 || line.startsWith(";") || line.startsWith("#")) {
				continue;
			}

			const separator = line.indexOf("=");
			if (separator < 2) {
				return Either.left(
					new IniSyntaxError({ line: this.lineNumber, text: line }),
				);
			}
			this.scanner.skip(separator + 1);

			const key = trimRight(line.slice(0, separator));
			if (key.length > this.limits.maxKeyLength) {
				return Either.left(
					new IniKeyOverflow({
						line: this.lineNumber,
						key: truncate(key, this.limits.maxKeyLength),
					}),
				);
			}
			return Either.right(key);
		}
		return Either.right(null);
	}

	/**
	 * Value of the key just read, capped to the value capacity, with
	 * continuation lines joined by a single space.
	 *
	 * @returns "" when the key has no value
	 */
	nextValue(): string {
		return this.readValue(this.limits.maxValueLength);
	}

	/** Consumes the pending value, continuation lines included. */
	skipValue(): void {
		this.readValue(Number.POSITIVE_INFINITY);
	}

	private readValue(capacity: number): string {
		let fragment = this.scanner.rest();
		if (!fragment.endsWith(CONTINUATION)) return truncate(fragment, capacity);

		let value = "";
		let more = true;
		while (more && fragment.length > 0 && value.length < capacity) {
			more = fragment.endsWith(CONTINUATION);
			const text = more ? trimRight(fragment.slice(0, -1)) : fragment;
			const joined =
				value.length === 0 || text.length === 0 ? value + text : `${value} ${text}`;
			value = truncate(joined, capacity);
			fragment =
				more && value.length < capacity && this.scanner.advance()
					? this.scanner.rest()
					: "";
		}
		return value;
	}
}
