// Capacity-bounded line scanner over an opaque LineSource.
// PURITY: CORE (reads through the injected source; owns no I/O itself)
// INVARIANT: release() closes the source at most once, and only an owned one
// COMPLEXITY: O(n) per line where n = min(|line|, capacity)

import type { LineSource } from "../types/index.js";
import { leadingSpace, trimRight, truncate } from "./text.js";

/**
 * Reads one physical line at a time, truncated to `capacity` characters and
 * right-trimmed, and exposes a cursor for re-scanning the rest of the line.
 *
 * @remarks
 * Truncating an overlong line is the documented capacity contract, not an
 * error: the characters beyond `capacity` are dropped.
 */
export class LineScanner {
	private line = "";
	private cursor = 0;
	private lineNo = 0;
	private released = false;

	private constructor(
		private readonly source: LineSource,
		readonly owned: boolean,
		private readonly capacity: number,
	) {}

	/** Scanner that closes `source` on release. */
	static own(source: LineSource, capacity: number): LineScanner {
		return new LineScanner(source, true, capacity);
	}

	/** Scanner over a caller-supplied source, which it never closes. */
	static borrow(source: LineSource, capacity: number): LineScanner {
		return new LineScanner(source, false, capacity);
	}

	/** 1-based number of the current line; 0 before the first read. */
	get lineNumber(): number {
		return this.lineNo;
	}

	/** Characters left on the current line after the cursor. */
	get remaining(): number {
		return this.line.length - this.cursor;
	}

	/**
	 * Loads the next line and resets the cursor.
	 *
	 * @returns false at end of input (or after release)
	 */
	advance(): boolean {
		this.line = "";
		this.cursor = 0;
		if (this.released) return false;

		const raw = this.source.readLine();
		if (raw === null) return false;

		this.lineNo += 1;
		this.line = trimRight(truncate(raw, this.capacity));
		return true;
	}

	/**
	 * Moves the cursor past leading whitespace and returns the rest of the line.
	 *
	 * @postcondition result.length === this.remaining
	 */
	rest(): string {
		const tail = this.line.slice(this.cursor);
		this.cursor += leadingSpace(tail);
		return this.line.slice(this.cursor);
	}

	skip(count: number): void {
		this.cursor = Math.min(this.line.length, this.cursor + count);
	}

	/** Idempotent; closes the source only when the scanner owns it. */
	release(): void {
		if (this.released) return;
		this.released = true;
		if (this.owned) this.source.close();
	}
}
