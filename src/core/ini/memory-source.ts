// In-memory LineSource over a block of text.
// PURITY: CORE
// COMPLEXITY: O(n) split, O(1) per line

import type { LineSource } from "../types/index.js";

/**
 * Splits on "\n"; a final newline does not produce an extra empty line.
 * "\r" is left in place and removed by the scanner's right-trim.
 *
 * @example
 * ```ts
 * const source = new MemoryLineSource("a = 1\nb = 2\n");
 * source.readLine(); // "a = 1"
 * ```
 */
export class MemoryLineSource implements LineSource {
	private readonly lines: readonly string[];
	private index = 0;
	private closed = false;

	constructor(text: string) {
		const lines = text.split("\n");
		if (lines.at(-1) === "") lines.pop();
		this.lines = lines;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	readLine(): string | null {
		if (this.closed) return null;
		const line = this.lines[this.index];
		if (line === undefined) return null;
		this.index += 1;
		return line;
	}

	close(): void {
		this.closed = true;
	}
}
