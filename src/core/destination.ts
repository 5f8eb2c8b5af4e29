// Destination handles onto caller-owned storage.
// PURITY: CORE (handles mutate only the storage the caller hands in)
// COMPLEXITY: O(1)

import type { Destination } from "./types/index.js";

/**
 * Mutable box usable as a flag destination.
 *
 * @example
 * ```ts
 * const port = cell(0);
 * flags.int(port, "port", "p", 8080, "Listen port");
 * port.value; // 8080
 * ```
 */
export class Cell<T> implements Destination<T> {
	constructor(public value: T) {}

	get(): T {
		return this.value;
	}

	set(value: T): void {
		this.value = value;
	}
}

export const cell = <T>(initial: T): Cell<T> => new Cell(initial);

/**
 * Binds a destination to one property of a caller object.
 *
 * @pure false (writes through to `target[key]`)
 * @invariant get() === target[key] at all times
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const options = { verbose: false };
 * flags.bool(property(options, "verbose"), "verbose", "v", "Verbose output");
 * ```
 */
export function property<O extends object, K extends keyof O>(
	target: O,
	key: K,
): Destination<O[K]> {
	return {
		get: () => target[key],
		set: (value) => {
			target[key] = value;
		},
	};
}
