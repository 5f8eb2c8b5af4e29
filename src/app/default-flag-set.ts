// Process-wide flag set for programs that need only one.
// PURITY: APP (holds module state)
// INVARIANT: defaultFlagSet() returns the same instance until reset
// COMPLEXITY: O(1)

import { FlagSet, type FlagSetOptions } from "../shell/flag-set.js";

let instance: FlagSet | null = null;

/**
 * Lazily created shared {@link FlagSet}.
 *
 * @example
 * ```ts
 * const verbose = cell(false);
 * defaultFlagSet().bool(verbose, "verbose", "v", "Verbose output");
 * if (!defaultFlagSet().parse()) defaultFlagSet().reportAndExit();
 * ```
 */
export function defaultFlagSet(): FlagSet {
	instance ??= new FlagSet();
	return instance;
}

/** Replaces the shared instance with a fresh one built from `options`. */
export function resetDefaultFlagSet(options: FlagSetOptions = {}): FlagSet {
	instance = new FlagSet(options);
	return instance;
}
