// PURITY: CORE
// INVARIANT: Every limit is a positive integer
// COMPLEXITY: O(1)

/**
 * Capacity bounds shared by the registry, the INI scanner and the merger.
 *
 * @property maxFlags Maximum number of flags a registry accepts
 * @property maxNameLength Longest flag name; error names are truncated to it
 * @property maxKeyLength Longest INI key before the key overflows
 * @property maxLineLength Physical INI lines are truncated to this many characters
 * @property maxValueLength Values (string flags, INI values) are truncated to it
 * @property maxIncludeDepth Deepest chain of config files including each other
 */
export interface FlagLimits {
	readonly maxFlags: number;
	readonly maxNameLength: number;
	readonly maxKeyLength: number;
	readonly maxLineLength: number;
	readonly maxValueLength: number;
	readonly maxIncludeDepth: number;
}

export const DEFAULT_LIMITS: FlagLimits = {
	maxFlags: 256,
	maxNameLength: 63,
	maxKeyLength: 63,
	maxLineLength: 511,
	maxValueLength: 511,
	maxIncludeDepth: 32,
};

/**
 * Merges partial overrides onto {@link DEFAULT_LIMITS}.
 *
 * @throws RangeError when an override is not a positive integer
 *
 * @pure true
 * @invariant ∀ key: result[key] ∈ ℤ⁺
 * @complexity O(k) where k = number of overrides
 *
 * @example
 * ```ts
 * resolveLimits({ maxFlags: 8 }).maxFlags; // 8
 * ```
 */
export function resolveLimits(overrides: Partial<FlagLimits> = {}): FlagLimits {
	const resolved: FlagLimits = { ...DEFAULT_LIMITS, ...overrides };
	for (const [key, value] of Object.entries(resolved)) {
		if (!Number.isInteger(value) || value <= 0) {
			throw new RangeError(
				`limit ${key} must be a positive integer, received ${String(value)}`,
			);
		}
	}
	return resolved;
}
