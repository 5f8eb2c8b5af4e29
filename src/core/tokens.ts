// Command-line token grammar: `--name` (prefix-matched) and `-x` (exact).
// PURITY: CORE
// INVARIANT: classifyToken is total; every string maps to exactly one variant
// COMPLEXITY: O(1) classification, O(|text|) prefix comparison

import { match } from "ts-pattern";

/**
 * Shape of a single command-line token.
 *
 * - Long: `--text` (text may be empty for a bare `--`)
 * - Short: `-x`, exactly two characters
 * - Other: everything else (`-`, `-xy`, positional words)
 */
export type FlagToken =
	| { readonly _tag: "Long"; readonly text: string }
	| { readonly _tag: "Short"; readonly char: string }
	| { readonly _tag: "Other" };

/**
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * classifyToken("--verb"); // { _tag: "Long", text: "verb" }
 * classifyToken("-v");     // { _tag: "Short", char: "v" }
 * classifyToken("-vx");    // { _tag: "Other" }
 * ```
 */
export function classifyToken(token: string): FlagToken {
	if (token.length < 2 || !token.startsWith("-")) return { _tag: "Other" };
	if (token.startsWith("--")) return { _tag: "Long", text: token.slice(2) };
	const char = token[1];
	if (token.length === 2 && char !== undefined) {
		return { _tag: "Short", char };
	}
	return { _tag: "Other" };
}

/**
 * A registered name matches when it begins with the token's text. An empty
 * text (a bare `--`) is a prefix of every name.
 *
 * @pure true
 * @invariant matchesLongName(n, t) ⇔ n.startsWith(t)
 */
export const matchesLongName = (name: string, text: string): boolean =>
	name.startsWith(text);

/**
 * Whether `token` names a flag with the given name and short name.
 *
 * @pure true
 * @complexity O(|name|)
 */
export function tokenMatches(
	token: string,
	name: string,
	shortName: string,
): boolean {
	return match(classifyToken(token))
		.with({ _tag: "Long" }, ({ text }) => matchesLongName(name, text))
		.with({ _tag: "Short" }, ({ char }) => char === shortName)
		.with({ _tag: "Other" }, () => false)
		.exhaustive();
}

/**
 * `--help` (exact) or `-h`.
 *
 * @pure true
 * @complexity O(1)
 */
export function isHelpToken(token: string): boolean {
	return match(classifyToken(token))
		.with({ _tag: "Long" }, ({ text }) => text === "help")
		.with({ _tag: "Short" }, ({ char }) => char === "h")
		.with({ _tag: "Other" }, () => false)
		.exhaustive();
}
