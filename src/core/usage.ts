// Help text and error-line rendering.
// PURITY: CORE
// INVARIANT: Rendering is deterministic for a given registry state
// COMPLEXITY: O(n) where n = number of registered flags

import { match } from "ts-pattern";

import type { FlagError } from "./errors.js";
import type { FlagRegistry } from "./registry.js";
import { formatTimestamp } from "./time.js";
import type { FlagSpec } from "./types/index.js";

/** Spaces added after the longest name to form the name column. */
export const USAGE_MARGIN = 5;

const HELP_DESCRIPTION = "Show this help message";

const shortColumn = (shortName: string): string =>
	shortName.length > 0 ? `  -${shortName}, ` : "      ";

/**
 * ` (default: …)` suffix. Empty strings and zero numbers show none; bool
 * flags never do.
 *
 * @pure true
 */
export function defaultSuffix(spec: FlagSpec): string {
	const shown = match(spec)
		.with({ kind: "bool" }, () => null)
		.with({ kind: "string" }, ({ defaultValue }) =>
			defaultValue.length > 0 ? defaultValue : null,
		)
		.with({ kind: "int" }, ({ defaultValue }) =>
			defaultValue !== 0 ? String(defaultValue) : null,
		)
		.with({ kind: "float" }, { kind: "double" }, ({ defaultValue }) =>
			defaultValue !== 0 ? defaultValue.toFixed(6) : null,
		)
		.with({ kind: "time" }, ({ defaultValue }) =>
			defaultValue !== 0 ? formatTimestamp(defaultValue) : null,
		)
		.exhaustive();
	return shown === null ? "" : ` (default: ${shown})`;
}

/**
 * Usage block: a `FLAGS` header, the config flag, each flag in registration
 * order, then the built-in help line.
 *
 * @pure true
 * @postcondition result ends with "\n"
 * @complexity O(n)
 *
 * @example
 * ```text
 * FLAGS
 *   -v, --verbose      Verbose output
 *   -h, --help         Show this help message
 * ```
 */
export function formatUsage(registry: FlagRegistry): string {
	const config = registry.configFlag;
	const width =
		Math.max(
			config?.name.length ?? 0,
			...registry.flags.map((spec) => spec.name.length),
		) + USAGE_MARGIN;

	const row = (shortName: string, name: string, text: string): string =>
		`${shortColumn(shortName)}--${name.padEnd(width)} ${text}`;

	const lines = ["FLAGS"];
	if (config !== null) {
		lines.push(row(config.shortName, config.name, config.description));
	}
	for (const spec of registry.flags) {
		lines.push(
			row(spec.shortName, spec.name, spec.description + defaultSuffix(spec)),
		);
	}
	lines.push(row("h", "help", HELP_DESCRIPTION), "");
	return `${lines.join("\n")}\n`;
}

/**
 * One-line description of a recorded error, without the `ERROR: ` prefix.
 *
 * @pure true
 */
export function describeFlagError(error: FlagError): string {
	const quoted = `"${error.flagName}"`;
	const phrase = match(error)
		.with({ _tag: "Help" }, () => `help requested by ${quoted}`)
		.with({ _tag: "UnknownFlag" }, () => `unknown flag ${quoted}`)
		.with({ _tag: "MissingValue" }, () => `missing value for flag ${quoted}`)
		.with({ _tag: "InvalidValue" }, () => `invalid value for flag ${quoted}`)
		.with(
			{ _tag: "OpenConfigFailed" },
			() => `failed to open config file for flag ${quoted}`,
		)
		.exhaustive();
	return error.detail === undefined ? phrase : `${phrase}: ${error.detail}`;
}

export const formatErrorLine = (error: FlagError): string =>
	`ERROR: ${describeFlagError(error)}`;
