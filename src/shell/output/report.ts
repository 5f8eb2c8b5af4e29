// Usage and error reporting at the process boundary.
// PURITY: SHELL
// INVARIANT: reportAndExit is the only place that terminates the process
// COMPLEXITY: O(n) where n = number of registered flags

import { computeExitCode } from "../../core/decision.js";
import type { ExitCode } from "../../core/models.js";
import type { FlagRegistry } from "../../core/registry.js";
import { formatErrorLine, formatUsage } from "../../core/usage.js";

/** Anything with a `write(text)` method, such as `process.stdout`. */
export interface TextSink {
	write(chunk: string): unknown;
}

export type ExitFn = (code: ExitCode) => void;

export function printUsage(
	registry: FlagRegistry,
	sink: TextSink = process.stdout,
): void {
	sink.write(formatUsage(registry));
}

/**
 * Writes the recorded error to `sink`: usage alone for a help request,
 * otherwise the `ERROR:` line, a blank line, then usage.
 *
 * @returns the exit code the error maps to, or null when none was recorded
 * (in which case nothing is written)
 */
export function reportError(
	registry: FlagRegistry,
	sink: TextSink = process.stdout,
): ExitCode | null {
	const error = registry.error;
	if (error === null) return null;
	if (error._tag !== "Help") sink.write(`${formatErrorLine(error)}\n\n`);
	printUsage(registry, sink);
	return computeExitCode(error._tag);
}

/**
 * {@link reportError}, then exits with its code. Returns normally only when
 * no error was recorded.
 */
export function reportAndExit(
	registry: FlagRegistry,
	sink: TextSink = process.stdout,
	exit: ExitFn = (code) => process.exit(code),
): void {
	const code = reportError(registry, sink);
	if (code !== null) exit(code);
}
