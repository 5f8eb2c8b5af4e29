// Flag registry bound to a config-file opener, with process-facing helpers.
// PURITY: SHELL
// INVARIANT: Every failed operation leaves its error in the registry record
// COMPLEXITY: see parseArguments / mergeConfigFile

import { Effect, Either, pipe } from "effect";

import type { FlagError } from "../core/errors.js";
import { MemoryLineSource } from "../core/ini/memory-source.js";
import { mergeConfigFile, mergeSource, type Merged } from "../core/merge.js";
import type { ExitCode } from "../core/models.js";
import { parseArguments } from "../core/parser.js";
import { FlagRegistry, type FlagRegistryOptions } from "../core/registry.js";
import type { SourceOpener } from "../core/types/index.js";
import { describeFlagError } from "../core/usage.js";
import { openFileSource } from "./io/file-source.js";
import {
	type ExitFn,
	printUsage,
	reportAndExit,
	reportError,
	type TextSink,
} from "./output/report.js";

export interface FlagSetOptions extends FlagRegistryOptions {
	/** Defaults to reading files from disk. */
	readonly opener?: SourceOpener;
}

/**
 * The user-facing flag set.
 *
 * @example
 * ```ts
 * const flags = new FlagSet();
 * const port = cell(0);
 * flags.int(port, "port", "p", 8080, "Listen port");
 * flags.registerConfigFlag("config", "c", "Read flags from an INI file");
 * if (!flags.parse()) flags.reportAndExit();
 * ```
 */
export class FlagSet extends FlagRegistry {
	private readonly opener: SourceOpener;

	constructor(options: FlagSetOptions = {}) {
		super(options);
		this.opener = options.opener ?? openFileSource;
	}

	/**
	 * Parses `argv` (element 0 is the program name).
	 *
	 * @returns false when an error was recorded; inspect `error` or call
	 * {@link FlagSet.reportAndExit}
	 */
	parse(argv: readonly string[] = process.argv): boolean {
		return Either.isRight(parseArguments(this, argv, this.opener));
	}

	/** {@link FlagSet.parse} as an Effect, with debug logs annotated `module: "iniflag"`. */
	parseEffect(
		argv: readonly string[] = process.argv,
	): Effect.Effect<void, FlagError> {
		return pipe(
			Effect.logDebug(`parsing ${Math.max(0, argv.length - 1)} argument(s)`),
			Effect.zipRight(
				Effect.suspend(
					(): Effect.Effect<void, FlagError> =>
						Either.match(parseArguments(this, argv, this.opener), {
							onLeft: (error) => Effect.fail(error),
							onRight: () => Effect.void,
						}),
				),
			),
			Effect.tap(() => Effect.logDebug("parse complete")),
			Effect.tapError((error) =>
				Effect.logDebug(`parse stopped: ${describeFlagError(error)}`),
			),
			Effect.annotateLogs({ module: "iniflag" }),
		);
	}

	/** Merges one INI file into the registered flags. */
	mergeFile(path: string): boolean {
		return this.settle(
			mergeConfigFile({ registry: this, opener: this.opener }, path),
		);
	}

	/** Merges INI content held in memory; `label` names it in error details. */
	mergeText(text: string, label = "<text>"): boolean {
		return this.settle(
			mergeSource(
				{ registry: this, opener: this.opener },
				new MemoryLineSource(text),
				label,
			),
		);
	}

	printUsage(sink?: TextSink): void {
		printUsage(this, sink);
	}

	reportError(sink?: TextSink): ExitCode | null {
		return reportError(this, sink);
	}

	reportAndExit(sink?: TextSink, exit?: ExitFn): void {
		reportAndExit(this, sink, exit);
	}

	private settle(merged: Merged): boolean {
		if (Either.isRight(merged)) return true;
		this.fail(merged.left);
		return false;
	}
}
