// Command-line argument walk: config token, flag match, unknown handling, help.
// PURITY: CORE (config files are read through the injected SourceOpener)
// INVARIANT: Stops at the first error and records it on the registry
// INVARIANT: Config files are merged in argv order; later values overwrite earlier
// COMPLEXITY: O(|argv| × number of flags) plus the cost of merged files

import { Either, pipe } from "effect";
import { match } from "ts-pattern";

import { assignFromText } from "./coerce.js";
import {
	type FlagError,
	HelpRequested,
	InvalidValue,
	MissingValue,
	UnknownFlag,
} from "./errors.js";
import { mergeConfigFile, type Merged } from "./merge.js";
import type { FlagRegistry } from "./registry.js";
import { isHelpToken } from "./tokens.js";
import type { FlagSpec, SourceOpener } from "./types/index.js";

/**
 * How one token relates to the registry, in priority order: the config flag,
 * then registered flags, then ignore-unknown skipping, then help.
 */
export type TokenRole =
	| { readonly _tag: "Config" }
	| { readonly _tag: "Flag"; readonly spec: FlagSpec }
	| { readonly _tag: "Skipped" }
	| { readonly _tag: "Help" }
	| { readonly _tag: "Unknown" };

type Step =
	| { readonly _tag: "Advance"; readonly consumed: 1 | 2 }
	| { readonly _tag: "Stop"; readonly error: FlagError };

const advance = (consumed: 1 | 2): Step => ({ _tag: "Advance", consumed });
const stop = (error: FlagError): Step => ({ _tag: "Stop", error });

/**
 * @pure true
 * @complexity O(number of flags)
 */
export function classifyArgument(
	registry: FlagRegistry,
	token: string,
): TokenRole {
	if (registry.isConfigToken(token)) return { _tag: "Config" };
	const spec = registry.lookupByToken(token);
	if (spec !== undefined) return { _tag: "Flag", spec };
	// Under ignore-unknown a help token is skipped too
	if (registry.ignoresUnknown) return { _tag: "Skipped" };
	if (isHelpToken(token)) return { _tag: "Help" };
	return { _tag: "Unknown" };
}

/**
 * Walks `argv` from index 1 (index 0 is the program name), assigning flag
 * values and merging config files.
 *
 * @returns left with the recorded error on the first failure
 *
 * @pure false (writes flag destinations and the registry's error record)
 * @invariant registry.parsed === true afterwards
 * @invariant left(e) ⇒ registry.error === e, unless an earlier error was held
 *
 * @example
 * ```ts
 * const port = cell(0);
 * registry.int(port, "port", "p", 8080, "Listen port");
 * parseArguments(registry, ["prog", "--po", "9000"], openFileSource);
 * port.value; // 9000
 * ```
 */
export function parseArguments(
	registry: FlagRegistry,
	argv: readonly string[],
	opener: SourceOpener,
): Either.Either<void, FlagError> {
	registry.freeze();
	let index = 1;
	while (index < argv.length) {
		const step = stepAt(registry, argv, index, opener);
		if (step._tag === "Stop") return Either.left(registry.fail(step.error));
		index += step.consumed;
	}
	return Either.right(undefined);
}

function stepAt(
	registry: FlagRegistry,
	argv: readonly string[],
	index: number,
	opener: SourceOpener,
): Step {
	const token = argv[index] ?? "";
	const value = argv[index + 1];
	return match(classifyArgument(registry, token))
		.with({ _tag: "Config" }, () =>
			value === undefined
				? stop(new MissingValue({ flagName: registry.boundName(token) }))
				: fromMerged(mergeConfigFile({ registry, opener }, value), 2),
		)
		.with({ _tag: "Flag" }, ({ spec }) => applyFlag(registry, spec, value))
		.with({ _tag: "Skipped" }, () => advance(1))
		.with({ _tag: "Help" }, () =>
			stop(new HelpRequested({ flagName: registry.boundName(token) })),
		)
		.with({ _tag: "Unknown" }, () =>
			stop(new UnknownFlag({ flagName: registry.boundName(token) })),
		)
		.exhaustive();
}

function applyFlag(
	registry: FlagRegistry,
	spec: FlagSpec,
	value: string | undefined,
): Step {
	if (spec.kind === "bool") {
		spec.destination.set(true);
		return advance(1);
	}
	const flagName = registry.boundName(spec.name);
	if (value === undefined) return stop(new MissingValue({ flagName }));
	return pipe(
		assignFromText(spec, value, registry.limits.maxValueLength),
		Either.match({
			onLeft: (failure) =>
				stop(new InvalidValue({ flagName, detail: failure.reason })),
			onRight: () => advance(2),
		}),
	);
}

const fromMerged = (merged: Merged, consumed: 1 | 2): Step =>
	Either.isLeft(merged) ? stop(merged.left) : advance(consumed);
