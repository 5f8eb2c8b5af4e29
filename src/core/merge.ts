// Merges INI content into registered flags, following config-file chains.
// PURITY: CORE (file access goes through the injected SourceOpener)
// INVARIANT: Every opened source is released exactly once, on every path
// INVARIANT: Nesting depth never exceeds limits.maxIncludeDepth
// COMPLEXITY: O(total lines across the chain × number of flags)

import { Either, pipe } from "effect";
import { match } from "ts-pattern";

import { assignFromText } from "./coerce.js";
import {
	type FlagError,
	type IniError,
	InvalidValue,
	MissingValue,
	OpenConfigFailed,
	UnknownFlag,
} from "./errors.js";
import { IniReader } from "./ini/reader.js";
import { LineScanner } from "./ini/scanner.js";
import type { FlagRegistry } from "./registry.js";
import type { LineSource, SourceOpener } from "./types/index.js";

export interface MergeContext {
	readonly registry: FlagRegistry;
	readonly opener: SourceOpener;
}

export type Merged = Either.Either<void, FlagError>;

const done: Merged = Either.right(undefined);

/**
 * Opens `path` and merges it. A `config = other.ini` line recurses into the
 * named file before the remaining lines of the current one are read.
 *
 * @param depth 1 for a file named on the command line
 * @returns left(OpenConfigFailed) when the file cannot be opened or the chain
 * is nested deeper than `maxIncludeDepth`
 *
 * @pure false (writes flag destinations, reads through the opener)
 * @invariant the opened source is closed before this returns
 */
export function mergeConfigFile(
	context: MergeContext,
	path: string,
	depth = 1,
): Merged {
	const { registry, opener } = context;
	const configName = registry.boundName(registry.configFlag?.name ?? "");
	const { maxIncludeDepth, maxLineLength } = registry.limits;

	if (depth > maxIncludeDepth) {
		return Either.left(
			new OpenConfigFailed({
				flagName: configName,
				detail: `${path}: config files nested deeper than ${maxIncludeDepth}`,
			}),
		);
	}

	const opened = opener(path);
	if (Either.isLeft(opened)) {
		return Either.left(
			new OpenConfigFailed({
				flagName: configName,
				detail: `${path}: ${opened.left.reason}`,
			}),
		);
	}

	const scanner = LineScanner.own(opened.right, maxLineLength);
	try {
		return mergeEntries(context, new IniReader(scanner, registry.limits), {
			label: path,
			depth,
		});
	} finally {
		scanner.release();
	}
}

/**
 * Merges INI content from a source the caller keeps ownership of.
 *
 * @param label Name used in syntax-error details
 * @invariant `source` is never closed
 */
export function mergeSource(
	context: MergeContext,
	source: LineSource,
	label: string,
): Merged {
	const scanner = LineScanner.borrow(source, context.registry.limits.maxLineLength);
	try {
		return mergeEntries(context, new IniReader(scanner, context.registry.limits), {
			label,
			depth: 1,
		});
	} finally {
		scanner.release();
	}
}

interface Origin {
	readonly label: string;
	readonly depth: number;
}

function mergeEntries(
	context: MergeContext,
	reader: IniReader,
	origin: Origin,
): Merged {
	for (;;) {
		const next = reader.nextKey();
		const step = Either.isLeft(next)
			? recoverIniError(context, reader, next.left, origin)
			: next.right === null
				? null
				: mergeEntry(context, reader, next.right, origin);
		if (step === null) return done;
		if (Either.isLeft(step)) return step;
	}
}

function recoverIniError(
	context: MergeContext,
	reader: IniReader,
	error: IniError,
	origin: Origin,
): Merged {
	const { registry } = context;
	return match(error)
		.with({ _tag: "IniSyntaxError" }, ({ line }) =>
			Either.left(
				new InvalidValue({
					flagName: registry.boundName(registry.configFlag?.name ?? ""),
					detail: `${origin.label}:${line}: expected "key = value"`,
				}),
			),
		)
		// Overlong keys are unknown, even when a registered name exceeds maxKeyLength
		.with({ _tag: "IniKeyOverflow" }, ({ key }) => unknownKey(context, reader, key))
		.exhaustive();
}

function unknownKey(
	context: MergeContext,
	reader: IniReader,
	key: string,
): Merged {
	const { registry } = context;
	if (!registry.ignoresUnknown) {
		return Either.left(new UnknownFlag({ flagName: registry.boundName(key) }));
	}
	reader.skipValue();
	return done;
}

function mergeEntry(
	context: MergeContext,
	reader: IniReader,
	key: string,
	origin: Origin,
): Merged {
	const { registry } = context;

	if (registry.configFlag?.name === key) {
		const nested = reader.nextValue();
		if (nested.length === 0) {
			return Either.left(new MissingValue({ flagName: registry.boundName(key) }));
		}
		return mergeConfigFile(context, nested, origin.depth + 1);
	}

	const spec = registry.lookupByBareKey(key);
	if (spec === undefined) return unknownKey(context, reader, key);

	const value = reader.nextValue();
	const flagName = registry.boundName(spec.name);
	if (value.length === 0) return Either.left(new MissingValue({ flagName }));

	return pipe(
		assignFromText(spec, value, registry.limits.maxValueLength),
		Either.mapLeft(
			(failure) => new InvalidValue({ flagName, detail: failure.reason }),
		),
	);
}
