// Typed error values for the parsing core.
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { FlagKind } from "./types/flag.js";

/**
 * Fields shared by every error a parse can record.
 *
 * @property flagName Offending flag name, token or key (bounded)
 * @property detail Optional human-readable context such as `path:line`
 */
export interface FlagErrorFields {
	readonly flagName: string;
	readonly detail?: string;
}

/** `--help` or `-h` was passed. Not a failure, but it stops parsing. */
export class HelpRequested extends Data.TaggedError("Help")<FlagErrorFields> {}

/** A token or config key matched no registered flag. */
export class UnknownFlag extends Data.TaggedError(
	"UnknownFlag",
)<FlagErrorFields> {}

/** A value-taking flag or config key had no value. */
export class MissingValue extends Data.TaggedError(
	"MissingValue",
)<FlagErrorFields> {}

/** A value failed coercion, or config content was malformed. */
export class InvalidValue extends Data.TaggedError(
	"InvalidValue",
)<FlagErrorFields> {}

/** A config file could not be opened (or nested too deeply). */
export class OpenConfigFailed extends Data.TaggedError(
	"OpenConfigFailed",
)<FlagErrorFields> {}

/**
 * Union of every error a parse can record.
 *
 * @invariant At most one is retained per registry (the first)
 */
export type FlagError =
	| HelpRequested
	| UnknownFlag
	| MissingValue
	| InvalidValue
	| OpenConfigFailed;

export type FlagErrorKind = FlagError["_tag"] | "None";

/**
 * Text could not be coerced to the requested kind.
 *
 * @invariant reason.length > 0
 */
export class CoercionFailure extends Data.TaggedError("CoercionFailure")<{
	readonly kind: FlagKind;
	readonly text: string;
	readonly reason: string;
}> {}

/** A content line had no `=`, or `=` sat at index 0 or 1. */
export class IniSyntaxError extends Data.TaggedError("IniSyntaxError")<{
	readonly line: number;
	readonly text: string;
}> {}

/** A key exceeded the key capacity; `key` holds the truncated prefix. */
export class IniKeyOverflow extends Data.TaggedError("IniKeyOverflow")<{
	readonly line: number;
	readonly key: string;
}> {}

export type IniError = IniSyntaxError | IniKeyOverflow;

/** The line-source opener could not open `path`. */
export class SourceOpenFailed extends Data.TaggedError("SourceOpenFailed")<{
	readonly path: string;
	readonly reason: string;
}> {}

/** Registering would exceed the flag count or the name length bound. */
export class CapacityExceeded extends Data.TaggedError("CapacityExceeded")<{
	readonly limit: "maxFlags" | "maxNameLength";
	readonly max: number;
	readonly flagName: string;
}> {}

/** A name or short name is already taken. */
export class DuplicateFlag extends Data.TaggedError("DuplicateFlag")<{
	readonly flagName: string;
	readonly field: "name" | "shortName";
}> {}

/** A short name must be one character other than `-`, or empty. */
export class InvalidShortName extends Data.TaggedError("InvalidShortName")<{
	readonly flagName: string;
	readonly shortName: string;
}> {}

/** Registration was attempted after the registry was parsed. */
export class RegistryFrozen extends Data.TaggedError("RegistryFrozen")<{
	readonly flagName: string;
}> {}

/** A default value that the flag's kind cannot hold or render. */
export class InvalidDefault extends Data.TaggedError("InvalidDefault")<{
	readonly flagName: string;
	readonly reason: string;
}> {}

export type RegistrationError =
	| CapacityExceeded
	| DuplicateFlag
	| InvalidDefault
	| InvalidShortName
	| RegistryFrozen;
