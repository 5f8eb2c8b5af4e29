// Public API entry point.
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or the FlagSet shell
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// FLAG SET (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Flag registry bound to the file opener.
 *
 * @example
 * ```typescript
 * import { cell, FlagSet } from "iniflag";
 *
 * const flags = new FlagSet();
 * const name = cell("");
 * flags.string(name, "name", "n", "world", "Who to greet");
 * flags.registerConfigFlag("config", "c", "Read flags from an INI file");
 * if (!flags.parse()) flags.reportAndExit();
 * console.log(`hello ${name.value}`);
 * ```
 *
 * @pure false - reads config files, writes destinations
 */
export { FlagSet, type FlagSetOptions } from "./shell/flag-set.js";
export {
	defaultFlagSet,
	resetDefaultFlagSet,
} from "./app/default-flag-set.js";
export {
	type ExitFn,
	printUsage,
	reportAndExit,
	reportError,
	type TextSink,
} from "./shell/output/report.js";
export { FileLineSource, openFileSource } from "./shell/io/file-source.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Exit code a reported error maps to.
 *
 * @pure true
 * @invariant ExitCode ∈ {0, 1}
 */
export type { ExitCode } from "./core/models.js";
export type {
	ConfigFlag,
	Destination,
	FlagKind,
	FlagSpec,
	FlagSpecOf,
	FlagValue,
	FlagValueMap,
	LineSource,
	SourceOpener,
} from "./core/types/index.js";
export { DEFAULT_LIMITS, type FlagLimits, resolveLimits } from "./core/limits.js";
export {
	CapacityExceeded,
	CoercionFailure,
	DuplicateFlag,
	type FlagError,
	type FlagErrorFields,
	type FlagErrorKind,
	HelpRequested,
	type IniError,
	IniKeyOverflow,
	IniSyntaxError,
	InvalidDefault,
	InvalidShortName,
	InvalidValue,
	MissingValue,
	OpenConfigFailed,
	type RegistrationError,
	RegistryFrozen,
	SourceOpenFailed,
	UnknownFlag,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure Parsing Engine)
// ═══════════════════════════════════════════════════════════════════════════════

export { Cell, cell, property } from "./core/destination.js";
export {
	FlagRegistry,
	type FlagRegistryOptions,
	type Registration,
} from "./core/registry.js";
export {
	assignFromText,
	type Coerced,
	coerceBool,
	coerceDouble,
	coerceFloat,
	coerceInt,
	coerceString,
	coerceTime,
	INT32_MAX,
	INT32_MIN,
} from "./core/coerce.js";
export {
	formatTimestamp,
	isRepresentableTimestamp,
	MAX_TIMESTAMP,
	MIN_TIMESTAMP,
	parseTimestamp,
	TIMESTAMP_FORMAT,
} from "./core/time.js";
export { classifyToken, type FlagToken, isHelpToken } from "./core/tokens.js";
export { classifyArgument, parseArguments, type TokenRole } from "./core/parser.js";
export {
	mergeConfigFile,
	type MergeContext,
	type Merged,
	mergeSource,
} from "./core/merge.js";
export { IniReader, type IniReaderLimits } from "./core/ini/reader.js";
export { LineScanner } from "./core/ini/scanner.js";
export { MemoryLineSource } from "./core/ini/memory-source.js";
export {
	defaultSuffix,
	describeFlagError,
	formatErrorLine,
	formatUsage,
	USAGE_MARGIN,
} from "./core/usage.js";
export { computeExitCode } from "./core/decision.js";
