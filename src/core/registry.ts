// Ordered flag registry with name / short-name lookup and the error record.
// PURITY: CORE (mutates only its own state and caller destinations on registration)
// INVARIANT: Names are unique; non-empty short names are unique; first error wins
// COMPLEXITY: O(n) lookups where n = number of registered flags

import { Either } from "effect";
import { match } from "ts-pattern";

import {
	CapacityExceeded,
	DuplicateFlag,
	type FlagError,
	type FlagErrorKind,
	InvalidDefault,
	InvalidShortName,
	type RegistrationError,
	RegistryFrozen,
} from "./errors.js";
import { truncate } from "./ini/text.js";
import { type FlagLimits, resolveLimits } from "./limits.js";
import {
	isRepresentableTimestamp,
	MAX_TIMESTAMP,
	MIN_TIMESTAMP,
} from "./time.js";
import { tokenMatches } from "./tokens.js";
import type {
	ConfigFlag,
	Destination,
	FlagSpec,
	FlagSpecOf,
} from "./types/index.js";

export interface FlagRegistryOptions {
	readonly limits?: Partial<FlagLimits>;
	readonly ignoreUnknown?: boolean;
}

export type Registration<S> = Either.Either<S, RegistrationError>;

/**
 * Stores a spec's default in its destination.
 *
 * @pure false (writes the destination)
 * @postcondition spec.destination.get() === spec.defaultValue
 */
export function writeDefault(spec: FlagSpec): void {
	match(spec)
		.with({ kind: "bool" }, (s) => s.destination.set(s.defaultValue))
		.with({ kind: "string" }, (s) => s.destination.set(s.defaultValue))
		.with({ kind: "int" }, (s) => s.destination.set(s.defaultValue))
		.with({ kind: "float" }, (s) => s.destination.set(s.defaultValue))
		.with({ kind: "double" }, (s) => s.destination.set(s.defaultValue))
		.with({ kind: "time" }, (s) => s.destination.set(s.defaultValue))
		.exhaustive();
}

/**
 * Declared flags in declaration order, plus the optional config flag,
 * ignore-unknown mode and the single error record of a parse.
 *
 * Lifecycle: register flags, parse once, discard. Registering after a parse
 * yields {@link RegistryFrozen}.
 *
 * @example
 * ```ts
 * const registry = new FlagRegistry();
 * const verbose = cell(false);
 * registry.bool(verbose, "verbose", "v", "Verbose output");
 * registry.lookupByToken("--verb")?.name; // "verbose"
 * ```
 */
export class FlagRegistry {
	readonly limits: FlagLimits;

	private readonly specs: FlagSpec[] = [];
	private config: ConfigFlag | null = null;
	private ignoring: boolean;
	private record: FlagError | null = null;
	private frozen = false;

	constructor(options: FlagRegistryOptions = {}) {
		this.limits = resolveLimits(options.limits);
		this.ignoring = options.ignoreUnknown ?? false;
	}

	get flags(): readonly FlagSpec[] {
		return this.specs;
	}

	get configFlag(): ConfigFlag | null {
		return this.config;
	}

	get ignoresUnknown(): boolean {
		return this.ignoring;
	}

	get error(): FlagError | null {
		return this.record;
	}

	get errorKind(): FlagErrorKind {
		return this.record?._tag ?? "None";
	}

	get parsed(): boolean {
		return this.frozen;
	}

	ignoreUnknown(ignore = true): void {
		this.ignoring = ignore;
	}

	bool(
		destination: Destination<boolean>,
		name: string,
		shortName: string,
		description: string,
	): Registration<FlagSpecOf<"bool">> {
		const spec: FlagSpecOf<"bool"> = {
			kind: "bool",
			name,
			shortName,
			description,
			defaultValue: false,
			destination,
		};
		return this.append(spec);
	}

	string(
		destination: Destination<string>,
		name: string,
		shortName: string,
		defaultValue: string,
		description: string,
	): Registration<FlagSpecOf<"string">> {
		const spec: FlagSpecOf<"string"> = {
			kind: "string",
			name,
			shortName,
			description,
			defaultValue,
			destination,
		};
		return this.append(spec);
	}

	int(
		destination: Destination<number>,
		name: string,
		shortName: string,
		defaultValue: number,
		description: string,
	): Registration<FlagSpecOf<"int">> {
		const spec: FlagSpecOf<"int"> = {
			kind: "int",
			name,
			shortName,
			description,
			defaultValue,
			destination,
		};
		return this.append(spec);
	}

	float(
		destination: Destination<number>,
		name: string,
		shortName: string,
		defaultValue: number,
		description: string,
	): Registration<FlagSpecOf<"float">> {
		const spec: FlagSpecOf<"float"> = {
			kind: "float",
			name,
			shortName,
			description,
			defaultValue: Math.fround(defaultValue),
			destination,
		};
		return this.append(spec);
	}

	double(
		destination: Destination<number>,
		name: string,
		shortName: string,
		defaultValue: number,
		description: string,
	): Registration<FlagSpecOf<"double">> {
		const spec: FlagSpecOf<"double"> = {
			kind: "double",
			name,
			shortName,
			description,
			defaultValue,
			destination,
		};
		return this.append(spec);
	}

	/**
	 * @param defaultValue Seconds since the Unix epoch; 0 renders as no default
	 * @returns left(InvalidDefault) unless the default is whole seconds with a
	 * four-digit year
	 */
	time(
		destination: Destination<number>,
		name: string,
		shortName: string,
		defaultValue: number,
		description: string,
	): Registration<FlagSpecOf<"time">> {
		if (!isRepresentableTimestamp(defaultValue)) {
			return Either.left(
				new InvalidDefault({
					flagName: name,
					reason: `expected whole seconds in [${MIN_TIMESTAMP}, ${MAX_TIMESTAMP}], received ${String(defaultValue)}`,
				}),
			);
		}
		const spec: FlagSpecOf<"time"> = {
			kind: "time",
			name,
			shortName,
			description,
			defaultValue,
			destination,
		};
		return this.append(spec);
	}

	/**
	 * Enables the file-valued flag that merges INI files, both from the
	 * command line and from `name = other.ini` lines inside INI content.
	 * A second call replaces the first.
	 */
	registerConfigFlag(
		name: string,
		shortName: string,
		description: string,
	): Registration<ConfigFlag> {
		const invalid = this.checkIdentity(name, shortName, false);
		if (invalid !== null) return Either.left(invalid);
		const config: ConfigFlag = { name, shortName, description };
		this.config = config;
		return Either.right(config);
	}

	/**
	 * First spec whose name starts with the text of a `--text` token, or whose
	 * short name equals `x` in a `-x` token. Ambiguous prefixes resolve to the
	 * earliest registration.
	 *
	 * @complexity O(n)
	 */
	lookupByToken(token: string): FlagSpec | undefined {
		return this.specs.find((spec) =>
			tokenMatches(token, spec.name, spec.shortName),
		);
	}

	/**
	 * Exact full-name match, as used for INI keys.
	 *
	 * @complexity O(n)
	 */
	lookupByBareKey(key: string): FlagSpec | undefined {
		return this.specs.find((spec) => spec.name === key);
	}

	isConfigToken(token: string): boolean {
		const config = this.config;
		return (
			config !== null && tokenMatches(token, config.name, config.shortName)
		);
	}

	/** Marks the registry parsed; later registrations are refused. */
	freeze(): void {
		this.frozen = true;
	}

	/**
	 * Records `error` unless an earlier one is already held.
	 *
	 * @returns The retained (first) error
	 * @invariant error !== null ⇒ later calls leave it unchanged
	 */
	fail(error: FlagError): FlagError {
		this.record ??= error;
		return this.record;
	}

	/** Offending names are stored bounded, like the error record's buffer. */
	boundName(name: string): string {
		return truncate(name, this.limits.maxNameLength);
	}

	private append<S extends FlagSpec>(spec: S): Registration<S> {
		const invalid = this.checkIdentity(spec.name, spec.shortName, true);
		if (invalid !== null) return Either.left(invalid);
		this.specs.push(spec);
		writeDefault(spec);
		return Either.right(spec);
	}

	private checkIdentity(
		name: string,
		shortName: string,
		countsAsFlag: boolean,
	): RegistrationError | null {
		const { maxFlags, maxNameLength } = this.limits;
		if (this.frozen) return new RegistryFrozen({ flagName: name });
		if (countsAsFlag && this.specs.length >= maxFlags) {
			return new CapacityExceeded({
				limit: "maxFlags",
				max: maxFlags,
				flagName: name,
			});
		}
		if (name.length > maxNameLength) {
			return new CapacityExceeded({
				limit: "maxNameLength",
				max: maxNameLength,
				flagName: name,
			});
		}
		if (shortName.length > 1 || shortName === "-") {
			return new InvalidShortName({ flagName: name, shortName });
		}
		return this.findDuplicate(name, shortName, countsAsFlag);
	}

	private findDuplicate(
		name: string,
		shortName: string,
		countsAsFlag: boolean,
	): DuplicateFlag | null {
		// A replacement config flag need not be unique against its predecessor
		const config = countsAsFlag ? this.config : null;
		const taken: ReadonlyArray<{
			readonly name: string;
			readonly shortName: string;
		}> = config === null ? this.specs : [...this.specs, config];
		if (taken.some((other) => other.name === name)) {
			return new DuplicateFlag({ flagName: name, field: "name" });
		}
		if (
			shortName.length > 0 &&
			taken.some((other) => other.shortName === shortName)
		) {
			return new DuplicateFlag({ flagName: name, field: "shortName" });
		}
		return null;
	}
}
