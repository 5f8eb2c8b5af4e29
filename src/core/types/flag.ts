// Flag kinds, destinations and the registered flag descriptor.
// PURITY: CORE
// INVARIANT: FlagSpec is immutable after registration
// COMPLEXITY: O(1)

/**
 * The six scalar kinds a flag can carry.
 */
export type FlagKind = "bool" | "string" | "int" | "float" | "double" | "time";

/**
 * Value type stored for each kind.
 *
 * @remarks
 * `time` is whole seconds since 1970-01-01T00:00:00Z.
 */
export interface FlagValueMap {
	readonly bool: boolean;
	readonly string: string;
	readonly int: number;
	readonly float: number;
	readonly double: number;
	readonly time: number;
}

export type FlagValue<K extends FlagKind> = FlagValueMap[K];

/**
 * Handle onto caller-owned storage.
 *
 * @invariant The registry only ever calls `set`; it never allocates or frees the storage
 */
export interface Destination<T> {
	get(): T;
	set(value: T): void;
}

/**
 * Registered flag of one kind.
 *
 * @property shortName One character, or "" when the flag has no short form
 */
export interface FlagSpecOf<K extends FlagKind> {
	readonly kind: K;
	readonly name: string;
	readonly shortName: string;
	readonly description: string;
	readonly defaultValue: FlagValue<K>;
	readonly destination: Destination<FlagValue<K>>;
}

/**
 * Discriminated union over every kind, narrowed by `kind`.
 */
export type FlagSpec = { readonly [K in FlagKind]: FlagSpecOf<K> }[FlagKind];

/**
 * The file-valued flag that triggers INI merging.
 */
export interface ConfigFlag {
	readonly name: string;
	readonly shortName: string;
	readonly description: string;
}
