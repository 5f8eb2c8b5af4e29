export type {
	ConfigFlag,
	Destination,
	FlagKind,
	FlagSpec,
	FlagSpecOf,
	FlagValue,
	FlagValueMap,
} from "./flag.js";
export type { LineSource, SourceOpener } from "./source.js";
