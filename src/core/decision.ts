// Maps the recorded error kind to the process exit code.
// FORMAT THEOREM: ∀k: k = "None" ↔ computeExitCode(k) = null; k = "Help" ↔ computeExitCode(k) = 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping FlagErrorKind → ExitCode | null
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type { FlagErrorKind } from "./errors.js";
import type { ExitCode } from "./models.js";

/**
 * Exit code for a recorded error kind, or null when nothing was recorded.
 *
 * @pure true
 * @invariant result ∈ {null, 0, 1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode("Help");        // 0
 * computeExitCode("UnknownFlag"); // 1
 * computeExitCode("None");        // null
 * ```
 */
export const computeExitCode = (kind: FlagErrorKind): ExitCode | null =>
	match(kind)
		.with("None", () => null)
		.with("Help", () => 0 as const)
		.with(
			"UnknownFlag",
			"MissingValue",
			"InvalidValue",
			"OpenConfigFailed",
			() => 1 as const,
		)
		.exhaustive();
