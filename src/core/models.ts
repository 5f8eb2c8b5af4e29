// Process-level outcome types shared by core and shell.
// PURITY: CORE
// INVARIANT: data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code a reported parse error maps to.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}; 0 only for a help request
 */
export type ExitCode = 0 | 1;
