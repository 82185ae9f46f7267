// Functional Core domain models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Phases of a fix run, strictly sequential and non-retrying.
 */
export type RunPhase = "Idle" | "Collecting" | "Fixing" | "Verifying" | "Done";

/**
 * Minimal decision state for producing exit code.
 *
 * @remarks
 * - @invariant partial fix failures never set `fatal`
 */
export interface DecisionState {
	readonly fatal: boolean;
}
