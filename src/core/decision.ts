// Pure decision function to compute exit code
// FORMAT THEOREM: ∀s ∈ State: s.fatal ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: Partially applied fixes are a normal outcome, not a failure
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from run state (pure function).
 *
 * @returns 1 only when the command could not run at all; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode({ fatal: false }); // 0, even when some fixes failed
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(state, (s) => s.fatal, (fatal): ExitCode => (fatal ? 1 : 0));
