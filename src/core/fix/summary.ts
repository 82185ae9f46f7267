// Fold per-issue results into run-level counts
// PURITY: CORE
// INVARIANT: attempted = applied + failed ∧ found = attempted + skipped
// COMPLEXITY: O(n) where n = |results|

import { pipe } from "effect";

import type { FixResult, RunSummary } from "../types/index.js";

/**
 * @pure true
 */
export function isApplied(result: FixResult): boolean {
	return result.outcome.kind === "applied";
}

/**
 * Reason attached to a non-applied result.
 *
 * @pure true
 * @returns undefined for applied results
 */
export function reasonOf(result: FixResult): string | undefined {
	return result.outcome.kind === "applied" ? undefined : result.outcome.reason;
}

/**
 * Builds the run summary from results and the verification count.
 *
 * @param remaining Issue count of the verification pass, null when it failed
 * @pure true
 *
 * @example
 * ```ts
 * summarizeRun([], 0);
 * // { found: 0, attempted: 0, applied: 0, failed: 0, skipped: 0, remaining: 0, results: [] }
 * ```
 */
export const summarizeRun = (
	results: readonly FixResult[],
	remaining: number | null,
): RunSummary =>
	pipe(
		results,
		(rs) => ({
			applied: rs.filter((r) => r.outcome.kind === "applied").length,
			failed: rs.filter((r) => r.outcome.kind === "failed").length,
			skipped: rs.filter((r) => r.outcome.kind === "skipped").length,
		}),
		(counts) => ({
			found: results.length,
			attempted: counts.applied + counts.failed,
			...counts,
			remaining,
			results,
		}),
	);
