// Issue, fix strategy and fix result types
// PURITY: CORE
// INVARIANT: All records are immutable once constructed
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * One diagnostic reported by the doc linter.
 *
 * @property filePath Path as printed by the linter
 * @property line 1-based line number as printed by the linter
 * @property message Everything after the second colon, trimmed
 */
export interface Issue {
	readonly filePath: string;
	readonly line: number;
	readonly message: string;
}

/**
 * Repair recipe chosen for an issue's message shape.
 *
 * @invariant closed set; `Unknown` issues are skipped, not failed
 */
export type FixStrategy = Data.TaggedEnum<{
	GenericParam: { readonly name: string };
	MissingReturn: {};
	MissingMethodComment: {};
	Unknown: {};
}>;

export const FixStrategy = Data.taggedEnum<FixStrategy>();

export type FixStrategyTag = FixStrategy["_tag"];

/**
 * Content to insert into a SourceBuffer.
 *
 * @property index 0-based line index; new lines go immediately before it
 * @property lines Line texts without terminators
 * @invariant lines.length > 0
 */
export interface Insertion {
	readonly index: number;
	readonly lines: readonly string[];
}

export type FixOutcome =
	| { readonly kind: "applied"; readonly insertion: Insertion }
	| { readonly kind: "failed"; readonly reason: string }
	| { readonly kind: "skipped"; readonly reason: string };

/**
 * Outcome of one fix attempt. Not persisted.
 */
export interface FixResult {
	readonly issue: Issue;
	readonly strategy: FixStrategyTag;
	readonly outcome: FixOutcome;
}

/**
 * Run-level counts; the only aggregated failure signal of a run.
 *
 * @invariant attempted = applied + failed
 * @invariant found = attempted + skipped
 * @invariant remaining === null ⇔ verification could not collect diagnostics
 */
export interface RunSummary {
	readonly found: number;
	readonly attempted: number;
	readonly applied: number;
	readonly failed: number;
	readonly skipped: number;
	readonly remaining: number | null;
	readonly results: readonly FixResult[];
}
