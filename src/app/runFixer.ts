// Fix run orchestration: Collecting → Fixing → Verifying → Done
// PURITY: APP (composes CORE planning with SHELL storage and diagnostics)
// EFFECT: Effect<RunSummary, never>
// INVARIANT: No single-issue failure aborts the run; results are threaded
//   through a fold, never through shared counters
// COMPLEXITY: O(n · f) where n = issues, f = size of the touched file

import { Effect } from "effect";

import { classifyIssue } from "../core/diagnostics/classifier.js";
import { collectIssues } from "../core/diagnostics/parser.js";
import { describeFixFailure } from "../core/errors.js";
import {
	type LineShiftLedger,
	emptyLedger,
	recordInsertion,
	resolveLine,
} from "../core/fix/ledger.js";
import { isFixable, type PlanOptions, planFix } from "../core/fix/planner.js";
import { summarizeRun } from "../core/fix/summary.js";
import type {
	FixResult,
	Issue,
	RunSummary,
} from "../core/types/index.js";
import type { DiagnosticsSource } from "../shell/diagnostics/collector.js";
import type { SourceFileStore } from "../shell/fs/store.js";
import { consoleReporter, type FixReporter } from "../shell/output/reporter.js";
import { applyPlanned } from "../shell/patch/applier.js";

export interface FixerDependencies {
	readonly diagnostics: DiagnosticsSource;
	readonly store: SourceFileStore;
	readonly reporter?: FixReporter;
}

export interface FixerOptions extends PlanOptions {
	readonly dedupe: boolean;
}

export interface FixState {
	readonly ledger: LineShiftLedger;
	readonly results: readonly FixResult[];
}

/**
 * Runs one diagnostics pass and parses it.
 *
 * @returns issues, or null when the command could not run
 */
function collect(
	diagnostics: DiagnosticsSource,
	dedupe: boolean,
	reporter: FixReporter,
): Effect.Effect<readonly Issue[] | null> {
	return diagnostics.pipe(
		Effect.map(({ text }) => collectIssues(text, { dedupe })),
		Effect.catchAll((error) => {
			reporter.warn(`diagnostics command failed: ${error.detail}`);
			return Effect.succeed(null);
		}),
	);
}

/**
 * Classifies, plans and applies one issue against the current file state.
 *
 * @pure false (reads and rewrites the issue's file)
 * @invariant never fails; every failure becomes a FixResult
 */
export function fixIssue(
	issue: Issue,
	state: FixState,
	store: SourceFileStore,
	options: PlanOptions,
): Effect.Effect<FixState> {
	const strategy = classifyIssue(issue);
	if (!isFixable(strategy)) {
		const skipped: FixResult = {
			issue,
			strategy: strategy._tag,
			outcome: { kind: "skipped", reason: "no automatic fix for this message" },
		};
		return Effect.succeed({ ...state, results: [...state.results, skipped] });
	}

	const current: Issue = {
		...issue,
		line: resolveLine(state.ledger, issue.filePath, issue.line),
	};
	return applyPlanned(store, issue.filePath, (buffer) =>
		planFix(strategy, current, buffer, options),
	).pipe(
		Effect.match({
			onFailure: (failure): FixState => ({
				...state,
				results: [
					...state.results,
					{
						issue,
						strategy: strategy._tag,
						outcome: { kind: "failed", reason: describeFixFailure(failure) },
					},
				],
			}),
			onSuccess: (insertion): FixState => ({
				ledger: recordInsertion(state.ledger, issue.filePath, insertion),
				results: [
					...state.results,
					{ issue, strategy: strategy._tag, outcome: { kind: "applied", insertion } },
				],
			}),
		}),
	);
}

/**
 * Orchestrates a complete fix run and returns the summary as a value.
 *
 * @pure false (runs diagnostics twice, rewrites source files)
 * @effect Effect<RunSummary, never>
 * @postcondition summary.results.length === number of collected issues
 */
export function runFixer(
	deps: FixerDependencies,
	options: FixerOptions,
): Effect.Effect<RunSummary> {
	const reporter = deps.reporter ?? consoleReporter;
	return Effect.gen(function* () {
		reporter.phase("Idle");

		reporter.phase("Collecting");
		const issues = (yield* collect(deps.diagnostics, options.dedupe, reporter)) ?? [];
		reporter.phase("Fixing", `(${issues.length} issues)`);

		const initial: FixState = { ledger: emptyLedger, results: [] };
		const finalState = yield* Effect.reduce(issues, initial, (state, issue) =>
			fixIssue(issue, state, deps.store, options).pipe(
				Effect.tap((next) =>
					Effect.sync(() => {
						const latest = next.results.at(-1);
						if (latest !== undefined) reporter.result(latest);
					}),
				),
			),
		);

		reporter.phase("Verifying");
		const remaining = yield* collect(deps.diagnostics, options.dedupe, reporter);

		const summary = summarizeRun(finalState.results, remaining?.length ?? null);
		reporter.summary(summary);
		reporter.phase("Done");
		return summary;
	});
}
