// Console reporting for fix and changelog runs
// PURITY: SHELL (console output)
// INVARIANT: stdout carries progress and counts; stderr carries debug and fatal lines

import { match } from "ts-pattern";

import type { RunPhase } from "../../core/models.js";
import type { FixResult, Issue, RunSummary } from "../../core/types/index.js";

const ENV: NodeJS.ProcessEnv & { DOCLINT_AUTOFIX_DEBUG?: string } = process.env;

/**
 * Debug output behind DOCLINT_AUTOFIX_DEBUG=1.
 */
export function debugLog(message: string): void {
	if (ENV.DOCLINT_AUTOFIX_DEBUG === "1") {
		console.error("[DOCFIX-DEBUG]", message);
	}
}

/**
 * Sink for run progress. The console implementation is the default; tests
 * pass a recording one.
 */
export interface FixReporter {
	readonly phase: (phase: RunPhase, detail?: string) => void;
	readonly result: (result: FixResult) => void;
	readonly warn: (message: string) => void;
	readonly summary: (summary: RunSummary) => void;
}

function location(issue: Issue): string {
	return `${issue.filePath}:${issue.line}`;
}

/**
 * One line per result, e.g. "  ✅ GenericParam src/Foo.java:12".
 *
 * @pure true
 */
export function formatResult(result: FixResult): string {
	const where = location(result.issue);
	return match(result.outcome)
		.with(
			{ kind: "applied" },
			({ insertion }) =>
				`  ✅ ${result.strategy} ${where} (+${insertion.lines.length} line(s) at ${insertion.index + 1})`,
		)
		.with(
			{ kind: "failed" },
			({ reason }) => `  ❌ ${result.strategy} ${where}: ${reason}`,
		)
		.with({ kind: "skipped" }, ({ reason }) => `  ⏭️  ${where}: ${reason}`)
		.exhaustive();
}

/**
 * Summary block printed after verification.
 *
 * @pure true
 */
export function formatSummary(summary: RunSummary): readonly string[] {
	const remaining =
		summary.remaining === null ? "unknown" : String(summary.remaining);
	return [
		"",
		`✅ Applied ${summary.applied} fixes`,
		`📋 Found ${summary.found} issues: ${summary.attempted} attempted, ${summary.failed} failed, ${summary.skipped} skipped`,
		`📊 Remaining issues: ${remaining}`,
	];
}

const PHASE_BANNERS: Readonly<Record<RunPhase, string>> = {
	Idle: "🚀 Doc-comment autofix",
	Collecting: "🔍 Collecting diagnostics...",
	Fixing: "🔧 Applying fixes...",
	Verifying: "🔁 Re-running diagnostics...",
	Done: "🏁 Done",
};

export const consoleReporter: FixReporter = {
	phase: (phase, detail) => {
		console.log(
			detail === undefined
				? PHASE_BANNERS[phase]
				: `${PHASE_BANNERS[phase]} ${detail}`,
		);
	},
	result: (result) => {
		const line = formatResult(result);
		if (result.outcome.kind === "skipped") {
			debugLog(line);
		} else {
			console.log(line);
		}
	},
	warn: (message) => {
		console.log(`⚠️  ${message}`);
	},
	summary: (summary) => {
		for (const line of formatSummary(summary)) console.log(line);
	},
};
