// Changelog orchestration: git log → parse → categorise → render
// PURITY: APP
// EFFECT: Effect<string, ExecError>

import { Effect } from "effect";

import { categorizeCommits } from "../core/changelog/categorize.js";
import { parseCommitLog } from "../core/changelog/parse.js";
import { renderChangelog } from "../core/changelog/render.js";
import type { ExecError } from "../core/errors.js";
import type { ChangelogOptions } from "../core/types/index.js";

/**
 * Source of raw commit-log text for an optional revision range.
 */
export type CommitLogSource = (
	range?: string,
) => Effect.Effect<string, ExecError>;

/**
 * UTC timestamp as "YYYY-MM-DD HH:MM:SS UTC".
 *
 * @pure true
 */
export function formatBuildDate(date: Date): string {
	return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

/**
 * @pure false (runs the commit-log source)
 * @effect Effect<string, ExecError>
 */
export function runChangelog(
	source: CommitLogSource,
	range: string | undefined,
	options: ChangelogOptions,
): Effect.Effect<string, ExecError> {
	return source(range).pipe(
		Effect.map(parseCommitLog),
		Effect.map(categorizeCommits),
		Effect.map((commits) => renderChangelog(commits, options)),
	);
}
