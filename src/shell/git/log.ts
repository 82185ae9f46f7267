// Commit-log collaborator for the changelog
// PURITY: SHELL
// EFFECT: Effect<string, ExecError>

import type { Effect } from "effect";

import { COMMIT_LOG_FORMAT } from "../../core/changelog/parse.js";
import type { ExecError } from "../../core/errors.js";
import { execCommand } from "../utils/exec.js";

/**
 * Builds the `git log` command line; merge commits excluded, most recent first.
 *
 * @param range Optional revision range such as "v1.0.0..HEAD"
 * @pure true
 */
export function commitLogCommand(range?: string): string {
	const rangeArg = range === undefined ? "" : ` ${JSON.stringify(range)}`;
	return `git log${rangeArg} --pretty=format:'${COMMIT_LOG_FORMAT}' --date=short --no-merges`;
}

/**
 * Raw `hash|subject|author|email|date` lines.
 *
 * @pure false (spawns git)
 */
export function fetchCommitLog(
	range?: string,
	cwd?: string,
): Effect.Effect<string, ExecError> {
	return execCommand(
		commitLogCommand(range),
		cwd === undefined ? undefined : { cwd },
	);
}
