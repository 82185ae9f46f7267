// Parse `git log --pretty=format:%h|%s|%an|%ae|%ad` output
// PURITY: CORE
// INVARIANT: Lines with fewer than five fields are dropped
// COMPLEXITY: O(n)

import type { CommitRecord } from "../types/index.js";

export const COMMIT_LOG_FORMAT = "%h|%s|%an|%ae|%ad";

/**
 * Parses one record. A subject containing `|` keeps its extra fields.
 *
 * @pure true
 */
export function parseCommitLine(line: string): CommitRecord | null {
	const parts = line.trim().split("|");
	if (parts.length < 5) return null;
	const [hash = "", ...middle] = parts;
	const date = middle.pop() ?? "";
	const email = middle.pop() ?? "";
	const author = middle.pop() ?? "";
	const subject = middle.join("|");
	if (hash.length === 0) return null;
	return { hash, subject, author, email, date };
}

/**
 * @pure true
 * @invariant order of records = order of lines (most recent first)
 */
export function parseCommitLog(text: string): readonly CommitRecord[] {
	return text
		.split(/\r?\n/u)
		.filter((line) => line.trim().length > 0)
		.map(parseCommitLine)
		.filter((record): record is CommitRecord => record !== null);
}
