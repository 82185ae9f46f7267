// Parse doc-linter diagnostic text into Issue records
// PURITY: CORE
// INVARIANT: Malformed lines are dropped, never thrown (ParseSkip)
// COMPLEXITY: O(n) where n = |text|

import type { Issue } from "../types/index.js";

/**
 * Substrings that mark a line as a diagnostic candidate.
 */
export const DIAGNOSTIC_MARKERS: readonly string[] = ["warning:", "error:"];

const GENERIC_PARAM_MARKER = /no @param for <[^>]+>/u;
const DRIVE_PREFIX = /^[A-Za-z]:[\\/]/u;
const DIGITS = /^\d+$/u;

/**
 * @pure true
 * @invariant result ⇔ line contains a known marker
 */
export function hasDiagnosticMarker(line: string): boolean {
	return (
		DIAGNOSTIC_MARKERS.some((marker) => line.includes(marker)) ||
		GENERIC_PARAM_MARKER.test(line)
	);
}

/**
 * Splits a line into `file : line : message...`, keeping a Windows drive
 * prefix (`C:\`, `C:/`) inside the file segment.
 *
 * @pure true
 * @invariant result === null ∨ result.rest.length >= 2
 */
function splitSegments(
	raw: string,
): { readonly file: string; readonly rest: readonly string[] } | null {
	const trimmedStart = raw.trimStart();
	const drive = DRIVE_PREFIX.test(trimmedStart) ? trimmedStart.slice(0, 2) : "";
	const body = trimmedStart.slice(drive.length);
	const [first, ...rest] = body.split(":");
	if (first === undefined || rest.length < 2) return null;
	return { file: `${drive}${first}`, rest };
}

/**
 * Parses one line of linter output.
 *
 * @param raw Line without terminator
 * @returns Issue, or null when the line is not a diagnostic
 *
 * @pure true
 * @invariant result !== null → result.line is a positive integer parsed from digits
 * @complexity O(|raw|)
 *
 * @example
 * ```ts
 * parseDiagnosticLine("src/Foo.java:12: warning: no @param for <T>");
 * // { filePath: "src/Foo.java", line: 12, message: "warning: no @param for <T>" }
 * ```
 */
export function parseDiagnosticLine(raw: string): Issue | null {
	if (!hasDiagnosticMarker(raw)) return null;

	const segments = splitSegments(raw);
	if (segments === null) return null;

	const filePath = segments.file.trim();
	const [lineField = "", ...messageParts] = segments.rest;
	const lineText = lineField.trim();
	if (filePath.length === 0 || !DIGITS.test(lineText)) return null;

	return {
		filePath,
		line: Number.parseInt(lineText, 10),
		message: messageParts.join(":").trim(),
	};
}

/**
 * Lazily yields every Issue found in multi-line diagnostic text.
 *
 * @pure true (generator over an immutable string)
 * @complexity O(n) where n = |text|
 */
export function* parseDiagnostics(text: string): Generator<Issue> {
	for (const line of text.split(/\r?\n/u)) {
		const issue = parseDiagnosticLine(line);
		if (issue !== null) yield issue;
	}
}

function issueKey(issue: Issue): string {
	return JSON.stringify([issue.filePath, issue.line, issue.message]);
}

/**
 * Drops duplicate issues by the full (file, line, message) tuple.
 *
 * @pure true
 * @invariant first occurrence order is kept
 * @complexity O(n)
 */
export function dedupeIssues(issues: Iterable<Issue>): readonly Issue[] {
	const seen = new Set<string>();
	const unique: Issue[] = [];
	for (const issue of issues) {
		const key = issueKey(issue);
		if (seen.has(key)) continue;
		seen.add(key);
		unique.push(issue);
	}
	return unique;
}

/**
 * Parses diagnostic text and optionally deduplicates the result.
 *
 * @pure true
 */
export function collectIssues(
	text: string,
	options: { readonly dedupe: boolean },
): readonly Issue[] {
	return options.dedupe
		? dedupeIssues(parseDiagnostics(text))
		: [...parseDiagnostics(text)];
}
