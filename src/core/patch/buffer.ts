// Line buffer of one source file with byte-exact round trip
// PURITY: CORE
// FORMAT THEOREM: ∀text: renderSourceBuffer(toSourceBuffer(text)) = text
// INVARIANT: every line keeps its own terminator ("\n", "\r\n" or "" for the last line)
// COMPLEXITY: O(n) where n = |text|

import type { Insertion } from "../types/index.js";

/**
 * Ordered lines of one file, each carrying its original terminator.
 */
export interface SourceBuffer {
	readonly lines: readonly string[];
}

const TERMINATOR = /\r?\n$/u;

/**
 * @pure true
 * @invariant "" → { lines: [] }
 */
export function toSourceBuffer(text: string): SourceBuffer {
	if (text.length === 0) return { lines: [] };
	return { lines: text.split(/(?<=\n)/u) };
}

export function renderSourceBuffer(buffer: SourceBuffer): string {
	return buffer.lines.join("");
}

/**
 * Terminator of a raw buffer line ("" for an unterminated last line).
 *
 * @pure true
 */
export function terminatorOf(rawLine: string): string {
	return TERMINATOR.exec(rawLine)?.[0] ?? "";
}

/**
 * Line content without its terminator.
 *
 * @pure true
 */
export function contentOf(rawLine: string): string {
	return rawLine.slice(0, rawLine.length - terminatorOf(rawLine).length);
}

/**
 * Content of the 0-based line, or null when out of range.
 */
export function lineAt(buffer: SourceBuffer, index: number): string | null {
	const raw = buffer.lines[index];
	return raw === undefined ? null : contentOf(raw);
}

/**
 * Leading whitespace of a line, tabs included.
 *
 * @pure true
 */
export function leadingWhitespace(line: string): string {
	return /^[ \t]*/u.exec(line)?.[0] ?? "";
}

function pickTerminator(buffer: SourceBuffer, index: number): string {
	const before = buffer.lines[index];
	const own = before === undefined ? "" : terminatorOf(before);
	if (own.length > 0) return own;
	const first = buffer.lines.map(terminatorOf).find((t) => t.length > 0);
	return first ?? "\n";
}

/**
 * Inserts lines immediately before `insertion.index`.
 *
 * Inserted lines take the terminator of the line they precede, so a CRLF file
 * stays CRLF.
 *
 * @pure true
 * @precondition 0 <= insertion.index <= buffer.lines.length
 * @postcondition result.lines.length = buffer.lines.length + insertion.lines.length
 * @postcondition ∀i < index: result.lines[i] = buffer.lines[i]
 * @complexity O(n)
 */
export function insertLines(
	buffer: SourceBuffer,
	insertion: Insertion,
): SourceBuffer {
	const { index } = insertion;
	if (!Number.isInteger(index) || index < 0 || index > buffer.lines.length) {
		throw new RangeError(
			`insertion index ${index} outside 0..${buffer.lines.length}`,
		);
	}
	const eol = pickTerminator(buffer, index);
	const added = insertion.lines.map((line) => `${line}${eol}`);
	// Appending after an unterminated last line must not glue onto it
	const head = buffer.lines.slice(0, index).map((line, i) =>
		i === index - 1 && index === buffer.lines.length && terminatorOf(line) === ""
			? `${line}${eol}`
			: line,
	);
	return {
		lines: [...head, ...added, ...buffer.lines.slice(index)],
	};
}
