// Locate insertion anchors relative to a reported line
// PURITY: CORE
// INVARIANT: Scan never leaves [0, buffer.lines.length)
// COMPLEXITY: O(window)

import { type SourceBuffer, lineAt } from "./buffer.js";

/** Token closing a documentation block. */
export const DOC_BLOCK_TERMINATOR = "*/";

/** Lines scanned upward for generic-parameter fixes. */
export const GENERIC_WINDOW = 18;

/** Lines scanned upward for return fixes. */
export const RETURN_WINDOW = 13;

/**
 * Finds the closest doc-block terminator above a reported line.
 *
 * Scans 0-based indices reportedLine-2, reportedLine-3, … visiting at most
 * `window` indices.
 *
 * @param buffer Fresh buffer of the file
 * @param reportedLine 1-based line from the diagnostic
 * @param window Number of lines to inspect
 * @returns 0-based index of the terminator line, or null
 *
 * @pure true
 * @invariant result === null ∨ reportedLine-1-window <= result <= reportedLine-2
 *
 * @example
 * ```ts
 * // declaration on line 10, "*\/" on line 5
 * locateAnchor(buffer, 10, 5); // 4
 * locateAnchor(buffer, 10, 4); // null
 * ```
 */
export function locateAnchor(
	buffer: SourceBuffer,
	reportedLine: number,
	window: number,
): number | null {
	const start = reportedLine - 2;
	const stop = start - window;
	for (let index = start; index > stop && index >= 0; index -= 1) {
		const line = lineAt(buffer, index);
		if (line?.includes(DOC_BLOCK_TERMINATOR) === true) {
			return index;
		}
	}
	return null;
}

/**
 * Anchor of a brand-new comment block: the declaration line itself.
 *
 * @pure true
 * @returns reportedLine-1 when that line exists, else null
 */
export function locateDeclaration(
	buffer: SourceBuffer,
	reportedLine: number,
): number | null {
	const index = reportedLine - 1;
	return lineAt(buffer, index) === null ? null : index;
}
