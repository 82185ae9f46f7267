// Per-file record of insertions made during one run
// PURITY: CORE
// FORMAT THEOREM: resolveLine applies each recorded shift in the order it happened,
//   so a line reported before the run maps to its position after all insertions
// INVARIANT: Ledger values are immutable; record returns a new ledger
// COMPLEXITY: O(k) per lookup where k = insertions into that file

import type { Insertion } from "../types/index.js";

interface LineShift {
	readonly index: number;
	readonly count: number;
}

export type LineShiftLedger = ReadonlyMap<string, readonly LineShift[]>;

export const emptyLedger: LineShiftLedger = new Map();

/**
 * Maps a line number reported before the run to the current file state.
 *
 * @pure true
 * @invariant no insertions into filePath → result === reportedLine
 */
export function resolveLine(
	ledger: LineShiftLedger,
	filePath: string,
	reportedLine: number,
): number {
	const shifts = ledger.get(filePath) ?? [];
	return shifts.reduce(
		(line, shift) => (line - 1 >= shift.index ? line + shift.count : line),
		reportedLine,
	);
}

/**
 * @pure true
 */
export function recordInsertion(
	ledger: LineShiftLedger,
	filePath: string,
	insertion: Insertion,
): LineShiftLedger {
	const next = new Map(ledger);
	next.set(filePath, [
		...(ledger.get(filePath) ?? []),
		{ index: insertion.index, count: insertion.lines.length },
	]);
	return next;
}
