// Apply one insertion to one file: load fresh, insert, overwrite
// PURITY: SHELL
// EFFECT: Effect<Insertion, FixFailure>
// INVARIANT: Exactly one insertion per read/write cycle, so offsets inside a
//   call never go stale
// COMPLEXITY: O(n) where n = file size

import { Effect, Either } from "effect";

import {
	AnchorNotFound,
	type FixFailure,
	type PlanFailure,
} from "../../core/errors.js";
import {
	type SourceBuffer,
	insertLines,
	renderSourceBuffer,
	toSourceBuffer,
} from "../../core/patch/buffer.js";
import type { Insertion } from "../../core/types/index.js";
import type { SourceFileStore } from "../fs/store.js";

/**
 * Reads a file into a fresh SourceBuffer.
 *
 * @pure false (reads storage)
 */
export function loadBuffer(
	store: SourceFileStore,
	filePath: string,
): Effect.Effect<SourceBuffer, FixFailure> {
	return store.read(filePath).pipe(Effect.map(toSourceBuffer));
}

/**
 * Inserts `insertion.lines` before `insertion.index` and persists the file.
 *
 * @pure false (reads and rewrites storage)
 * @invariant index outside the fresh buffer → AnchorNotFound, file untouched
 * @postcondition file line count grows by insertion.lines.length
 */
export function applyInsertion(
	store: SourceFileStore,
	filePath: string,
	insertion: Insertion,
): Effect.Effect<Insertion, FixFailure> {
	return applyPlanned(store, filePath, (buffer) =>
		insertion.index >= 0 && insertion.index < buffer.lines.length
			? Either.right(insertion)
			: Either.left(
					new AnchorNotFound({ filePath, line: insertion.index + 1, window: 0 }),
				),
	);
}

/**
 * Loads the file, lets `plan` pick the insertion from the fresh buffer,
 * applies it and persists the file.
 *
 * @param plan Pure planner; Left aborts before anything is written
 * @pure false (reads and rewrites storage)
 */
export function applyPlanned(
	store: SourceFileStore,
	filePath: string,
	plan: (buffer: SourceBuffer) => Either.Either<Insertion, PlanFailure>,
): Effect.Effect<Insertion, FixFailure> {
	return Effect.gen(function* () {
		const buffer = yield* loadBuffer(store, filePath);
		const insertion = yield* plan(buffer);
		const patched = insertLines(buffer, insertion);
		yield* store.write(filePath, renderSourceBuffer(patched));
		return insertion;
	});
}
