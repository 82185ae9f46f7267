// Source file storage: full read, full overwrite
// PURITY: SHELL
// EFFECT: Effect<string | void, IOFailure>
// INVARIANT: write replaces the whole file; no partial writes, no backups

import { readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";

import { Effect } from "effect";

import { IOFailure } from "../../core/errors.js";

/**
 * Where source files are read from and written back to.
 */
export interface SourceFileStore {
	readonly read: (filePath: string) => Effect.Effect<string, IOFailure>;
	readonly write: (
		filePath: string,
		content: string,
	) => Effect.Effect<void, IOFailure>;
}

function detailOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * UTF-8 files on disk, relative paths resolved against `root`.
 *
 * @param root Working tree root (defaults to process.cwd())
 * @pure false (filesystem I/O when the effects run)
 */
export function nodeFileStore(root = process.cwd()): SourceFileStore {
	const resolve = (filePath: string): string => path.resolve(root, filePath);
	return {
		read: (filePath) =>
			Effect.tryPromise({
				try: () => readFile(resolve(filePath), "utf8"),
				catch: (error) =>
					new IOFailure({ filePath, operation: "read", detail: detailOf(error) }),
			}),
		write: (filePath, content) =>
			Effect.tryPromise({
				try: () => writeFile(resolve(filePath), content, "utf8"),
				catch: (error) =>
					new IOFailure({ filePath, operation: "write", detail: detailOf(error) }),
			}),
	};
}
