// Isolated temporary working trees for filesystem-backed tests

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary workspace.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary workspace
 * - cleanup() removes the temporary directory recursively
 */
export interface TempWorkspace {
	readonly cwd: string;
	readonly write: (relativePath: string, content: string) => void;
	readonly read: (relativePath: string) => string;
	readonly cleanup: () => void;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

/**
 * Create a temporary workspace with the given files (relative path → content).
 *
 * @example
 * const t = createTempWorkspace({ "src/Foo.java": "class Foo {}\n" });
 * // ... run tests ...
 * t.cleanup();
 */
export function createTempWorkspace(
	files: Readonly<Record<string, string>> = {},
): TempWorkspace {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "doclint-autofix-test-"));
	const write = (relativePath: string, content: string): void => {
		const target = path.join(cwd, relativePath);
		ensureDir(path.dirname(target));
		fs.writeFileSync(target, content, { encoding: "utf-8" });
	};
	for (const [relativePath, content] of Object.entries(files)) {
		write(relativePath, content);
	}
	return {
		cwd,
		write,
		read: (relativePath) => fs.readFileSync(path.join(cwd, relativePath), "utf8"),
		cleanup: () => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}
