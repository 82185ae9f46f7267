// Diagnostics collaborator: run the doc-lint script, keep its stderr
// PURITY: SHELL
// EFFECT: Effect<DiagnosticsOutput, ExecError>

import { Effect } from "effect";

import type { ExecError } from "../../core/errors.js";
import { runCapturing } from "../utils/exec.js";

export interface DiagnosticsOutput {
	readonly exitCode: number;
	readonly text: string;
}

/**
 * One diagnostics pass. Evaluated once before and once after fixing.
 */
export type DiagnosticsSource = Effect.Effect<DiagnosticsOutput, ExecError>;

/**
 * Diagnostics from a shell command's standard error.
 *
 * @param command e.g. "bash .github/scripts/validate-all-javadoc.sh"
 * @pure false (spawns a process each time the effect runs)
 * @invariant a non-zero exit status is normal for a linter with findings
 */
export function scriptDiagnosticsSource(
	command: string,
	cwd?: string,
): DiagnosticsSource {
	return runCapturing(command, cwd === undefined ? undefined : { cwd }).pipe(
		Effect.map(({ exitCode, stderr }) => ({ exitCode, text: stderr })),
	);
}
