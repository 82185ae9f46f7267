// Execute external commands as Effects
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string | CommandOutput, ExecError>
// INVARIANT: A process that ran and exited non-zero is an output, not an error
// COMPLEXITY: O(1) time, O(n) space where n = captured output length

import { exec } from "node:child_process";
import { promisify } from "node:util";

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import {
	type ExecFailure,
	extractStreamFromError,
} from "../../core/types/index.js";

const execAsync = promisify(exec);

const DEFAULT_MAX_BUFFER = 32 * 1024 * 1024;

/**
 * Captured result of a finished process.
 */
export interface CommandOutput {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

function toExecFailure(error: unknown): ExecFailure {
	return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute command with Effect pattern and stdout extraction.
 *
 * @param command - Shell command to execute
 * @param options - Optional execution options
 * @returns Effect with stdout, or ExecError when the command failed
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError, never>
 * @invariant non-zero exit with captured stdout → stdout
 */
export function execCommand(
	command: string,
	options?: { readonly maxBuffer?: number; readonly cwd?: string },
): Effect.Effect<string, ExecError> {
	return Effect.tryPromise({
		try: () =>
			execAsync(command, {
				maxBuffer: options?.maxBuffer ?? DEFAULT_MAX_BUFFER,
				...(options?.cwd === undefined ? {} : { cwd: options.cwd }),
			}),
		catch: toExecFailure,
	}).pipe(
		Effect.map(({ stdout }) => String(stdout)),
		Effect.catchAll((error): Effect.Effect<string, ExecError> => {
			const out = extractStreamFromError(error, "stdout");
			if (out !== null && out.length > 0) {
				return Effect.succeed(out);
			}
			return Effect.fail(new ExecError({ command, detail: error.message }));
		}),
	);
}

/**
 * Runs a command to completion and captures both streams and the exit status.
 *
 * @pure false (executes external command)
 * @effect Effect<CommandOutput, ExecError, never>
 * @invariant ExecError ⇔ the process did not run or its output overflowed
 */
export function runCapturing(
	command: string,
	options?: { readonly maxBuffer?: number; readonly cwd?: string },
): Effect.Effect<CommandOutput, ExecError> {
	return Effect.tryPromise({
		try: () =>
			execAsync(command, {
				maxBuffer: options?.maxBuffer ?? DEFAULT_MAX_BUFFER,
				...(options?.cwd === undefined ? {} : { cwd: options.cwd }),
			}),
		catch: toExecFailure,
	}).pipe(
		Effect.map(
			({ stdout, stderr }): CommandOutput => ({
				exitCode: 0,
				stdout: String(stdout),
				stderr: String(stderr),
			}),
		),
		Effect.catchAll((error): Effect.Effect<CommandOutput, ExecError> =>
			typeof error.code === "number"
				? Effect.succeed({
						exitCode: error.code,
						stdout: extractStreamFromError(error, "stdout") ?? "",
						stderr: extractStreamFromError(error, "stderr") ?? "",
					})
				: Effect.fail(new ExecError({ command, detail: error.message })),
		),
	);
}
