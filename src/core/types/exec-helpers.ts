// Common exec error handling helper
// PURITY: CORE

import type { ExecFailure } from "./config.js";

/**
 * Returns the captured stream of a failed command, if the process ran at all.
 *
 * @param error Ошибка выполнения (any Error is an ExecFailure without streams)
 * @param stream Which captured stream to extract
 * @returns captured text or null
 *
 * @pure true
 * @invariant stream absent or not a string → null
 */
export function extractStreamFromError(
	error: ExecFailure,
	stream: "stdout" | "stderr",
): string | null {
	const value = error[stream];
	return typeof value === "string" ? value : null;
}
