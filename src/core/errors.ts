// Typed domain errors for the patcher and changelog, built on Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * No documentation-block terminator (or declaration line) inside the scan window.
 *
 * @pure true (Data class)
 * @invariant line >= 1 ∧ window >= 0
 */
export class AnchorNotFound extends Data.TaggedError("AnchorNotFound")<{
	readonly filePath: string;
	readonly line: number;
	readonly window: number;
}> {}

/**
 * Declaration line carries no `name(` pattern, so no summary can be synthesized.
 *
 * @pure true (Data class)
 */
export class SignatureNotFound extends Data.TaggedError("SignatureNotFound")<{
	readonly filePath: string;
	readonly line: number;
}> {}

/**
 * Reading or rewriting a source file failed.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class IOFailure extends Data.TaggedError("IOFailure")<{
	readonly filePath: string;
	readonly operation: "read" | "write";
	readonly detail: string;
}> {}

/**
 * Command execution error (diagnostics script, git)
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Explicitly requested configuration file could not be read or parsed.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Failures a single fix attempt can end in.
 * Each one is folded into a FixResult; none of them aborts a run.
 */
export type FixFailure = AnchorNotFound | SignatureNotFound | IOFailure;

/**
 * Failures of the pure planning step (no I/O involved).
 */
export type PlanFailure = AnchorNotFound | SignatureNotFound;

/**
 * Human-readable reason for a fix failure, used in FixResult and console output.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeFixFailure(failure: FixFailure): string {
	return match(failure)
		.with(
			{ _tag: "AnchorNotFound" },
			({ window, line }) =>
				`no doc-comment terminator within ${window} lines above line ${line}`,
		)
		.with(
			{ _tag: "SignatureNotFound" },
			({ line }) => `no method signature on line ${line}`,
		)
		.with(
			{ _tag: "IOFailure" },
			({ operation, detail }) => `${operation} failed: ${detail}`,
		)
		.exhaustive();
}
