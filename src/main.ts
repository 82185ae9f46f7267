// Programmatic entry: parse CLI options and delegate to the app layer
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import * as path from "node:path";

import { Effect } from "effect";
import { match } from "ts-pattern";

import { formatBuildDate, runChangelog } from "./app/runChangelog.js";
import { runFixer } from "./app/runFixer.js";
import { computeExitCode } from "./core/decision.js";
import type { ExitCode } from "./core/models.js";
import type {
	ChangelogCommandOptions,
	CLIOptions,
	FixCommandOptions,
	HelpCommandOptions,
} from "./core/types/index.js";
import { parseCLIArgs, USAGE } from "./shell/config/cli.js";
import { loadFixerConfig } from "./shell/config/loader.js";
import { scriptDiagnosticsSource } from "./shell/diagnostics/collector.js";
import { nodeFileStore } from "./shell/fs/store.js";
import { fetchCommitLog } from "./shell/git/log.js";

function fix(options: FixCommandOptions): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const config = yield* loadFixerConfig(options.configPath);
		const command = options.script ?? config.diagnosticsCommand;
		yield* runFixer(
			{
				diagnostics: scriptDiagnosticsSource(command),
				store: nodeFileStore(),
			},
			{
				dedupe: config.dedupe && !options.noDedupe,
				windows: config.windows,
				typeParameterDescriptions: config.typeParameterDescriptions,
			},
		);
		// Partial fixes are expected; only an unusable setup is fatal
		return computeExitCode({ fatal: false });
	}).pipe(
		Effect.catchTag("ConfigError", (error) => {
			console.error(`❌ Cannot load ${error.path}: ${error.detail}`);
			return Effect.succeed(computeExitCode({ fatal: true }));
		}),
	);
}

function changelog(options: ChangelogCommandOptions): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const config = yield* loadFixerConfig(options.configPath);
		const report = yield* runChangelog(fetchCommitLog, options.range, {
			projectName: path.basename(process.cwd()),
			tag: options.tag,
			repository: options.repository ?? config.repository,
			commitSha: process.env["GITHUB_SHA"] ?? "unknown",
			buildDate: formatBuildDate(new Date()),
			rangeDescription: options.rangeDescription,
		});
		console.log(report);
		return computeExitCode({ fatal: false });
	}).pipe(
		Effect.catchTags({
			ConfigError: (error) => {
				console.error(`❌ Cannot load ${error.path}: ${error.detail}`);
				return Effect.succeed(computeExitCode({ fatal: true }));
			},
			Exec: (error) => {
				console.error(`❌ ${error.command} failed: ${error.detail}`);
				return Effect.succeed(computeExitCode({ fatal: true }));
			},
		}),
	);
}

function help(options: HelpCommandOptions): Effect.Effect<ExitCode> {
	return Effect.sync(() => {
		if (options.problem !== undefined) console.error(`❌ ${options.problem}`);
		console.log(USAGE);
		return computeExitCode({ fatal: options.problem !== undefined });
	});
}

/**
 * Runs the command described by already-parsed options.
 *
 * @pure false (delegates to app orchestration)
 * @effect Effect<ExitCode, never>
 */
export function runCommand(options: CLIOptions): Effect.Effect<ExitCode> {
	return match(options)
		.with({ command: "fix" }, fix)
		.with({ command: "changelog" }, changelog)
		.with({ command: "help" }, help)
		.exhaustive();
}

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args Arguments after the script name
 * @returns ExitCode (0 | 1)
 *
 * @pure false, but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(runCommand(parseCLIArgs(args)));
}

export { runChangelog } from "./app/runChangelog.js";
export { fixIssue, runFixer } from "./app/runFixer.js";
export { classifyIssue } from "./core/diagnostics/classifier.js";
export { collectIssues, parseDiagnostics } from "./core/diagnostics/parser.js";
export type { FixResult, Issue, RunSummary } from "./core/types/index.js";
