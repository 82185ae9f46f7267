// Command-line parsing for the `fix` and `changelog` commands
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Never throws; malformed input yields { command: "help", problem }

import type { CLIOptions } from "../../core/types/index.js";

interface ArgState {
	readonly positionals: readonly string[];
	readonly configPath?: string;
	readonly script?: string;
	readonly repository?: string;
	readonly noDedupe: boolean;
	readonly help: boolean;
	readonly problem?: string;
}

type ValueKey = "configPath" | "script" | "repository";

const valueFlags: Readonly<Record<string, ValueKey>> = {
	"--config": "configPath",
	"--script": "script",
	"--repo": "repository",
};

function withValue(state: ArgState, key: ValueKey, value: string): ArgState {
	switch (key) {
		case "configPath":
			return { ...state, configPath: value };
		case "script":
			return { ...state, script: value };
		case "repository":
			return { ...state, repository: value };
	}
}

/**
 * Applies one argument; returns how many arguments were consumed.
 */
function processArgument(
	args: readonly string[],
	index: number,
	state: ArgState,
): { readonly state: ArgState; readonly consumed: number } {
	const arg = args[index] ?? "";
	const key = Object.hasOwn(valueFlags, arg) ? valueFlags[arg] : undefined;
	if (key !== undefined) {
		const value = args[index + 1];
		if (value === undefined || value.startsWith("--")) {
			return { state: { ...state, problem: `${arg} requires a value` }, consumed: 1 };
		}
		return { state: withValue(state, key, value), consumed: 2 };
	}
	if (arg === "--no-dedupe") {
		return { state: { ...state, noDedupe: true }, consumed: 1 };
	}
	if (arg === "--help" || arg === "-h") {
		return { state: { ...state, help: true }, consumed: 1 };
	}
	if (arg.startsWith("--")) {
		return { state: { ...state, problem: `unknown option ${arg}` }, consumed: 1 };
	}
	return {
		state: { ...state, positionals: [...state.positionals, arg] },
		consumed: 1,
	};
}

function toOptions(state: ArgState): CLIOptions {
	if (state.problem !== undefined) {
		return { command: "help", problem: state.problem };
	}
	const [command = "fix", ...rest] = state.positionals;
	if (state.help || command === "help") return { command: "help" };

	if (command === "fix") {
		return {
			command: "fix",
			noDedupe: state.noDedupe,
			...(state.configPath === undefined ? {} : { configPath: state.configPath }),
			...(state.script === undefined ? {} : { script: state.script }),
		};
	}
	if (command === "changelog") {
		const [tag, range, description] = rest;
		if (tag === undefined) {
			return { command: "help", problem: "changelog requires a <tag>" };
		}
		return {
			command: "changelog",
			tag,
			rangeDescription: description ?? "",
			...(range === undefined || range === "" ? {} : { range }),
			...(state.configPath === undefined ? {} : { configPath: state.configPath }),
			...(state.repository === undefined ? {} : { repository: state.repository }),
		};
	}
	return { command: "help", problem: `unknown command ${command}` };
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Arguments after the script name
 * @returns Parsed options; `fix` is the default command
 *
 * @example
 * ```ts
 * parseCLIArgs(["fix", "--script", "bash lint-docs.sh"]);
 * // { command: "fix", noDedupe: false, script: "bash lint-docs.sh" }
 * parseCLIArgs(["changelog", "v1.2.0", "v1.1.0..HEAD", "since v1.1.0"]);
 * // { command: "changelog", tag: "v1.2.0", range: "v1.1.0..HEAD", rangeDescription: "since v1.1.0" }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: ArgState = { positionals: [], noDedupe: false, help: false };
	let index = 0;
	while (index < args.length) {
		// An empty range placeholder is meaningful after `changelog <tag>`
		if ((args[index] ?? "").length === 0 && state.positionals.length === 0) {
			index += 1;
			continue;
		}
		const next = processArgument(args, index, state);
		state = next.state;
		index += next.consumed;
	}
	return toOptions(state);
}

export const USAGE = [
	"Usage:",
	"  doclint-autofix fix [--script <command>] [--no-dedupe] [--config <path>]",
	"  doclint-autofix changelog <tag> [range] [description] [--repo owner/name] [--config <path>]",
].join("\n");
