// Load doclint-autofix.config.json over built-in defaults
// PURITY: SHELL (reads filesystem and environment)
// EFFECT: Effect<FixerConfig, ConfigError>
// INVARIANT: Invalid individual fields fall back to defaults

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import { GENERIC_WINDOW, RETURN_WINDOW } from "../../core/patch/anchor.js";
import type { AnchorWindows, FixerConfig } from "../../core/types/index.js";

export const CONFIG_FILE_NAME = "doclint-autofix.config.json";

export const DEFAULT_DIAGNOSTICS_COMMAND =
	"bash .github/scripts/validate-all-javadoc.sh";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return (
		value !== undefined &&
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

function isNonEmptyString(value: JSONValue | undefined): value is string {
	return typeof value === "string" && value.trim().length > 0;
}

function isPositiveInteger(value: JSONValue | undefined): value is number {
	return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/**
 * Defaults, with the repository taken from GITHUB_REPOSITORY when set.
 *
 * @pure false (reads process.env)
 */
export function defaultFixerConfig(
	env: NodeJS.ProcessEnv = process.env,
): FixerConfig {
	return {
		diagnosticsCommand: DEFAULT_DIAGNOSTICS_COMMAND,
		dedupe: true,
		windows: { generic: GENERIC_WINDOW, return: RETURN_WINDOW },
		typeParameterDescriptions: {},
		repository: env["GITHUB_REPOSITORY"] ?? "local/repository",
	};
}

function validateWindows(
	value: JSONValue | undefined,
	fallback: AnchorWindows,
): AnchorWindows {
	if (!isJSONObject(value)) return fallback;
	const generic = value["generic"];
	const ret = value["return"];
	return {
		generic: isPositiveInteger(generic) ? generic : fallback.generic,
		return: isPositiveInteger(ret) ? ret : fallback.return,
	};
}

function validateDescriptions(
	value: JSONValue | undefined,
): Readonly<Record<string, string>> {
	if (!isJSONObject(value)) return {};
	const entries = Object.entries(value).filter(
		(entry): entry is [string, string] => isNonEmptyString(entry[1]),
	);
	return Object.fromEntries(entries);
}

/**
 * Merges a parsed config document over defaults.
 *
 * @pure true
 * @invariant non-object documents yield the defaults unchanged
 */
export function mergeFixerConfig(
	parsed: JSONValue,
	defaults: FixerConfig,
): FixerConfig {
	if (!isJSONObject(parsed)) return defaults;
	const command = parsed["diagnosticsCommand"];
	const dedupe = parsed["dedupe"];
	const repository = parsed["repository"];
	return {
		diagnosticsCommand: isNonEmptyString(command)
			? command
			: defaults.diagnosticsCommand,
		dedupe: typeof dedupe === "boolean" ? dedupe : defaults.dedupe,
		windows: validateWindows(parsed["windows"], defaults.windows),
		typeParameterDescriptions: {
			...defaults.typeParameterDescriptions,
			...validateDescriptions(parsed["typeParameterDescriptions"]),
		},
		repository: isNonEmptyString(repository) ? repository : defaults.repository,
	};
}

function readJson(configPath: string): JSONValue {
	return JSON.parse(fs.readFileSync(configPath, "utf8")) as JSONValue;
}

/**
 * Загружает конфигурацию из doclint-autofix.config.json.
 *
 * @param explicitPath Path given on the command line; failures are then errors
 * @returns Effect with the merged configuration
 *
 * @pure false (reads filesystem)
 * @invariant explicitPath === undefined → never fails (missing or broken file → defaults)
 */
export function loadFixerConfig(
	explicitPath?: string,
	cwd = process.cwd(),
): Effect.Effect<FixerConfig, ConfigError> {
	const defaults = defaultFixerConfig();
	const configPath = path.resolve(cwd, explicitPath ?? CONFIG_FILE_NAME);
	return Effect.try({
		try: () => mergeFixerConfig(readJson(configPath), defaults),
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: error instanceof Error ? error.message : String(error),
			}),
	}).pipe(
		Effect.catchAll((error): Effect.Effect<FixerConfig, ConfigError> =>
			explicitPath === undefined ? Effect.succeed(defaults) : Effect.fail(error),
		),
	);
}
