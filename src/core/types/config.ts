// Configuration and CLI option types
// PURITY: CORE
// INVARIANT: Options are plain immutable records

/**
 * Scan windows for anchor lookup, counted in lines above the reported line.
 */
export interface AnchorWindows {
	readonly generic: number;
	readonly return: number;
}

/**
 * Fixer configuration from doclint-autofix.config.json merged over defaults.
 *
 * @property diagnosticsCommand Shell command whose stderr carries diagnostics
 * @property dedupe Drop duplicate (file, line, message) issues
 * @property typeParameterDescriptions Extra or overriding `@param <X>` phrases
 * @property repository `owner/name` used for changelog links
 */
export interface FixerConfig {
	readonly diagnosticsCommand: string;
	readonly dedupe: boolean;
	readonly windows: AnchorWindows;
	readonly typeParameterDescriptions: Readonly<Record<string, string>>;
	readonly repository: string;
}

export interface FixCommandOptions {
	readonly command: "fix";
	readonly configPath?: string;
	readonly script?: string;
	readonly noDedupe: boolean;
}

export interface ChangelogCommandOptions {
	readonly command: "changelog";
	readonly configPath?: string;
	readonly tag: string;
	readonly range?: string;
	readonly rangeDescription: string;
	readonly repository?: string;
}

export interface HelpCommandOptions {
	readonly command: "help";
	readonly problem?: string;
}

/**
 * Parsed command line.
 */
export type CLIOptions =
	| FixCommandOptions
	| ChangelogCommandOptions
	| HelpCommandOptions;

/**
 * Тип ошибки при выполнении команды с доступом к stdout/stderr.
 *
 * @property stdout Стандартный вывод команды
 * @property stderr Стандартный вывод ошибок
 * @property code Exit status when the process ran and exited non-zero
 */
export interface ExecFailure extends Error {
	readonly stdout?: string;
	readonly stderr?: string;
	readonly code?: number | string;
}
