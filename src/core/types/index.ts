// Central export file for all type definitions

export type {
	CategorizedCommit,
	ChangelogOptions,
	CommitCategory,
	CommitRecord,
	ReleaseType,
} from "./changelog.js";
export type {
	AnchorWindows,
	ChangelogCommandOptions,
	CLIOptions,
	ExecFailure,
	FixCommandOptions,
	FixerConfig,
	HelpCommandOptions,
} from "./config.js";
export { extractStreamFromError } from "./exec-helpers.js";
export type {
	FixOutcome,
	FixResult,
	FixStrategyTag,
	Insertion,
	Issue,
	RunSummary,
} from "./issue.js";
export { FixStrategy } from "./issue.js";
