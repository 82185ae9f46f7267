// Commit and changelog types
// PURITY: CORE

/**
 * One `git log` record: `hash|subject|author|email|date`.
 */
export interface CommitRecord {
	readonly hash: string;
	readonly subject: string;
	readonly author: string;
	readonly email: string;
	readonly date: string;
}

export interface CommitCategory {
	readonly emoji: string;
	readonly name: string;
}

export interface CategorizedCommit extends CommitRecord {
	readonly emoji: string;
	readonly category: string;
	readonly issueRefs: readonly string[];
}

export type ReleaseType = "stable" | "milestone" | "development";

/**
 * Inputs of the Markdown renderer besides the commits.
 *
 * @property buildDate Preformatted build timestamp
 * @property rangeDescription Free text such as "since v1.2.0"
 */
export interface ChangelogOptions {
	readonly projectName: string;
	readonly tag: string;
	readonly repository: string;
	readonly commitSha: string;
	readonly buildDate: string;
	readonly rangeDescription: string;
}
