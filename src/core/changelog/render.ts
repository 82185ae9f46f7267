// Render categorised commits as Markdown release notes
// PURITY: CORE
// INVARIANT: Sections appear in CATEGORY_DISPLAY_ORDER; empty sections are omitted
// COMPLEXITY: O(n) where n = |commits|

import type {
	CategorizedCommit,
	ChangelogOptions,
} from "../types/index.js";
import {
	CATEGORY_DISPLAY_ORDER,
	CATEGORY_RULES,
	OTHER_CATEGORY,
	releaseTypeOf,
} from "./categorize.js";

const EMOJI_BY_CATEGORY: ReadonlyMap<string, string> = new Map(
	[...CATEGORY_RULES, OTHER_CATEGORY].map((c) => [c.name, c.emoji]),
);

/**
 * @pure true
 */
export function groupByCategory(
	commits: readonly CategorizedCommit[],
): ReadonlyMap<string, readonly CategorizedCommit[]> {
	const groups = new Map<string, CategorizedCommit[]>();
	for (const commit of commits) {
		const group = groups.get(commit.category);
		if (group === undefined) {
			groups.set(commit.category, [commit]);
		} else {
			group.push(commit);
		}
	}
	return groups;
}

function formatIssueRef(ref: string, repoUrl: string): string {
	return /^\d+$/u.test(ref) ? `[#${ref}](${repoUrl}/issues/${ref})` : `[${ref}]`;
}

/**
 * One bullet: subject, commit link, optional issue links.
 *
 * @pure true
 * @example
 * ```ts
 * // "- Fix watcher (#4) ([a1b2c3d](https://github.com/acme/tool/commit/a1b2c3d)) ([#4](https://github.com/acme/tool/issues/4))"
 * ```
 */
export function formatCommitEntry(
	commit: CategorizedCommit,
	repository: string,
): string {
	const repoUrl = `https://github.com/${repository}`;
	const commitLink = `[${commit.hash}](${repoUrl}/commit/${commit.hash})`;
	const refs = commit.issueRefs.map((ref) => formatIssueRef(ref, repoUrl));
	const issueInfo = refs.length > 0 ? ` (${refs.join(", ")})` : "";
	return `- ${commit.subject} (${commitLink})${issueInfo}`;
}

function renderHeader(
	commitCount: number,
	options: ChangelogOptions,
): readonly string[] {
	const repoUrl = `https://github.com/${options.repository}`;
	const shortSha = options.commitSha.slice(0, 8);
	return [
		`# ${options.projectName} ${options.tag}`,
		"",
		`> **Release Type:** ${releaseTypeOf(options.tag)}  `,
		`> **Build Date:** ${options.buildDate}  `,
		`> **Commit:** [${shortSha}](${repoUrl}/commit/${options.commitSha})  `,
		`> **Changes:** ${commitCount} commits ${options.rangeDescription}`.trimEnd(),
		"",
		"## What's Changed",
		"",
	];
}

function renderSections(
	commits: readonly CategorizedCommit[],
	repository: string,
): readonly string[] {
	const groups = groupByCategory(commits);
	return CATEGORY_DISPLAY_ORDER.flatMap((name) => {
		const group = groups.get(name);
		if (group === undefined) return [];
		const emoji = EMOJI_BY_CATEGORY.get(name) ?? OTHER_CATEGORY.emoji;
		return [
			`### ${emoji} ${name}`,
			"",
			...group.map((c) => formatCommitEntry(c, repository)),
			"",
		];
	});
}

const MILESTONE_NOTES: readonly string[] = [
	"## 🎯 Milestone Information",
	"",
	"This is a milestone release; it may include experimental features.",
	"",
	"**Migration Guide:**",
	"1. **Update the artifact:** replace the previous release",
	"2. **Review configuration:** check the documentation for changed settings",
	"3. **Test thoroughly:** milestone releases may change behaviour",
	"",
];

/**
 * Renders the complete report.
 *
 * @param commits Categorised commits, most recent first
 * @pure true
 * @postcondition result ends with a single "\n"
 */
export function renderChangelog(
	commits: readonly CategorizedCommit[],
	options: ChangelogOptions,
): string {
	const repoUrl = `https://github.com/${options.repository}`;
	const lines = [
		...renderHeader(commits.length, options),
		...renderSections(commits, options.repository),
		...(releaseTypeOf(options.tag) === "milestone" ? MILESTONE_NOTES : []),
		"---",
		"",
		`🔗 **Repository:** [${options.repository}](${repoUrl})`,
	];
	return `${lines.join("\n")}\n`;
}
