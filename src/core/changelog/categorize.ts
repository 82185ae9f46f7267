// Categorise commits by emoji or keyword and extract issue references
// PURITY: CORE
// INVARIANT: First matching category wins; unmatched → Other Changes
// COMPLEXITY: O(k·m) where k = categories, m = keywords per category

import type {
	CategorizedCommit,
	CommitCategory,
	CommitRecord,
	ReleaseType,
} from "../types/index.js";

interface CategoryRule extends CommitCategory {
	readonly keywords: readonly string[];
}

/**
 * Matching order (not display order).
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
	{ emoji: "🧪", name: "Tests & Validation", keywords: ["test", "spec", "validation"] },
	{ emoji: "✅", name: "Features & Implementation", keywords: ["implement", "add", "feature"] },
	{ emoji: "🔥", name: "Major Features", keywords: ["major", "milestone", "revolutionary"] },
	{ emoji: "📚", name: "Documentation", keywords: ["docs", "documentation", "readme"] },
	{ emoji: "🔒", name: "Security & Dependencies", keywords: ["security", "upgrade", "vulnerability"] },
	{ emoji: "🏗️", name: "Infrastructure", keywords: ["infrastructure", "build", "ci"] },
	{ emoji: "🐛", name: "Bug Fixes", keywords: ["fix", "bug", "issue"] },
	{ emoji: "🚀", name: "Performance & Optimization", keywords: ["performance", "optimize", "improve"] },
	{ emoji: "📝", name: "Content Updates", keywords: ["update", "modify", "change"] },
];

export const OTHER_CATEGORY: CommitCategory = {
	emoji: "📋",
	name: "Other Changes",
};

/**
 * Display order of the "What's Changed" sections.
 */
export const CATEGORY_DISPLAY_ORDER: readonly string[] = [
	"Major Features",
	"Features & Implementation",
	"Tests & Validation",
	"Bug Fixes",
	"Documentation",
	"Security & Dependencies",
	"Performance & Optimization",
	"Infrastructure",
	"Content Updates",
	"Other Changes",
];

/**
 * @pure true
 * @example
 * ```ts
 * categorizeCommit("Fix flaky watcher").name; // "Bug Fixes"
 * categorizeCommit("📚 Describe agent flags").name; // "Documentation"
 * ```
 */
export function categorizeCommit(subject: string): CommitCategory {
	const lower = subject.toLowerCase();
	const rule = CATEGORY_RULES.find(
		(r) => subject.includes(r.emoji) || r.keywords.some((k) => lower.includes(k)),
	);
	return rule === undefined ? OTHER_CATEGORY : { emoji: rule.emoji, name: rule.name };
}

const ISSUE_REF_PATTERNS: readonly RegExp[] = [
	/\[#(\d+)\]/gu,
	/#(\d+)/gu,
	/\[([^\]]+)\]/gu,
];

/**
 * Issue references in a subject: `[#12]`, `#12`, `[ABC-7]`.
 *
 * @pure true
 * @invariant `#N` forms are normalised to `N`; result has no duplicates
 */
export function extractIssueRefs(subject: string): readonly string[] {
	const refs = ISSUE_REF_PATTERNS.flatMap((pattern) =>
		[...subject.matchAll(pattern)].map((m) => m[1] ?? ""),
	)
		.map((ref) => (/^#\d+$/u.test(ref) ? ref.slice(1) : ref))
		.filter((ref) => ref.length > 0);
	return [...new Set(refs)];
}

/**
 * @pure true
 */
export function categorizeCommits(
	commits: readonly CommitRecord[],
): readonly CategorizedCommit[] {
	return commits.map((commit) => {
		const category = categorizeCommit(commit.subject);
		return {
			...commit,
			emoji: category.emoji,
			category: category.name,
			issueRefs: extractIssueRefs(commit.subject),
		};
	});
}

/**
 * @pure true
 * @example
 * ```ts
 * releaseTypeOf("1.4.0");          // "stable"
 * releaseTypeOf("milestone-7");    // "milestone"
 * releaseTypeOf("v2.0.0-rc1");     // "stable"
 * releaseTypeOf("nightly");        // "development"
 * ```
 */
export function releaseTypeOf(tag: string): ReleaseType {
	if (/^\d+\.\d+\.\d+$/u.test(tag)) return "stable";
	if (tag.includes("milestone")) return "milestone";
	if (tag.startsWith("v")) return "stable";
	return "development";
}
