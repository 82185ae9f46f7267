// Map issue messages to fix strategies through an explicit table of shapes
// PURITY: CORE
// INVARIANT: First matching shape wins; no match → Unknown
// COMPLEXITY: O(k) where k = |MESSAGE_SHAPES|

import { FixStrategy, type Issue } from "../types/index.js";

export type MessageShapeName =
	| "generic-param"
	| "missing-return"
	| "missing-comment";

/**
 * One diagnostic message shape with its own capture rule.
 *
 * @invariant build returns null when the captures do not fit the shape
 */
export interface MessageShape {
	readonly name: MessageShapeName;
	readonly pattern: RegExp;
	readonly exclude?: RegExp;
	readonly build: (match: RegExpExecArray) => FixStrategy | null;
}

/**
 * Ordered shapes; a message could satisfy several, the earliest wins.
 */
export const MESSAGE_SHAPES: readonly MessageShape[] = [
	{
		name: "generic-param",
		pattern: /no @param for <([^>]+)>/u,
		build: (match) => {
			const name = match[1]?.trim() ?? "";
			return name.length > 0 ? FixStrategy.GenericParam({ name }) : null;
		},
	},
	{
		name: "missing-return",
		pattern: /no @return/u,
		build: () => FixStrategy.MissingReturn(),
	},
	{
		name: "missing-comment",
		pattern: /no comment/u,
		// package-level constructs (package-info) are not auto-fixed
		exclude: /package/u,
		build: () => FixStrategy.MissingMethodComment(),
	},
];

interface ShapeMatch {
	readonly shape: MessageShape;
	readonly strategy: FixStrategy;
}

function matchShape(message: string): ShapeMatch | null {
	for (const shape of MESSAGE_SHAPES) {
		if (shape.exclude?.test(message) === true) continue;
		const match = shape.pattern.exec(message);
		if (match === null) continue;
		const strategy = shape.build(match);
		if (strategy !== null) return { shape, strategy };
	}
	return null;
}

/**
 * Name of the shape a message matches, or null.
 *
 * @pure true
 */
export function messageShapeOf(message: string): MessageShapeName | null {
	return matchShape(message)?.shape.name ?? null;
}

/**
 * Classifies an issue by its message.
 *
 * @pure true
 * @invariant messageShapeOf(issue.message) === null → result._tag === "Unknown"
 *
 * @example
 * ```ts
 * classifyIssue({ filePath: "A.java", line: 3, message: "warning: no @param for <K>" });
 * // FixStrategy.GenericParam({ name: "K" })
 * ```
 */
export function classifyIssue(issue: Issue): FixStrategy {
	return matchShape(issue.message)?.strategy ?? FixStrategy.Unknown();
}
