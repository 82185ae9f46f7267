// Turn a classified issue plus a fresh buffer into one Insertion
// PURITY: CORE
// INVARIANT: A plan never touches storage; it only reads the buffer it is given
// COMPLEXITY: O(window) per plan

import { Either } from "effect";
import { match } from "ts-pattern";

import {
	describeReturn,
	describeTypeParameter,
	extractMethodName,
	summarizeMethod,
} from "../describe/synthesizer.js";
import { AnchorNotFound, type PlanFailure, SignatureNotFound } from "../errors.js";
import { locateAnchor, locateDeclaration } from "../patch/anchor.js";
import { type SourceBuffer, leadingWhitespace, lineAt } from "../patch/buffer.js";
import type {
	AnchorWindows,
	FixStrategy,
	Insertion,
	Issue,
} from "../types/index.js";

/**
 * Strategies that lead to a file mutation.
 */
export type FixableStrategy = Exclude<FixStrategy, { readonly _tag: "Unknown" }>;

export interface PlanOptions {
	readonly windows: AnchorWindows;
	readonly typeParameterDescriptions: Readonly<Record<string, string>>;
}

/**
 * @pure true
 */
export function isFixable(strategy: FixStrategy): strategy is FixableStrategy {
	return strategy._tag !== "Unknown";
}

/**
 * Annotation line placed inside an existing block, aligned on its terminator.
 *
 * @pure true
 * @example
 * ```ts
 * annotationLine("     *\/", "@return the list of items"); // "     * @return the list of items"
 * ```
 */
export function annotationLine(terminatorLine: string, tag: string): string {
	return `${leadingWhitespace(terminatorLine)}* ${tag}`;
}

/**
 * Three-line block for a declaration without any doc comment.
 *
 * @pure true
 * @postcondition result.length === 3
 */
export function commentBlock(indent: string, summary: string): readonly string[] {
	return [`${indent}/**`, `${indent} * ${summary}`, `${indent} */`];
}

function planAnnotation(
	buffer: SourceBuffer,
	issue: Issue,
	window: number,
	tag: string,
): Either.Either<Insertion, PlanFailure> {
	const anchor = locateAnchor(buffer, issue.line, window);
	const terminator = anchor === null ? null : lineAt(buffer, anchor);
	if (anchor === null || terminator === null) {
		return Either.left(
			new AnchorNotFound({ filePath: issue.filePath, line: issue.line, window }),
		);
	}
	return Either.right({ index: anchor, lines: [annotationLine(terminator, tag)] });
}

function planReturn(
	buffer: SourceBuffer,
	issue: Issue,
	window: number,
): Either.Either<Insertion, PlanFailure> {
	const declaration = lineAt(buffer, issue.line - 1);
	if (declaration === null) {
		return Either.left(
			new SignatureNotFound({ filePath: issue.filePath, line: issue.line }),
		);
	}
	return planAnnotation(buffer, issue, window, `@return ${describeReturn(declaration)}`);
}

function planMethodComment(
	buffer: SourceBuffer,
	issue: Issue,
): Either.Either<Insertion, PlanFailure> {
	const index = locateDeclaration(buffer, issue.line);
	const declaration = index === null ? null : lineAt(buffer, index);
	if (index === null || declaration === null) {
		return Either.left(
			new AnchorNotFound({ filePath: issue.filePath, line: issue.line, window: 0 }),
		);
	}
	const methodName = extractMethodName(declaration);
	if (methodName === null) {
		return Either.left(
			new SignatureNotFound({ filePath: issue.filePath, line: issue.line }),
		);
	}
	return Either.right({
		index,
		lines: commentBlock(leadingWhitespace(declaration), summarizeMethod(methodName)),
	});
}

/**
 * Computes the insertion that resolves an issue in the given buffer.
 *
 * @param strategy Classified strategy (Unknown excluded by type)
 * @param issue Issue whose `line` is already resolved against earlier insertions
 * @param buffer Buffer read fresh from storage
 *
 * @pure true
 * @invariant Right(insertion) → insertion.index ∈ [0, buffer.lines.length)
 */
export function planFix(
	strategy: FixableStrategy,
	issue: Issue,
	buffer: SourceBuffer,
	options: PlanOptions,
): Either.Either<Insertion, PlanFailure> {
	return match(strategy)
		.with({ _tag: "GenericParam" }, ({ name }) =>
			planAnnotation(
				buffer,
				issue,
				options.windows.generic,
				`@param <${name}> ${describeTypeParameter(name, options.typeParameterDescriptions)}`,
			),
		)
		.with({ _tag: "MissingReturn" }, () =>
			planReturn(buffer, issue, options.windows.return),
		)
		.with({ _tag: "MissingMethodComment" }, () =>
			planMethodComment(buffer, issue),
		)
		.exhaustive();
}
