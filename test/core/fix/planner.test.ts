// CHANGE: Unit tests for fix planning
// INVARIANT: Right(insertion) → insertion.index ∈ [0, buffer.lines.length)
// PURITY: CORE

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { PlanFailure } from "../../../src/core/errors.js";
import {
	annotationLine,
	commentBlock,
	isFixable,
	type PlanOptions,
	planFix,
} from "../../../src/core/fix/planner.js";
import { toSourceBuffer } from "../../../src/core/patch/buffer.js";
import { FixStrategy, type Insertion } from "../../../src/core/types/index.js";
import { issue, lines } from "../../utils/builders.js";

const options: PlanOptions = {
	windows: { generic: 18, return: 13 },
	typeParameterDescriptions: {},
};

const rightOf = (e: Either.Either<Insertion, PlanFailure>): Insertion | null =>
	Either.isRight(e) ? e.right : null;

const leftOf = (e: Either.Either<Insertion, PlanFailure>): PlanFailure | null =>
	Either.isLeft(e) ? e.left : null;

const boxClass = toSourceBuffer(
	lines("package demo;", "", "/**", " * Box.", " */", "public class Box<T> {", "}"),
);

const itemsMethod = toSourceBuffer(
	lines(
		"class Shelf {",
		"    /**",
		"     * Items.",
		"     */",
		"    public List<Item> items() {",
		"        return items;",
		"    }",
		"    public String getName() {",
		"    private int count;",
		"}",
	),
);

describe("annotationLine / commentBlock", () => {
	it("aligns on the terminator", (): void => {
		expect(annotationLine(" */", "@return x")).toBe(" * @return x");
		expect(annotationLine("\t */", "@return x")).toBe("\t * @return x");
	});

	it("builds a three-line block", (): void => {
		expect(commentBlock("  ", "Sets the value.")).toEqual([
			"  /**",
			"   * Sets the value.",
			"   */",
		]);
	});
});

describe("planFix: GenericParam", () => {
	it("adds @param above the terminator", (): void => {
		const plan = planFix(
			FixStrategy.GenericParam({ name: "T" }),
			issue({ line: 6 }),
			boxClass,
			options,
		);
		expect(rightOf(plan)).toEqual({
			index: 4,
			lines: [" * @param <T> the type parameter"],
		});
	});

	it("uses configured descriptions", (): void => {
		const plan = planFix(
			FixStrategy.GenericParam({ name: "T" }),
			issue({ line: 6 }),
			boxClass,
			{ ...options, typeParameterDescriptions: { T: "the boxed value type" } },
		);
		expect(rightOf(plan)?.lines).toEqual([" * @param <T> the boxed value type"]);
	});

	it("fails when no terminator is inside the window", (): void => {
		const plan = planFix(
			FixStrategy.GenericParam({ name: "T" }),
			issue({ line: 7 }),
			boxClass,
			{ ...options, windows: { generic: 1, return: 13 } },
		);
		expect(leftOf(plan)).toMatchObject({
			_tag: "AnchorNotFound",
			filePath: "src/Foo.java",
			line: 7,
			window: 1,
		});
	});
});

describe("planFix: MissingReturn", () => {
	it("describes the return type of the declaration", (): void => {
		const plan = planFix(
			FixStrategy.MissingReturn(),
			issue({ line: 5 }),
			itemsMethod,
			options,
		);
		expect(rightOf(plan)).toEqual({
			index: 3,
			lines: ["     * @return the list of items"],
		});
	});
});

describe("planFix: MissingReturn past the end of the file", () => {
	it("fails instead of annotating an earlier block", (): void => {
		const short = toSourceBuffer(lines("/**", " * x", " */", "int f();"));
		const plan = planFix(
			FixStrategy.MissingReturn(),
			issue({ filePath: "R.java", line: 9 }),
			short,
			options,
		);
		expect(leftOf(plan)).toMatchObject({
			_tag: "SignatureNotFound",
			filePath: "R.java",
			line: 9,
		});
	});
});

describe("planFix: MissingMethodComment", () => {
	it("adds a block before the declaration", (): void => {
		const plan = planFix(
			FixStrategy.MissingMethodComment(),
			issue({ line: 8 }),
			itemsMethod,
			options,
		);
		expect(rightOf(plan)).toEqual({
			index: 7,
			lines: ["    /**", "     * Gets the name.", "     */"],
		});
	});

	it("fails without a method signature", (): void => {
		const plan = planFix(
			FixStrategy.MissingMethodComment(),
			issue({ line: 9 }),
			itemsMethod,
			options,
		);
		expect(leftOf(plan)).toMatchObject({ _tag: "SignatureNotFound", line: 9 });
	});

	it("fails past the end of the file", (): void => {
		const plan = planFix(
			FixStrategy.MissingMethodComment(),
			issue({ line: 99 }),
			itemsMethod,
			options,
		);
		expect(leftOf(plan)).toMatchObject({ _tag: "AnchorNotFound", window: 0 });
	});
});

describe("isFixable", () => {
	it("excludes Unknown only", (): void => {
		expect(isFixable(FixStrategy.Unknown())).toBe(false);
		expect(isFixable(FixStrategy.MissingReturn())).toBe(true);
	});
});
