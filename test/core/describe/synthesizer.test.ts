// CHANGE: Unit tests for description synthesis
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	describeReturn,
	describeTypeParameter,
	extractMethodName,
	FALLBACK_TYPE_PARAMETER_DESCRIPTION,
	summarizeMethod,
	TYPE_PARAMETER_DESCRIPTIONS,
} from "../../../src/core/describe/synthesizer.js";

describe("describeTypeParameter", () => {
	it("uses the conventional table", (): void => {
		expect(describeTypeParameter("T")).toBe("the type parameter");
		expect(describeTypeParameter("E")).toBe("the element type parameter");
		expect(describeTypeParameter("CH")).toBe("the command handler type parameter");
		expect(describeTypeParameter("S2")).toBe("the target state type parameter");
	});

	it("covers every documented name", (): void => {
		expect(Object.keys(TYPE_PARAMETER_DESCRIPTIONS)).toEqual([
			"T", "E", "K", "V", "C", "O", "R", "CH", "F", "VO", "S", "S1", "S2", "P",
		]);
	});

	it("falls back for unknown names", (): void => {
		expect(describeTypeParameter("Q")).toBe(FALLBACK_TYPE_PARAMETER_DESCRIPTION);
		expect(describeTypeParameter("toString")).toBe("the type parameter");
	});

	it("lets overrides win over the table", (): void => {
		const overrides = { T: "the payload type", ID: "the identifier type" };
		expect(describeTypeParameter("T", overrides)).toBe("the payload type");
		expect(describeTypeParameter("ID", overrides)).toBe("the identifier type");
		expect(describeTypeParameter("E", overrides)).toBe("the element type parameter");
	});
});

describe("describeReturn", () => {
	it("follows the hint priority", (): void => {
		expect(describeReturn("public boolean isReady() {")).toBe(
			"true if successful, false otherwise",
		);
		expect(describeReturn("public String toString() {")).toBe(
			"the string representation",
		);
		expect(describeReturn("public List<Item> items() {")).toBe("the list of items");
		expect(describeReturn("public Optional<Item> find(int id) {")).toBe(
			"an optional containing the result",
		);
		expect(describeReturn("public Optional<String> find(int id) {")).toBe(
			"the string representation",
		);
	});

	it("falls back to a generic phrase", (): void => {
		expect(describeReturn("public int size() {")).toBe("the result of the operation");
		expect(describeReturn("")).toBe("the result of the operation");
	});
});

describe("extractMethodName", () => {
	it("takes the first identifier followed by a parenthesis", (): void => {
		expect(extractMethodName("    public String getName() {")).toBe("getName");
		expect(extractMethodName("public Box(int size) {")).toBe("Box");
		expect(extractMethodName("<T> T first (List<T> items);")).toBe("first");
	});

	it("is null for fields", (): void => {
		expect(extractMethodName("    private int count;")).toBeNull();
	});
});

describe("summarizeMethod", () => {
	it("phrases accessor prefixes", (): void => {
		expect(summarizeMethod("getUserName")).toBe("Gets the username.");
		expect(summarizeMethod("setValue")).toBe("Sets the value.");
		expect(summarizeMethod("isEmpty")).toBe("Checks if empty.");
		expect(summarizeMethod("hasNext")).toBe("Checks if next.");
	});

	it("requires a camelCase boundary after the prefix", (): void => {
		expect(summarizeMethod("issue")).toBe("Performs issue operation.");
		expect(summarizeMethod("getaway")).toBe("Performs getaway operation.");
		expect(summarizeMethod("get")).toBe("Performs get operation.");
	});

	it("uses the generic phrase otherwise", (): void => {
		expect(summarizeMethod("flush")).toBe("Performs flush operation.");
	});
});
