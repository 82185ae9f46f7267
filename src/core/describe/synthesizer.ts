// Derive human-readable doc text from naming conventions
// PURITY: CORE
// INVARIANT: Every function is total and deterministic
// COMPLEXITY: O(|input|)

/**
 * Conventional single/double-letter type parameter names.
 */
export const TYPE_PARAMETER_DESCRIPTIONS: Readonly<Record<string, string>> = {
	T: "the type parameter",
	E: "the element type parameter",
	K: "the key type parameter",
	V: "the value type parameter",
	C: "the command type parameter",
	O: "the observer type parameter",
	R: "the result type parameter",
	CH: "the command handler type parameter",
	F: "the field type parameter",
	VO: "the value object type parameter",
	S: "the state type parameter",
	S1: "the source state type parameter",
	S2: "the target state type parameter",
	P: "the port type parameter",
};

export const FALLBACK_TYPE_PARAMETER_DESCRIPTION = "the type parameter";

/**
 * @param name Captured bracket content, e.g. "T"
 * @param overrides Project-specific phrases; win over the built-in table
 * @pure true
 */
export function describeTypeParameter(
	name: string,
	overrides: Readonly<Record<string, string>> = {},
): string {
	const table = { ...TYPE_PARAMETER_DESCRIPTIONS, ...overrides };
	const description = Object.hasOwn(table, name) ? table[name] : undefined;
	return description ?? FALLBACK_TYPE_PARAMETER_DESCRIPTION;
}

/**
 * Type-name hints checked against the declaration line, in priority order.
 */
export const RETURN_HINTS: ReadonlyArray<{
	readonly typeName: string;
	readonly description: string;
}> = [
	{ typeName: "boolean", description: "true if successful, false otherwise" },
	{ typeName: "String", description: "the string representation" },
	{ typeName: "List", description: "the list of items" },
	{ typeName: "Optional", description: "an optional containing the result" },
];

export const FALLBACK_RETURN_DESCRIPTION = "the result of the operation";

/**
 * @param declarationLine Text of the reported declaration line
 * @pure true
 *
 * @example
 * ```ts
 * describeReturn("public Optional<String> find(final String key) {");
 * // "the string representation" (String is checked before Optional)
 * ```
 */
export function describeReturn(declarationLine: string): string {
	const hint = RETURN_HINTS.find((h) => declarationLine.includes(h.typeName));
	return hint?.description ?? FALLBACK_RETURN_DESCRIPTION;
}

/**
 * First `identifier(` on the line.
 *
 * @pure true
 * @returns method name, or null when the line has no call pattern
 */
export function extractMethodName(line: string): string | null {
	return /(\w+)\s*\(/u.exec(line.trim())?.[1] ?? null;
}

const SUMMARY_PREFIXES: ReadonlyArray<{
	readonly prefix: string;
	readonly render: (subject: string) => string;
}> = [
	{ prefix: "get", render: (s) => `Gets the ${s}.` },
	{ prefix: "set", render: (s) => `Sets the ${s}.` },
	{ prefix: "is", render: (s) => `Checks if ${s}.` },
	{ prefix: "has", render: (s) => `Checks if ${s}.` },
];

/**
 * One-line summary for a method name.
 *
 * @pure true
 * @invariant a prefix counts only at a camelCase boundary; "get", "issue" get the generic phrase
 *
 * @example
 * ```ts
 * summarizeMethod("getUserName"); // "Gets the username."
 * summarizeMethod("hasNext");     // "Checks if next."
 * summarizeMethod("flush");       // "Performs flush operation."
 * ```
 */
export function summarizeMethod(methodName: string): string {
	for (const { prefix, render } of SUMMARY_PREFIXES) {
		const subject = methodName.startsWith(prefix)
			? methodName.slice(prefix.length)
			: "";
		// camelCase boundary: "isEmpty" yes, "issue" and "getaway" no
		if (/^[A-Z0-9_]/u.test(subject)) {
			return render(subject.toLowerCase());
		}
	}
	return `Performs ${methodName} operation.`;
}
