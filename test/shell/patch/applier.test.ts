// CHANGE: Tests for applying insertions through a file store
// INVARIANT: A failed plan or read leaves the file untouched
// PURITY: SHELL (in-memory store and temporary directories)

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import { AnchorNotFound, type FixFailure } from "../../../src/core/errors.js";
import { planFix } from "../../../src/core/fix/planner.js";
import { FixStrategy, type Insertion } from "../../../src/core/types/index.js";
import { nodeFileStore } from "../../../src/shell/fs/store.js";
import { applyInsertion, applyPlanned } from "../../../src/shell/patch/applier.js";
import { issue } from "../../utils/builders.js";
import { memoryStore } from "../../utils/memoryStore.js";
import { createTempWorkspace, type TempWorkspace } from "../../utils/tempWorkspace.js";

const run = (
	effect: Effect.Effect<Insertion, FixFailure>,
): Promise<Either.Either<Insertion, FixFailure>> =>
	Effect.runPromise(Effect.either(effect));

describe("applyInsertion", () => {
	it("inserts before the index and rewrites the file", async (): Promise<void> => {
		const store = memoryStore({ "A.java": "a\nb\n" });
		const result = await run(applyInsertion(store, "A.java", { index: 1, lines: ["x"] }));
		expect(Either.isRight(result)).toBe(true);
		expect(store.files.get("A.java")).toBe("a\nx\nb\n");
		expect(store.writes).toEqual(["A.java"]);
	});

	it("rejects an index outside the file", async (): Promise<void> => {
		const store = memoryStore({ "A.java": "a\nb\n" });
		const result = await run(applyInsertion(store, "A.java", { index: 2, lines: ["x"] }));
		expect(Either.isLeft(result) ? result.left : null).toMatchObject({
			_tag: "AnchorNotFound",
			line: 3,
			window: 0,
		});
		expect(store.writes).toEqual([]);
		expect(store.files.get("A.java")).toBe("a\nb\n");
	});

	it("reports read and write failures", async (): Promise<void> => {
		const store = memoryStore({ "Locked.java": "a\n" }, ["Locked.java"]);
		const missing = await run(applyInsertion(store, "Gone.java", { index: 0, lines: ["x"] }));
		const locked = await run(applyInsertion(store, "Locked.java", { index: 0, lines: ["x"] }));
		expect(Either.isLeft(missing) ? missing.left : null).toMatchObject({
			_tag: "IOFailure",
			operation: "read",
			detail: "ENOENT",
		});
		expect(Either.isLeft(locked) ? locked.left : null).toMatchObject({
			_tag: "IOFailure",
			operation: "write",
			detail: "EACCES",
		});
		expect(store.files.get("Locked.java")).toBe("a\n");
	});
});

describe("applyPlanned", () => {
	it("writes nothing when the plan fails", async (): Promise<void> => {
		const store = memoryStore({ "A.java": "a\n" });
		const result = await run(
			applyPlanned(store, "A.java", () =>
				Either.left(new AnchorNotFound({ filePath: "A.java", line: 1, window: 18 })),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		expect(store.reads).toEqual(["A.java"]);
		expect(store.writes).toEqual([]);
	});
});

describe("applyPlanned with nodeFileStore", () => {
	let workspace: TempWorkspace | undefined;

	afterEach((): void => {
		workspace?.cleanup();
		workspace = undefined;
	});

	it("keeps CRLF terminators of the file on disk", async (): Promise<void> => {
		workspace = createTempWorkspace({
			"src/A.java": "/**\r\n */\r\nclass A<T> {}\r\n",
		});
		const store = nodeFileStore(workspace.cwd);
		const target = issue({ filePath: "src/A.java", line: 3 });
		const result = await run(
			applyPlanned(store, target.filePath, (buffer) =>
				planFix(FixStrategy.GenericParam({ name: "T" }), target, buffer, {
					windows: { generic: 18, return: 13 },
					typeParameterDescriptions: {},
				}),
			),
		);
		expect(Either.isRight(result) ? result.right : null).toEqual({
			index: 1,
			lines: [" * @param <T> the type parameter"],
		});
		expect(workspace.read("src/A.java")).toBe(
			"/**\r\n * @param <T> the type parameter\r\n */\r\nclass A<T> {}\r\n",
		);
	});

	it("fails with a read IOFailure for a missing file", async (): Promise<void> => {
		workspace = createTempWorkspace({});
		const result = await run(
			applyInsertion(nodeFileStore(workspace.cwd), "Nope.java", { index: 0, lines: ["x"] }),
		);
		expect(Either.isLeft(result) ? result.left : null).toMatchObject({
			_tag: "IOFailure",
			filePath: "Nope.java",
			operation: "read",
		});
	});
});
