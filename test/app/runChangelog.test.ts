// CHANGE: Tests for changelog orchestration with an in-memory commit log
// PURITY: APP

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import {
	type CommitLogSource,
	formatBuildDate,
	runChangelog,
} from "../../src/app/runChangelog.js";
import { ExecError } from "../../src/core/errors.js";
import type { ChangelogOptions } from "../../src/core/types/index.js";

const options: ChangelogOptions = {
	projectName: "demo",
	tag: "v1.2.0",
	repository: "acme/demo",
	commitSha: "0123456789abcdef",
	buildDate: "2024-05-01 10:00:00 UTC",
	rangeDescription: "since v1.1.0",
};

describe("formatBuildDate", () => {
	it("prints UTC seconds", (): void => {
		expect(formatBuildDate(new Date(Date.UTC(2024, 4, 1, 10, 0, 7)))).toBe(
			"2024-05-01 10:00:07 UTC",
		);
	});
});

describe("runChangelog", () => {
	it("passes the range through and renders the log", async (): Promise<void> => {
		const ranges: (string | undefined)[] = [];
		const source: CommitLogSource = (range) => {
			ranges.push(range);
			return Effect.succeed("a1b2c3d|Fix watcher (#4)|Jo|jo@example.com|2024-05-01");
		};
		const report = await Effect.runPromise(
			runChangelog(source, "v1.1.0..HEAD", options),
		);
		expect(ranges).toEqual(["v1.1.0..HEAD"]);
		const lines = report.split("\n");
		expect(lines).toContain("> **Changes:** 1 commits since v1.1.0");
		expect(lines).toContain("### 🐛 Bug Fixes");
		expect(lines).toContain(
			"- Fix watcher (#4) ([a1b2c3d](https://github.com/acme/demo/commit/a1b2c3d)) ([#4](https://github.com/acme/demo/issues/4))",
		);
	});

	it("propagates a failing git command", async (): Promise<void> => {
		const source: CommitLogSource = () =>
			Effect.fail(new ExecError({ command: "git log", detail: "not a repository" }));
		const error = await Effect.runPromise(
			Effect.flip(runChangelog(source, undefined, options)),
		);
		expect(error.detail).toBe("not a repository");
	});
});
