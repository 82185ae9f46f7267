// CHANGE: Tests for console reporting of fix runs
// INVARIANT: Skipped results appear only in debug output
// PURITY: SHELL (console spied)

import { afterEach, describe, expect, it, vi } from "vitest";

import { summarizeRun } from "../../../src/core/fix/summary.js";
import {
	consoleReporter,
	debugLog,
	formatResult,
	formatSummary,
} from "../../../src/shell/output/reporter.js";
import { applied, failed, skipped } from "../../utils/builders.js";

afterEach((): void => {
	vi.unstubAllEnvs();
});

describe("formatResult", () => {
	it("prints one line per outcome", (): void => {
		expect(formatResult(applied())).toBe(
			"  ✅ GenericParam src/Foo.java:12 (+1 line(s) at 9)",
		);
		expect(formatResult(failed("read failed: ENOENT"))).toBe(
			"  ❌ MissingReturn src/Foo.java:12: read failed: ENOENT",
		);
		expect(formatResult(skipped())).toBe(
			"  ⏭️  src/Foo.java:12: no automatic fix for this message",
		);
	});
});

describe("formatSummary", () => {
	it("prints counts and an unknown remainder", (): void => {
		expect(formatSummary(summarizeRun([applied(), skipped()], null))).toEqual([
			"",
			"✅ Applied 1 fixes",
			"📋 Found 2 issues: 1 attempted, 0 failed, 1 skipped",
			"📊 Remaining issues: unknown",
		]);
	});

	it("prints a known remainder", (): void => {
		expect(formatSummary(summarizeRun([], 3)).at(-1)).toBe("📊 Remaining issues: 3");
	});
});

describe("consoleReporter", () => {
	it("announces phases with their detail", (): void => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {
			// silence
		});
		consoleReporter.phase("Fixing", "(3 issues)");
		consoleReporter.phase("Done");
		expect(log.mock.calls).toEqual([
			["🔧 Applying fixes... (3 issues)"],
			["🏁 Done"],
		]);
	});

	it("keeps skipped results out of standard output", (): void => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {
			// silence
		});
		consoleReporter.result(skipped());
		consoleReporter.result(failed("x"));
		consoleReporter.warn("diagnostics command failed: boom");
		expect(log.mock.calls).toEqual([
			["  ❌ MissingReturn src/Foo.java:12: x"],
			["⚠️  diagnostics command failed: boom"],
		]);
	});
});

describe("debugLog", () => {
	it("writes to stderr only when enabled", (): void => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {
			// silence
		});
		vi.stubEnv("DOCLINT_AUTOFIX_DEBUG", "");
		debugLog("hidden");
		vi.stubEnv("DOCLINT_AUTOFIX_DEBUG", "1");
		debugLog("shown");
		expect(error.mock.calls).toEqual([["[DOCFIX-DEBUG]", "shown"]]);
	});
});
