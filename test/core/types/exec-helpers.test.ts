// CHANGE: Unit tests for stream extraction from failed commands
// PURITY: CORE

import { describe, expect, it } from "vitest";

import type { ExecFailure } from "../../../src/core/types/index.js";
import { extractStreamFromError } from "../../../src/core/types/index.js";

describe("extractStreamFromError", () => {
	it("returns captured streams", (): void => {
		const error: ExecFailure = Object.assign(new Error("exit 1"), {
			stdout: "out",
			stderr: "A.java:1: warning: x",
		});
		expect(extractStreamFromError(error, "stdout")).toBe("out");
		expect(extractStreamFromError(error, "stderr")).toBe("A.java:1: warning: x");
	});

	it("is null when the process never ran", (): void => {
		expect(extractStreamFromError(new Error("spawn ENOENT"), "stderr")).toBeNull();
	});
});
