import chalk from "chalk";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { JobSummary } from "../source/core/types.js";
import { formatJobLine, formatTotals } from "../source/utils/summary-format.js";

describe("summary formatting", () => {
	const level = chalk.level;

	beforeAll(() => {
		chalk.level = 0;
	});

	afterAll(() => {
		chalk.level = level;
	});

	it("describes a failed job", () => {
		const summary: JobSummary = {
			creator: "bob",
			outcome: { kind: "failed", diagnosis: "auth", cause: "process" },
			skipped: "failed",
			durationMs: 1500,
		};
		expect(formatJobLine(summary)).toBe("  ✗ bob: failed [auth] (1.5s)");
	});

	it("describes a degraded job without new items", () => {
		const summary: JobSummary = {
			creator: "carol",
			outcome: { kind: "degraded", benignCount: 2 },
			skipped: "no_media",
			durationMs: 1200,
		};
		expect(formatJobLine(summary)).toBe(
			"  ✓ carol: degraded (2 posts without media), nothing to organize (1.2s)",
		);
	});

	it("describes a job that threw", () => {
		expect(formatJobLine({ creator: "dave", errorMessage: "boom", durationMs: 0 })).toBe(
			"  ✗ dave: error: boom (0.0s)",
		);
	});

	it("totals the run", () => {
		expect(
			formatTotals({ jobs: [], succeeded: 1, degraded: 2, failed: 0, errored: 1, durationMs: 12_340 }),
		).toBe("Done: 1 succeeded, 2 degraded, 0 failed, 1 errored in 12.3s");
	});
});
