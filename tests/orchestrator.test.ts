import { stat } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { JobOrchestrator } from "../source/core/orchestrator.js";
import type { Job, PipelineReport, RunEvents, SupervisorResult } from "../source/core/types.js";
import { createMemoryLogger, makeJob, makeTmpDir } from "./fixtures.js";

const PIPELINE: PipelineReport = {
	groups: 2,
	itemsCreated: 2,
	metadataInjected: 2,
	metadataFailures: 0,
	groupFailures: 0,
	skippedGroups: 0,
	moved: 4,
	deleted: 4,
};

function result(outcome: SupervisorResult["outcome"]): SupervisorResult {
	return { outcome, errors: [], durationMs: 0 };
}

describe("JobOrchestrator", () => {
	let tmp: Awaited<ReturnType<typeof makeTmpDir>>;

	beforeEach(async () => {
		tmp = await makeTmpDir();
	});

	afterEach(async () => {
		await tmp.cleanup();
	});

	function createOrchestrator() {
		const supervisor = {
			run: vi.fn(async (job: Job): Promise<SupervisorResult> => {
				switch (job.creator) {
					case "alice":
						return result({ kind: "success" });
					case "bob":
						return result({ kind: "failed", diagnosis: "auth", cause: "process" });
					case "carol":
						return result({ kind: "degraded", benignCount: 2 });
					default:
						throw new Error("boom");
				}
			}),
		};
		const postProcessor = {
			hasMedia: vi.fn(async (dir: string) => path.basename(dir) === "alice"),
			run: vi.fn(async () => PIPELINE),
		};
		const sleep = vi.fn(async () => {});
		const orchestrator = new JobOrchestrator({
			downloadsDir: tmp.dir,
			supervisor,
			postProcessor,
			logger: createMemoryLogger().logger,
			interJobDelayMs: 5000,
			sleep,
			now: () => 1000,
		});

		return { orchestrator, supervisor, postProcessor, sleep };
	}

	const jobs = ["alice", "bob", "carol", "dave"].map((creator) => makeJob({ creator }));

	it("runs every job and tallies the outcomes", async () => {
		const { orchestrator, postProcessor, sleep } = createOrchestrator();

		const summary = await orchestrator.run(jobs);

		expect(summary).toMatchObject({ succeeded: 1, degraded: 1, failed: 1, errored: 1, durationMs: 0 });
		expect(summary.jobs).toEqual([
			{ creator: "alice", outcome: { kind: "success" }, pipeline: PIPELINE, durationMs: 0 },
			{
				creator: "bob",
				outcome: { kind: "failed", diagnosis: "auth", cause: "process" },
				skipped: "failed",
				durationMs: 0,
			},
			{
				creator: "carol",
				outcome: { kind: "degraded", benignCount: 2 },
				skipped: "no_media",
				durationMs: 0,
			},
			{ creator: "dave", errorMessage: "boom", durationMs: 0 },
		]);
		expect(postProcessor.run).toHaveBeenCalledTimes(1);
		expect(postProcessor.run).toHaveBeenCalledWith(path.join(tmp.dir, "alice"));
		expect(sleep).toHaveBeenCalledTimes(3);
		expect(sleep).toHaveBeenCalledWith(5000);
	});

	it("still regroups a degraded job that produced media", async () => {
		const { orchestrator, postProcessor } = createOrchestrator();
		postProcessor.hasMedia.mockResolvedValue(true);

		const summary = await orchestrator.run([makeJob({ creator: "carol" })]);

		expect(summary.degraded).toBe(1);
		expect(summary.jobs[0]?.pipeline).toEqual(PIPELINE);
		expect(postProcessor.run).toHaveBeenCalledWith(path.join(tmp.dir, "carol"));
	});

	it("creates each creator's directory", async () => {
		const { orchestrator } = createOrchestrator();

		await orchestrator.run([makeJob({ creator: "bob" })]);

		expect((await stat(path.join(tmp.dir, "bob"))).isDirectory()).toBe(true);
	});

	it("does not wait after the last job", async () => {
		const { orchestrator, sleep } = createOrchestrator();

		await orchestrator.run([makeJob()]);

		expect(sleep).not.toHaveBeenCalled();
	});

	it("emits progress events", async () => {
		const { orchestrator } = createOrchestrator();
		const started: Array<RunEvents["jobStarted"]> = [];
		const finished: string[] = [];
		const runFinished = vi.fn();
		orchestrator.on("jobStarted", (payload) => started.push(payload));
		orchestrator.on("jobFinished", ({ summary }) => finished.push(summary.creator));
		orchestrator.on("runFinished", runFinished);

		await orchestrator.run(jobs.slice(0, 2));

		expect(started).toEqual([
			{ creator: "alice", index: 0, total: 2 },
			{ creator: "bob", index: 1, total: 2 },
		]);
		expect(finished).toEqual(["alice", "bob"]);
		expect(runFinished).toHaveBeenCalledTimes(1);
	});
});
