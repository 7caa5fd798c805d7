import { EventEmitter } from "node:events";
import path from "node:path";
import { ensureOutputDir } from "../utils/fs.js";
import { delay } from "../utils/delay.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { describeOutcome, remediationFor } from "./outcome.js";
import type { Clock } from "./progress-throttle.js";
import type { FetchSupervisor } from "./supervisor.js";
import type { PostProcessor } from "../postprocess/pipeline.js";
import type { Job, JobSummary, RunEvents, RunSummary } from "./types.js";

export const DEFAULT_INTER_JOB_DELAY_MS = 10_000;

export type OrchestratorOptions = {
	downloadsDir: string;
	supervisor: Pick<FetchSupervisor, "run">;
	postProcessor: Pick<PostProcessor, "run" | "hasMedia">;
	logger: Logger;
	interJobDelayMs?: number;
	sleep?: (ms: number) => Promise<void>;
	now?: Clock;
};

/**
 * Runs jobs one after another: fetch, then regroup when the fetch produced
 * usable media. A job that throws is recorded and the run moves on.
 */
export class JobOrchestrator extends EventEmitter {
	readonly #options: OrchestratorOptions;
	readonly #sleep: (ms: number) => Promise<void>;
	readonly #now: Clock;

	constructor(options: OrchestratorOptions) {
		super();
		this.#options = options;
		this.#sleep = options.sleep ?? delay;
		this.#now = options.now ?? Date.now;
	}

	override on<K extends keyof RunEvents>(
		event: K,
		listener: (payload: RunEvents[K]) => void,
	): this {
		return super.on(event, listener);
	}

	override off<K extends keyof RunEvents>(
		event: K,
		listener: (payload: RunEvents[K]) => void,
	): this {
		return super.off(event, listener);
	}

	override emit<K extends keyof RunEvents>(
		event: K,
		payload: RunEvents[K],
	): boolean {
		return super.emit(event, payload);
	}

	async run(jobs: readonly Job[]): Promise<RunSummary> {
		const startedAt = this.#now();
		const { logger } = this.#options;
		const interJobDelayMs = this.#options.interJobDelayMs ?? DEFAULT_INTER_JOB_DELAY_MS;
		const summaries: JobSummary[] = [];

		logger.info({ jobs: jobs.length }, "run started");

		for (const [index, job] of jobs.entries()) {
			this.emit("jobStarted", { creator: job.creator, index, total: jobs.length });
			const summary = await this.#runJob(job);
			summaries.push(summary);
			this.emit("jobFinished", { summary });

			if (index < jobs.length - 1 && interJobDelayMs > 0) {
				logger.info(
					{ delayMs: interJobDelayMs },
					`waiting ${Math.round(interJobDelayMs / 1000)}s before the next creator`,
				);
				await this.#sleep(interJobDelayMs);
			}
		}

		const summary = summarize(summaries, this.#now() - startedAt);
		logger.info(
			{
				succeeded: summary.succeeded,
				degraded: summary.degraded,
				failed: summary.failed,
				errored: summary.errored,
			},
			"run finished",
		);
		this.emit("runFinished", { summary });
		return summary;
	}

	async #runJob(job: Job): Promise<JobSummary> {
		const startedAt = this.#now();
		const logger = this.#options.logger.child({ creator: job.creator });
		const summary: JobSummary = { creator: job.creator, durationMs: 0 };

		try {
			const dir = await ensureOutputDir(path.join(this.#options.downloadsDir, job.creator));
			logger.info({ url: job.url, lookbackDays: job.lookbackDays }, "processing creator");

			const result = await this.#options.supervisor.run(job);
			summary.outcome = result.outcome;

			if (result.outcome.kind === "failed") {
				summary.skipped = "failed";
				logger.warn(
					{ diagnosis: result.outcome.diagnosis },
					`skipping post-processing: fetch failed (${remediationFor(result.outcome.diagnosis)})`,
				);
			} else if (!(await this.#options.postProcessor.hasMedia(dir))) {
				summary.skipped = "no_media";
				logger.warn(
					{ outcome: result.outcome.kind },
					`skipping post-processing: ${describeOutcome(result.outcome)} but no media files were produced`,
				);
			} else {
				summary.pipeline = await this.#options.postProcessor.run(dir);
			}
		} catch (error) {
			summary.errorMessage = describeError(error);
			logger.error({ err: error }, `error processing creator: ${summary.errorMessage}`);
		}

		summary.durationMs = this.#now() - startedAt;
		return summary;
	}
}

export function summarize(jobs: JobSummary[], durationMs: number): RunSummary {
	const summary: RunSummary = {
		jobs,
		succeeded: 0,
		degraded: 0,
		failed: 0,
		errored: 0,
		durationMs,
	};

	for (const job of jobs) {
		if (job.errorMessage !== undefined) {
			summary.errored += 1;
		} else if (job.outcome?.kind === "success") {
			summary.succeeded += 1;
		} else if (job.outcome?.kind === "degraded") {
			summary.degraded += 1;
		} else {
			summary.failed += 1;
		}
	}

	return summary;
}
