import chalk from "chalk";
import { describeOutcome } from "../core/outcome.js";
import type { JobSummary, RunSummary } from "../core/types.js";

export function formatJobLine(summary: JobSummary): string {
	const seconds = `${(summary.durationMs / 1000).toFixed(1)}s`;
	if (summary.errorMessage !== undefined) {
		return chalk.red(`  ✗ ${summary.creator}: error: ${summary.errorMessage} (${seconds})`);
	}

	if (!summary.outcome) {
		return chalk.gray(`  - ${summary.creator}: not run`);
	}

	const outcome = describeOutcome(summary.outcome);
	if (summary.outcome.kind === "failed") {
		return chalk.red(`  ✗ ${summary.creator}: ${outcome} (${seconds})`);
	}

	const detail = summary.pipeline
		? `${summary.pipeline.itemsCreated} new item(s), ${summary.pipeline.metadataInjected} tagged`
		: "nothing to organize";
	const paint = summary.outcome.kind === "success" ? chalk.green : chalk.yellow;
	return paint(`  ✓ ${summary.creator}: ${outcome}, ${detail} (${seconds})`);
}

export function formatTotals(summary: RunSummary): string {
	const parts = [
		chalk.green(`${summary.succeeded} succeeded`),
		chalk.yellow(`${summary.degraded} degraded`),
		chalk.red(`${summary.failed} failed`),
		chalk.red(`${summary.errored} errored`),
	];
	return `${chalk.bold("Done:")} ${parts.join(", ")} in ${(summary.durationMs / 1000).toFixed(1)}s`;
}
