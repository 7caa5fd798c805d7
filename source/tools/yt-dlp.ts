import path from "node:path";
import { PROGRESS_MARKER } from "../core/line-classifier.js";
import type { FetchCommand, FetchSettings, Job } from "../core/types.js";

export const OUTPUT_NAME_TEMPLATE = "%(title)s [%(id)s].%(ext)s";

const PROGRESS_TEMPLATE = `download:${PROGRESS_MARKER} %(progress._percent_str)s of %(progress._total_bytes_str)s at %(progress._speed_str)s ETA %(progress._eta_str)s`;

const DAY_MS = 24 * 60 * 60 * 1000;

export function creatorOutputDir(settings: FetchSettings, creator: string): string {
	return path.join(settings.downloadsDir, creator);
}

/**
 * Builds the fetch tool invocation for one job. The job's own arguments go
 * last so they can override any default above them.
 */
export function buildFetchCommand(
	job: Job,
	settings: FetchSettings,
	now: Date = new Date(),
): FetchCommand {
	const args = [
		"--cookies",
		settings.cookiesPath,
		"--download-archive",
		settings.archivePath,
		"--dateafter",
		formatDateAfter(now, job.lookbackDays),
		"-o",
		path.join(creatorOutputDir(settings, job.creator), OUTPUT_NAME_TEMPLATE),
		"-f",
		settings.formatSelector,
		"--merge-output-format",
		settings.mergeFormat,
		"--write-info-json",
		"--write-description",
		"--write-thumbnail",
		"--restrict-filenames",
		"--add-header",
		`Referer:${settings.referer}`,
		"--ignore-errors",
		"--geo-bypass",
		"--no-overwrites",
		"--no-playlist",
		"--playlist-end",
		String(settings.maxItems),
		"--newline",
		"--progress",
		"--progress-template",
		PROGRESS_TEMPLATE,
		job.url,
		...job.extraArgs,
	];

	return { command: settings.ytDlpPath, args };
}

/** Read-only format listing against the same target; downloads nothing. */
export function buildProbeCommand(job: Job, settings: FetchSettings): FetchCommand {
	return {
		command: settings.ytDlpPath,
		args: [
			"--cookies",
			settings.cookiesPath,
			"--add-header",
			`Referer:${settings.referer}`,
			"--list-formats",
			"--skip-download",
			"--ignore-errors",
			"--playlist-end",
			"1",
			job.url,
		],
	};
}

/** `now - days` as the tool's compact ISO 8601 date (YYYYMMDD), in UTC. */
export function formatDateAfter(now: Date, lookbackDays: number): string {
	const cutoff = new Date(now.getTime() - lookbackDays * DAY_MS);
	return cutoff.toISOString().slice(0, 10).replaceAll("-", "");
}

export function formatCommand(command: FetchCommand): string {
	return [command.command, ...command.args.map(quoteArg)].join(" ");
}

function quoteArg(arg: string): string {
	return /\s|["'`$\\]/.test(arg)
		? `"${arg.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`
		: arg;
}
