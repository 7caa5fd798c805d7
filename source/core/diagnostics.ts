import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { buildProbeCommand, formatCommand } from "../tools/yt-dlp.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { driveProcess } from "./process-loop.js";
import type { FetchSettings, Job, ProbeFinding, ProbeReport, SpawnFn } from "./types.js";

export const DEFAULT_PROBE_TIMEOUT_MS = 60_000;

const FORMAT_MARKERS: readonly RegExp[] = [
	/\[info\] available formats for/i,
	/^ID\s+EXT\s+RESOLUTION/,
	/^format code\s+extension/i,
];

export type DiagnosticProbeOptions = {
	settings: FetchSettings;
	spawnFn: SpawnFn;
	logDir: string;
	logger: Logger;
	timeoutMs?: number;
	pollIntervalMs?: number;
};

export function diagnosticLogPath(logDir: string, creator: string): string {
	return path.join(logDir, `${creator}_diagnostic.log`);
}

export function inspectProbeOutput(lines: readonly string[]): ProbeFinding {
	const hasFormats = lines.some((line) =>
		FORMAT_MARKERS.some((marker) => marker.test(line.trim())),
	);
	return hasFormats ? "content_exists" : "no_media";
}

/**
 * Second, read-only look at a failed target: list formats without
 * downloading, bounded by a wall-clock timeout. Never throws; a timeout or a
 * launch failure is reported as inconclusive.
 */
export class DiagnosticProbe {
	readonly #options: DiagnosticProbeOptions;

	constructor(options: DiagnosticProbeOptions) {
		this.#options = options;
	}

	async probe(job: Job): Promise<ProbeReport> {
		const { settings, spawnFn, logDir } = this.#options;
		const logger = this.#options.logger.child({ creator: job.creator, stage: "probe" });
		const logPath = diagnosticLogPath(logDir, job.creator);
		const command = buildProbeCommand(job, settings);
		const captured: string[] = [];

		let finding: ProbeFinding = "inconclusive";
		let timedOut = false;
		let note = "probe did not run";

		try {
			const child = spawnFn(command.command, command.args, {
				stdio: ["ignore", "pipe", "pipe"],
				shell: false,
			});
			const result = await driveProcess(
				child,
				(line) => {
					captured.push(line.text);
				},
				{
					timeoutMs: this.#options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
					pollIntervalMs: this.#options.pollIntervalMs,
				},
			);

			if (result.kind === "timedOut") {
				timedOut = true;
				note = "probe timed out";
			} else if (result.kind === "spawnError") {
				note = `probe could not start: ${result.error.message}`;
			} else {
				finding = inspectProbeOutput(captured);
				note = `probe exited with code ${result.exitCode}`;
			}
		} catch (error) {
			note = `probe could not start: ${describeError(error)}`;
		}

		try {
			await mkdir(logDir, { recursive: true });
			await appendFile(
				logPath,
				[
					`=== ${new Date().toISOString()} ${job.creator}`,
					`$ ${formatCommand(command)}`,
					...captured,
					`--- ${note}; finding: ${finding}`,
					"",
				].join("\n"),
				"utf8",
			);
		} catch (error) {
			logger.warn({ logPath, err: error }, "could not write diagnostic log");
		}

		logger.info({ finding, timedOut, logPath }, describeFinding(finding));
		return { finding, logPath, timedOut };
	}
}

export function describeFinding(finding: ProbeFinding): string {
	switch (finding) {
		case "content_exists":
			return "content exists but download failed";
		case "no_media":
			return "no media detected for this target";
		case "inconclusive":
			return "diagnostic probe was inconclusive";
	}
}
