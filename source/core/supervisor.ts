import { spawn } from "node:child_process";
import { constants } from "node:fs";
import { access, appendFile, mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { buildFetchCommand, formatCommand } from "../tools/yt-dlp.js";
import { DiagnosticProbe, describeFinding } from "./diagnostics.js";
import { describeError } from "./errors.js";
import { classifyLine } from "./line-classifier.js";
import type { Logger } from "./logger.js";
import { classifyOutcome, describeOutcome, remediationFor } from "./outcome.js";
import { type LoopResult, driveProcess } from "./process-loop.js";
import { type Clock, ProgressThrottle } from "./progress-throttle.js";
import type {
	DiagnosisTag,
	ErrorRecord,
	FetchSettings,
	Job,
	Outcome,
	PreconditionDiagnosis,
	ProbeReport,
	SpawnFn,
	SupervisorResult,
} from "./types.js";

export type SupervisorOptions = {
	settings: FetchSettings;
	logger: Logger;
	/** Error logs and diagnostic probe logs go here. */
	logDir: string;
	spawnFn?: SpawnFn;
	probe?: Pick<DiagnosticProbe, "probe">;
	pollIntervalMs?: number;
	progressIntervalMs?: number;
	now?: Clock;
};

export function errorLogPath(logDir: string, creator: string): string {
	return path.join(logDir, `${creator}_errors.log`);
}

/**
 * Runs the fetch tool for one job and turns its output into an Outcome.
 *
 * Error and warning lines are appended to the creator's error log as they
 * arrive, so a crash part-way through still leaves the diagnostics on disk.
 */
export class FetchSupervisor {
	readonly #settings: FetchSettings;
	readonly #logger: Logger;
	readonly #logDir: string;
	readonly #spawnFn: SpawnFn;
	readonly #probe: Pick<DiagnosticProbe, "probe">;
	readonly #pollIntervalMs: number | undefined;
	readonly #progressIntervalMs: number;
	readonly #now: Clock;

	constructor(options: SupervisorOptions) {
		this.#settings = options.settings;
		this.#logger = options.logger;
		this.#logDir = options.logDir;
		this.#spawnFn = options.spawnFn ?? spawn;
		this.#now = options.now ?? Date.now;
		this.#pollIntervalMs = options.pollIntervalMs;
		this.#progressIntervalMs = options.progressIntervalMs ?? 1000;
		this.#probe =
			options.probe ??
			new DiagnosticProbe({
				settings: options.settings,
				spawnFn: this.#spawnFn,
				logDir: options.logDir,
				logger: options.logger,
				pollIntervalMs: options.pollIntervalMs,
			});
	}

	async run(job: Job): Promise<SupervisorResult> {
		const startedAt = this.#now();
		const logger = this.#logger.child({ creator: job.creator });
		const errors: ErrorRecord[] = [];
		const finish = (
			outcome: Outcome,
			extra: { exitCode?: number; probe?: ProbeReport } = {},
		): SupervisorResult => ({
			outcome,
			errors,
			...extra,
			durationMs: this.#now() - startedAt,
		});

		await mkdir(this.#logDir, { recursive: true });
		const errorLog = errorLogPath(this.#logDir, job.creator);

		const precondition = await this.#checkPreconditions();
		if (precondition) {
			logger.error(
				{ diagnosis: precondition },
				`precondition failed: ${remediationFor(precondition)}`,
			);
			await this.#appendReport(errorLog, job, precondition);
			return finish({ kind: "failed", diagnosis: precondition, cause: "precondition" });
		}

		const command = buildFetchCommand(job, this.#settings, new Date(this.#now()));
		logger.info({ lookbackDays: job.lookbackDays }, `exec ${formatCommand(command)}`);

		const throttle = new ProgressThrottle(this.#progressIntervalMs, this.#now);
		let result: LoopResult;
		try {
			const child = this.#spawnFn(command.command, command.args, {
				stdio: ["ignore", "pipe", "pipe"],
				shell: false,
			});
			result = await driveProcess(
				child,
				async ({ text }) => {
					const event = classifyLine(text);
					switch (event.kind) {
						case "progress":
							if (throttle.shouldPass()) {
								logger.info(
									{ percent: event.percent, throughput: event.throughput },
									text,
								);
							}
							break;
						case "info":
							logger.info(text);
							break;
						case "errorOrWarning": {
							logger.warn(text);
							const record: ErrorRecord = { text, at: new Date(this.#now()) };
							errors.push(record);
							try {
								await appendFile(
									errorLog,
									`[${record.at.toISOString()}] ${text}\n`,
									"utf8",
								);
							} catch (error) {
								logger.warn({ errorLog, err: error }, "could not append to error log");
							}
							break;
						}
						case "debug":
							logger.debug(text);
							break;
					}
				},
				{ pollIntervalMs: this.#pollIntervalMs, now: this.#now },
			);
		} catch (error) {
			result = {
				kind: "spawnError",
				error: error instanceof Error ? error : new Error(String(error)),
			};
		}

		if (result.kind !== "exited") {
			const reason = result.kind === "spawnError" ? describeError(result.error) : "timed out";
			logger.error({ diagnosis: "launch_failed", reason }, remediationFor("launch_failed"));
			await this.#appendReport(errorLog, job, "launch_failed");
			return finish({ kind: "failed", diagnosis: "launch_failed", cause: "precondition" });
		}

		const outcome = classifyOutcome(result.exitCode, errors);
		if (outcome.kind !== "failed") {
			logger.info(
				{ exitCode: result.exitCode, errorLines: errors.length },
				`fetch finished: ${describeOutcome(outcome)}`,
			);
			return finish(outcome, { exitCode: result.exitCode });
		}

		logger.error(
			{ exitCode: result.exitCode, diagnosis: outcome.diagnosis, errorLines: errors.length },
			`fetch failed [${outcome.diagnosis}]: ${remediationFor(outcome.diagnosis)}`,
		);
		const probe = await this.#probe.probe(job);
		await this.#appendReport(errorLog, job, outcome.diagnosis, probe, result.exitCode);
		return finish(outcome, { exitCode: result.exitCode, probe });
	}

	async #checkPreconditions(): Promise<PreconditionDiagnosis | undefined> {
		try {
			const info = await stat(this.#settings.cookiesPath);
			if (!info.isFile() || info.size === 0) {
				return "credentials_missing";
			}
		} catch {
			return "credentials_missing";
		}

		try {
			await mkdir(path.dirname(this.#settings.archivePath), { recursive: true });
			// Creates the ledger when missing; never truncates an existing one.
			await appendFile(this.#settings.archivePath, "", "utf8");
			await access(this.#settings.archivePath, constants.W_OK);
		} catch {
			return "archive_unwritable";
		}

		return undefined;
	}

	async #appendReport(
		errorLog: string,
		job: Job,
		diagnosis: DiagnosisTag,
		probe?: ProbeReport,
		exitCode?: number,
	): Promise<void> {
		const lines = [
			`=== ${new Date(this.#now()).toISOString()} ${job.creator} FAILED`,
			`diagnosis: ${diagnosis}`,
			`hint: ${remediationFor(diagnosis)}`,
		];
		if (exitCode !== undefined) {
			lines.push(`exit code: ${exitCode}`);
		}
		if (probe) {
			lines.push(`probe: ${probe.finding} (${describeFinding(probe.finding)}), see ${probe.logPath}`);
		}

		try {
			await appendFile(errorLog, `${lines.join("\n")}\n`, "utf8");
		} catch (error) {
			this.#logger.warn({ errorLog, err: error }, "could not write error report");
		}
	}
}
