import { readdir, unlink } from "node:fs/promises";
import path from "node:path";
import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

const REDACT_PATHS = [
	"cookie",
	"cookies",
	"authorization",
	"*.cookie",
	"*.authorization",
];

const RUN_LOG_PATTERN = /^run_\d{8}_\d{6}\.log$/;

export type LoggerOptions = {
	level?: LogLevel;
	/** Run log file; lines are appended alongside stdout. */
	logFile?: string;
	/** Replaces stdout and the run log entirely, e.g. to capture events in tests. */
	destination?: pino.DestinationStream;
};

export function createLogger(options: LoggerOptions = {}): Logger {
	const loggerOptions: pino.LoggerOptions = {
		level: options.level ?? "info",
		base: undefined,
		redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
		formatters: {
			level: (label) => ({ level: label }),
		},
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (options.destination) {
		return pino(loggerOptions, options.destination);
	}

	// Stream levels stay at trace so the logger's own level is the only gate.
	const streams: pino.StreamEntry[] = [{ level: "trace", stream: process.stdout }];
	if (options.logFile) {
		streams.push({
			level: "trace",
			stream: pino.destination({
				dest: options.logFile,
				append: true,
				mkdir: true,
				sync: true,
			}),
		});
	}

	return pino(loggerOptions, pino.multistream(streams));
}

export function runLogFileName(at: Date): string {
	const pad = (value: number) => String(value).padStart(2, "0");
	const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
	const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
	return `run_${date}_${time}.log`;
}

/** Deletes the oldest run logs in `logDir`, keeping the newest `keep`. */
export async function rotateRunLogs(logDir: string, keep = 20): Promise<string[]> {
	const entries = await readdir(logDir);
	const runLogs = entries.filter((name) => RUN_LOG_PATTERN.test(name)).sort();
	const stale = runLogs.slice(0, Math.max(0, runLogs.length - keep));
	for (const name of stale) {
		await unlink(path.join(logDir, name));
	}

	return stale;
}
