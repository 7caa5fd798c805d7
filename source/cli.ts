#!/usr/bin/env node
import { spawn } from "node:child_process";
import { mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import chalk from "chalk";
import meow from "meow";
import { loadCreators, resolveSettings, selectJobs } from "./core/config.js";
import { DiagnosticProbe } from "./core/diagnostics.js";
import { describeError, toExitCode } from "./core/errors.js";
import { createLogger, rotateRunLogs, runLogFileName } from "./core/logger.js";
import { JobOrchestrator } from "./core/orchestrator.js";
import { FetchSupervisor } from "./core/supervisor.js";
import { ToolLocator } from "./core/tool-locator.js";
import type { FetchSettings } from "./core/types.js";
import { PostProcessor } from "./postprocess/pipeline.js";
import { FfmpegTranscoder } from "./tools/ffmpeg.js";
import { formatJobLine, formatTotals } from "./utils/summary-format.js";

const cli = meow(
	`
	Usage
	  $ creatorsync [options]

	Options
	  --config-dir <dir>   Directory holding config.json and cookies.txt (default: ./config)
	  --downloads <dir>    Download root; one folder per creator (default: ./downloads)
	  --cookies <file>     Cookie file (default: <config-dir>/cookies.txt)
	  --archive <file>     Download archive (default: <config-dir>/archive.txt)
	  --delay <sec>        Pause between creators (default: 10)
	  --max-items <n>      Newest posts to consider per creator (default: 50)
	  --log-level <level>  fatal|error|warn|info|debug|trace (default: info)
	  --only <name>        Only run this creator; repeatable
	  --yt-dlp <path>      yt-dlp executable (default: found on PATH)
	  --ffmpeg <path>      ffmpeg executable (default: found on PATH)

	Environment
	  CREATORSYNC_CONFIG_DIR, CREATORSYNC_DOWNLOADS_DIR, CREATORSYNC_COOKIES,
	  CREATORSYNC_ARCHIVE, CREATORSYNC_DELAY, CREATORSYNC_MAX_ITEMS,
	  CREATORSYNC_LOG_LEVEL, CREATORSYNC_YT_DLP, CREATORSYNC_FFMPEG

	Examples
	  $ creatorsync
	  $ creatorsync --only somecreator --delay 0 --log-level debug
	`,
	{
		importMeta: import.meta,
		flags: {
			configDir: { type: "string" },
			downloads: { type: "string" },
			cookies: { type: "string" },
			archive: { type: "string" },
			delay: { type: "number" },
			maxItems: { type: "number" },
			logLevel: { type: "string" },
			only: { type: "string", isMultiple: true },
			ytDlp: { type: "string" },
			ffmpeg: { type: "string" },
		},
	},
);

try {
	await main();
} catch (error) {
	console.error(chalk.red(describeError(error)));
	process.exitCode = toExitCode(error);
}

async function main(): Promise<void> {
	console.error(chalk.bold(`creatorsync v${await getCliVersion()}`));

	const settings = resolveSettings({
		configDir: cli.flags.configDir,
		downloadsDir: cli.flags.downloads,
		cookiesPath: cli.flags.cookies,
		archivePath: cli.flags.archive,
		delaySec: cli.flags.delay,
		maxItems: cli.flags.maxItems,
		logLevel: cli.flags.logLevel,
		ytDlpPath: cli.flags.ytDlp,
		ffmpegPath: cli.flags.ffmpeg,
	});

	await mkdir(settings.logDir, { recursive: true });
	const logger = createLogger({
		level: settings.logLevel,
		logFile: path.join(settings.logDir, runLogFileName(new Date())),
	});
	const rotated = await rotateRunLogs(settings.logDir);
	if (rotated.length > 0) {
		logger.debug({ rotated }, "removed old run logs");
	}

	const tools = await new ToolLocator().locate({
		ytDlpPath: settings.ytDlpPath,
		ffmpegPath: settings.ffmpegPath,
	});
	logger.info({ ...tools }, "tools located");
	if (!tools.ffmpegPath) {
		logger.warn("ffmpeg was not found; items will be regrouped without embedded metadata");
	}

	const jobs = selectJobs(await loadCreators(settings.creatorsPath), cli.flags.only ?? []);
	if (jobs.length === 0) {
		logger.warn({ config: settings.creatorsPath }, "no creators configured, nothing to do");
		return;
	}

	const fetchSettings: FetchSettings = {
		ytDlpPath: tools.ytDlpPath,
		downloadsDir: settings.downloadsDir,
		archivePath: settings.archivePath,
		cookiesPath: settings.cookiesPath,
		referer: settings.referer,
		formatSelector: settings.formatSelector,
		mergeFormat: settings.mergeFormat,
		maxItems: settings.maxItems,
	};

	const supervisor = new FetchSupervisor({
		settings: fetchSettings,
		logger,
		logDir: settings.logDir,
		spawnFn: spawn,
		probe: new DiagnosticProbe({
			settings: fetchSettings,
			spawnFn: spawn,
			logDir: settings.logDir,
			logger,
			timeoutMs: settings.probeTimeoutMs,
		}),
	});

	const orchestrator = new JobOrchestrator({
		downloadsDir: settings.downloadsDir,
		supervisor,
		postProcessor: new PostProcessor({
			logger,
			transcoder: tools.ffmpegPath ? new FfmpegTranscoder(tools.ffmpegPath) : undefined,
		}),
		logger,
		interJobDelayMs: settings.interJobDelayMs,
	});

	orchestrator.on("jobStarted", ({ creator, index, total }) => {
		console.error(chalk.cyan(`[${index + 1}/${total}] ${creator}`));
	});
	orchestrator.on("jobFinished", ({ summary }) => {
		console.error(formatJobLine(summary));
	});

	const summary = await orchestrator.run(jobs);
	console.error(formatTotals(summary));

	if (summary.failed + summary.errored > 0) {
		process.exitCode = 1;
	}
}

async function getCliVersion(): Promise<string> {
	const { npm_package_version: envVersion } = process.env;
	if (envVersion) {
		return envVersion;
	}

	try {
		const raw = await readFile(new URL("../../package.json", import.meta.url), "utf8");
		const parsed: unknown = JSON.parse(raw);
		if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
			return String(parsed.version);
		}
	} catch {
		// Running from an unpacked tree without package.json.
	}

	return "0.0.0";
}
