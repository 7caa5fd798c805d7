/**
 * Creator list and global settings.
 *
 * The creator list is a JSON file; settings come from CLI flags, then
 * `CREATORSYNC_*` environment variables, then defaults.
 */
import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigError, InvalidInputError, describeError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { Job } from "./types.js";

// ---------------------------------------------------------------------------
// Creator list
// ---------------------------------------------------------------------------

const CreatorSchema = z.object({
	name: z
		.string()
		.trim()
		.min(1)
		.refine((name) => !/[/\\]/.test(name) && name !== "." && name !== "..", {
			message: "must be a single path segment",
		}),
	days_back: z.number().int().positive().default(30),
	url: z
		.string()
		.url()
		.refine((url) => /^https?:\/\//i.test(url), { message: "must be an http(s) URL" })
		.optional(),
	ytdlp_args: z.union([z.string(), z.array(z.string())]).optional(),
});

export const CreatorsFileSchema = z
	.object({
		creators: z.array(CreatorSchema),
	})
	.superRefine((file, ctx) => {
		const seen = new Set<string>();
		file.creators.forEach((creator, index) => {
			if (seen.has(creator.name)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["creators", index, "name"],
					message: `duplicate creator "${creator.name}"`,
				});
			}
			seen.add(creator.name);
		});
	});

export type CreatorsFile = z.infer<typeof CreatorsFileSchema>;
type CreatorEntry = CreatorsFile["creators"][number];

export function defaultCreatorUrl(name: string): string {
	return `https://www.patreon.com/${encodeURIComponent(name)}/posts`;
}

export function splitArgs(args: string | readonly string[] | undefined): string[] {
	if (args === undefined) {
		return [];
	}

	if (typeof args === "string") {
		return args.split(/\s+/).filter(Boolean);
	}

	return [...args];
}

export function toJob(entry: CreatorEntry): Job {
	return {
		creator: entry.name,
		url: entry.url ?? defaultCreatorUrl(entry.name),
		lookbackDays: entry.days_back,
		extraArgs: splitArgs(entry.ytdlp_args),
	};
}

export function parseCreators(raw: unknown, configPath: string): Job[] {
	const result = CreatorsFileSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(
			`Invalid creator list in ${configPath}: ${formatIssues(result.error)}`,
			configPath,
		);
	}

	return result.data.creators.map(toJob);
}

export async function loadCreators(configPath: string): Promise<Job[]> {
	let raw: unknown;
	try {
		raw = JSON.parse(await readFile(configPath, "utf8"));
	} catch (error) {
		throw new ConfigError(
			`Could not read creator list ${configPath}: ${describeError(error)}`,
			configPath,
			{ cause: error },
		);
	}

	return parseCreators(raw, configPath);
}

/** Keeps only the named creators, in config order. Unknown names are an input error. */
export function selectJobs(jobs: readonly Job[], only: readonly string[]): Job[] {
	if (only.length === 0) {
		return [...jobs];
	}

	const known = new Set(jobs.map((job) => job.creator));
	const unknown = only.filter((name) => !known.has(name));
	if (unknown.length > 0) {
		throw new InvalidInputError(`Unknown creator(s): ${unknown.join(", ")}`);
	}

	const wanted = new Set(only);
	return jobs.filter((job) => wanted.has(job.creator));
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

const SettingsSchema = z.object({
	configDir: z.string().min(1).default("./config"),
	downloadsDir: z.string().min(1).default("./downloads"),
	cookiesPath: z.string().min(1).optional(),
	archivePath: z.string().min(1).optional(),
	delaySec: z.coerce.number().nonnegative().default(10),
	maxItems: z.coerce.number().int().positive().default(50),
	probeTimeoutSec: z.coerce.number().positive().default(60),
	logLevel: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
	ytDlpPath: z.string().min(1).optional(),
	ffmpegPath: z.string().min(1).optional(),
	referer: z.string().url().default("https://www.patreon.com/"),
	formatSelector: z.string().min(1).default("bestvideo+bestaudio/best"),
	mergeFormat: z.string().min(1).default("mp4"),
});

type SettingsKey = keyof z.input<typeof SettingsSchema>;

export type SettingsInput = Partial<Record<SettingsKey, string | number | undefined>>;

const ENV_NAMES: ReadonlyArray<[SettingsKey, string]> = [
	["configDir", "CREATORSYNC_CONFIG_DIR"],
	["downloadsDir", "CREATORSYNC_DOWNLOADS_DIR"],
	["cookiesPath", "CREATORSYNC_COOKIES"],
	["archivePath", "CREATORSYNC_ARCHIVE"],
	["delaySec", "CREATORSYNC_DELAY"],
	["maxItems", "CREATORSYNC_MAX_ITEMS"],
	["probeTimeoutSec", "CREATORSYNC_PROBE_TIMEOUT"],
	["logLevel", "CREATORSYNC_LOG_LEVEL"],
	["ytDlpPath", "CREATORSYNC_YT_DLP"],
	["ffmpegPath", "CREATORSYNC_FFMPEG"],
	["referer", "CREATORSYNC_REFERER"],
	["formatSelector", "CREATORSYNC_FORMAT"],
	["mergeFormat", "CREATORSYNC_MERGE_FORMAT"],
];

export type AppSettings = {
	configDir: string;
	creatorsPath: string;
	downloadsDir: string;
	logDir: string;
	cookiesPath: string;
	archivePath: string;
	interJobDelayMs: number;
	maxItems: number;
	probeTimeoutMs: number;
	logLevel: LogLevel;
	ytDlpPath?: string;
	ffmpegPath?: string;
	referer: string;
	formatSelector: string;
	mergeFormat: string;
};

export function resolveSettings(
	input: SettingsInput = {},
	env: NodeJS.ProcessEnv = process.env,
): AppSettings {
	const merged: Record<string, string | number> = {};
	for (const [key, envName] of ENV_NAMES) {
		const value = input[key] ?? env[envName];
		if (value !== undefined && value !== "") {
			merged[key] = value;
		}
	}

	const result = SettingsSchema.safeParse(merged);
	if (!result.success) {
		throw new ConfigError(`Invalid settings: ${formatIssues(result.error)}`, "settings");
	}

	const parsed = result.data;
	const configDir = path.resolve(parsed.configDir);
	const downloadsDir = path.resolve(parsed.downloadsDir);

	return {
		configDir,
		creatorsPath: path.join(configDir, "config.json"),
		downloadsDir,
		logDir: path.join(downloadsDir, "logs"),
		cookiesPath: path.resolve(parsed.cookiesPath ?? path.join(configDir, "cookies.txt")),
		archivePath: path.resolve(parsed.archivePath ?? path.join(configDir, "archive.txt")),
		interJobDelayMs: Math.round(parsed.delaySec * 1000),
		maxItems: parsed.maxItems,
		probeTimeoutMs: Math.round(parsed.probeTimeoutSec * 1000),
		logLevel: parsed.logLevel,
		ytDlpPath: parsed.ytDlpPath,
		ffmpegPath: parsed.ffmpegPath,
		referer: parsed.referer,
		formatSelector: parsed.formatSelector,
		mergeFormat: parsed.mergeFormat,
	};
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
		.join("; ");
}
