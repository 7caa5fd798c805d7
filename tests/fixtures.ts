import type { ChildProcess } from "node:child_process";
import { EventEmitter, once } from "node:events";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import { vi } from "vitest";
import { type LogLevel, type Logger, createLogger } from "../source/core/logger.js";
import type { FetchSettings, Job, SpawnFn } from "../source/core/types.js";

export type FakeChild = ChildProcess & {
	stdout: PassThrough;
	stderr: PassThrough;
	kill: ReturnType<typeof vi.fn>;
};

export function createFakeChild(): FakeChild {
	const emitter = new EventEmitter() as ChildProcess;
	return Object.assign(emitter, {
		stdout: new PassThrough(),
		stderr: new PassThrough(),
		kill: vi.fn(() => true),
	}) as FakeChild;
}

export type ChildScript = {
	stdout?: string[];
	stderr?: string[];
	exitCode?: number;
};

/** Writes the scripted lines, ends both streams, then reports the exit. */
export async function finishChild(child: FakeChild, script: ChildScript): Promise<void> {
	const ended = Promise.all([once(child.stdout, "end"), once(child.stderr, "end")]);
	for (const line of script.stdout ?? []) {
		child.stdout.write(`${line}\n`);
	}
	for (const line of script.stderr ?? []) {
		child.stderr.write(`${line}\n`);
	}
	child.stdout.end();
	child.stderr.end();
	await ended;
	child.emit("close", script.exitCode ?? 0, null);
}

/** A spawn function whose every call plays back the next script. */
export function scriptedSpawn(...scripts: ChildScript[]) {
	const children: FakeChild[] = [];
	const spawnFn = vi.fn<SpawnFn>(() => {
		const child = createFakeChild();
		const script = scripts[children.length] ?? {};
		children.push(child);
		setImmediate(() => {
			void finishChild(child, script);
		});
		return child;
	});

	return { spawnFn, children };
}

export type LogEntry = Record<string, unknown>;

export function createMemoryLogger(level: LogLevel = "debug"): {
	logger: Logger;
	entries: LogEntry[];
} {
	const entries: LogEntry[] = [];
	const logger = createLogger({
		level,
		destination: {
			write(message: string) {
				entries.push(JSON.parse(message));
			},
		},
	});

	return { logger, entries };
}

export async function makeTmpDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
	const dir = await mkdtemp(path.join(tmpdir(), "creatorsync-"));
	return {
		dir,
		cleanup: () => rm(dir, { recursive: true, force: true }),
	};
}

export function makeJob(overrides: Partial<Job> = {}): Job {
	return {
		creator: "alice",
		url: "https://www.patreon.com/alice/posts",
		lookbackDays: 30,
		extraArgs: [],
		...overrides,
	};
}

export function makeSettings(root: string, overrides: Partial<FetchSettings> = {}): FetchSettings {
	return {
		ytDlpPath: "/usr/bin/yt-dlp",
		downloadsDir: path.join(root, "downloads"),
		archivePath: path.join(root, "config", "archive.txt"),
		cookiesPath: path.join(root, "config", "cookies.txt"),
		referer: "https://www.patreon.com/",
		formatSelector: "bestvideo+bestaudio/best",
		mergeFormat: "mp4",
		maxItems: 50,
		...overrides,
	};
}

export function flush(): Promise<void> {
	return new Promise((resolve) => {
		setImmediate(resolve);
	});
}
