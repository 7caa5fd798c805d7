import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { platform } from "node:os";
import path from "node:path";
import { DependencyError } from "./errors.js";

export type ToolPaths = {
	ytDlpPath: string;
	/** Absent when ffmpeg is not installed; metadata injection is then skipped. */
	ffmpegPath?: string;
};

export type ToolOverrides = {
	ytDlpPath?: string;
	ffmpegPath?: string;
};

/**
 * Finds the external tools. An explicit path always wins and must exist;
 * otherwise each directory on `PATH` is searched in order.
 */
export class ToolLocator {
	readonly #env: NodeJS.ProcessEnv;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.#env = env;
	}

	async locate(overrides: ToolOverrides = {}): Promise<ToolPaths> {
		const ytDlpPath = await this.#resolve("yt-dlp", overrides.ytDlpPath);
		if (!ytDlpPath) {
			throw new DependencyError(
				"yt-dlp was not found on PATH. Install it or pass --yt-dlp <path>.",
			);
		}

		const ffmpegPath = await this.#resolve("ffmpeg", overrides.ffmpegPath);
		return { ytDlpPath, ffmpegPath };
	}

	async #resolve(name: string, explicit: string | undefined): Promise<string | undefined> {
		if (explicit) {
			const resolved = path.resolve(explicit);
			if (!(await this.#isExecutable(resolved))) {
				throw new DependencyError(`${name} not found at ${resolved}`);
			}
			return resolved;
		}

		return this.#findBinary(name);
	}

	async #isExecutable(filePath: string): Promise<boolean> {
		try {
			await access(filePath, platform() === "win32" ? constants.F_OK : constants.X_OK);
			const info = await stat(filePath);
			return info.isFile();
		} catch {
			return false;
		}
	}

	async #findBinary(name: string): Promise<string | undefined> {
		const { PATH: pathValue } = this.#env;
		if (!pathValue) {
			return undefined;
		}

		const extList =
			platform() === "win32" ? [".exe", ".cmd", ".bat", ""] : [""];
		for (const dir of pathValue.split(path.delimiter)) {
			if (!dir) {
				continue;
			}
			for (const ext of extList) {
				const fullPath = path.join(dir, `${name}${ext}`);
				if (await this.#isExecutable(fullPath)) {
					return fullPath;
				}
			}
		}

		return undefined;
	}
}
