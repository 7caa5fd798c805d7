import { mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import path from "node:path";
import { MetadataInjectionError, describeError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { FileGroup, PipelineReport } from "../core/types.js";
import type { Transcoder } from "../tools/ffmpeg.js";
import { pathExists } from "../utils/fs.js";
import { MAX_FOLDER_NAME_LENGTH, toFolderName } from "./folder-name.js";
import { finalExtension, groupFiles, parseFileName } from "./identity.js";
import { readSidecarMetadata } from "./sidecar.js";

export const MEDIA_BASENAME = "video";
export const THUMBNAIL_BASENAME = "thumbnail";

export type PostProcessorOptions = {
	logger: Logger;
	/** Without one, items are still regrouped but keep their original tags. */
	transcoder?: Transcoder;
	maxFolderNameLength?: number;
};

function emptyReport(): PipelineReport {
	return {
		groups: 0,
		itemsCreated: 0,
		metadataInjected: 0,
		metadataFailures: 0,
		groupFailures: 0,
		skippedGroups: 0,
		moved: 0,
		deleted: 0,
	};
}

/**
 * Turns a creator directory full of `<title> [<id>].<ext>` files into one
 * folder per item holding `video.<ext>` and, when present, `thumbnail.<ext>`.
 * Only top-level files that follow the naming grammar are touched, so a
 * second run over finished output does nothing.
 */
export class PostProcessor {
	readonly #logger: Logger;
	readonly #transcoder: Transcoder | undefined;
	readonly #maxFolderNameLength: number;

	constructor(options: PostProcessorOptions) {
		this.#logger = options.logger;
		this.#transcoder = options.transcoder;
		this.#maxFolderNameLength = options.maxFolderNameLength ?? MAX_FOLDER_NAME_LENGTH;
	}

	async hasMedia(dir: string): Promise<boolean> {
		const groups = groupFiles(await listFiles(dir));
		return groups.some((group) => group.media !== undefined);
	}

	async run(dir: string): Promise<PipelineReport> {
		const logger = this.#logger.child({ dir, stage: "postprocess" });
		const report = emptyReport();
		const groups = groupFiles(await listFiles(dir));
		report.groups = groups.length;

		for (const group of groups) {
			if (!group.media) {
				report.skippedGroups += 1;
				logger.debug({ key: group.key, id: group.id }, "no media file for this item, leaving it in place");
				continue;
			}

			try {
				await this.#processGroup(dir, group, group.media, report, logger);
			} catch (error) {
				report.groupFailures += 1;
				logger.error({ key: group.key, id: group.id, err: error }, `could not reorganize item: ${describeError(error)}`);
			}
		}

		logger.info({ ...report }, "post-processing finished");
		return report;
	}

	async #processGroup(
		dir: string,
		group: FileGroup,
		media: string,
		report: PipelineReport,
		logger: Logger,
	): Promise<void> {
		const mediaPath = path.join(dir, media);

		if (group.metadata && this.#transcoder) {
			try {
				await this.#injectMetadata(mediaPath, path.join(dir, group.metadata), this.#transcoder);
				report.metadataInjected += 1;
			} catch (error) {
				report.metadataFailures += 1;
				logger.warn(
					{ key: group.key, id: group.id, err: error },
					`metadata injection failed, keeping original file: ${describeError(error)}`,
				);
			}
		}

		const folder = await this.#reserveFolder(dir, toFolderName(group.key, this.#maxFolderNameLength));
		await mkdir(folder, { recursive: true });

		await rename(mediaPath, path.join(folder, `${MEDIA_BASENAME}.${extensionOf(media)}`));
		report.moved += 1;

		if (group.thumbnail) {
			await rename(
				path.join(dir, group.thumbnail),
				path.join(folder, `${THUMBNAIL_BASENAME}.${extensionOf(group.thumbnail)}`),
			);
			report.moved += 1;
		}

		const leftovers = [group.metadata, group.description, ...group.other].filter(
			(name): name is string => name !== undefined,
		);
		for (const name of leftovers) {
			await rm(path.join(dir, name), { force: true });
			report.deleted += 1;
		}

		report.itemsCreated += 1;
		logger.info({ key: group.key, id: group.id, folder: path.basename(folder) }, "item reorganized");
	}

	/**
	 * Writes a tagged copy beside the original and renames it over the
	 * original only once it exists and is non-empty. A failure removes the
	 * copy and leaves the original as it was.
	 */
	async #injectMetadata(mediaPath: string, sidecarPath: string, transcoder: Transcoder): Promise<void> {
		const metadata = await readSidecarMetadata(sidecarPath);
		const { dir, name, ext } = path.parse(mediaPath);
		const tempPath = path.join(dir, `${name}.tmp${ext}`);

		try {
			await transcoder.injectMetadata(mediaPath, tempPath, metadata);
			const written = await stat(tempPath).catch(() => undefined);
			if (!written?.isFile() || written.size === 0) {
				throw new MetadataInjectionError(`tagged copy is missing or empty: ${tempPath}`, mediaPath);
			}
			await rename(tempPath, mediaPath);
		} catch (error) {
			await rm(tempPath, { force: true });
			throw error;
		}
	}

	/** Picks `<name>`, or `<name> (2)`, `<name> (3)`… when a media item already lives there. */
	async #reserveFolder(dir: string, name: string): Promise<string> {
		for (let attempt = 1; ; attempt++) {
			const candidate = path.join(dir, attempt === 1 ? name : `${name} (${attempt})`);
			if (!(await holdsMediaItem(candidate))) {
				return candidate;
			}
		}
	}
}

async function listFiles(dir: string): Promise<string[]> {
	const entries = await readdir(dir, { withFileTypes: true });
	return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
}

async function holdsMediaItem(folder: string): Promise<boolean> {
	if (!(await pathExists(folder))) {
		return false;
	}

	if (!(await stat(folder)).isDirectory()) {
		return true;
	}

	const entries = await readdir(folder);
	return entries.some((entry) => entry.startsWith(`${MEDIA_BASENAME}.`));
}

function extensionOf(fileName: string): string {
	const parsed = parseFileName(fileName);
	return finalExtension(parsed ? parsed.ext : path.extname(fileName).slice(1));
}
