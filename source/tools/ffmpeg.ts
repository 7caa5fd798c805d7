import ffmpeg from "fluent-ffmpeg";
import { MetadataInjectionError } from "../core/errors.js";

export type MediaMetadata = {
	title?: string;
	author?: string;
	/** YYYY-MM-DD */
	date?: string;
	description?: string;
};

export type Transcoder = {
	/** Copies every stream of `input` unchanged into `output`, with new tags. */
	injectMetadata(input: string, output: string, metadata: MediaMetadata): Promise<void>;
};

export function metadataOutputOptions(metadata: MediaMetadata): string[] {
	const options = ["-map", "0", "-map_metadata", "0", "-c", "copy"];
	const tags: Array<[string, string | undefined]> = [
		["title", metadata.title],
		["artist", metadata.author],
		["date", metadata.date],
		["description", metadata.description],
		["comment", metadata.description],
	];

	for (const [key, value] of tags) {
		if (value) {
			options.push("-metadata", `${key}=${value}`);
		}
	}

	return options;
}

export class FfmpegTranscoder implements Transcoder {
	readonly #ffmpegPath: string;

	constructor(ffmpegPath: string) {
		this.#ffmpegPath = ffmpegPath;
	}

	injectMetadata(input: string, output: string, metadata: MediaMetadata): Promise<void> {
		return new Promise((resolve, reject) => {
			ffmpeg(input)
				.setFfmpegPath(this.#ffmpegPath)
				.outputOptions(metadataOutputOptions(metadata))
				.output(output)
				.on("end", () => resolve())
				.on("error", (error: Error) => {
					reject(
						new MetadataInjectionError(
							`ffmpeg failed to tag ${input}: ${error.message}`,
							input,
							{ cause: error },
						),
					);
				})
				.run();
		});
	}
}
