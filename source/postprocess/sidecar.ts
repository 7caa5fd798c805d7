import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { MediaMetadata } from "../tools/ffmpeg.js";

const InfoJsonSchema = z
	.object({
		title: z.string().optional(),
		fulltitle: z.string().optional(),
		uploader: z.string().nullish(),
		channel: z.string().nullish(),
		creator: z.string().nullish(),
		upload_date: z.string().nullish(),
		description: z.string().nullish(),
	})
	.passthrough();

export type InfoJson = z.infer<typeof InfoJsonSchema>;

/** `20240115` → `2024-01-15`; anything else is dropped. */
export function formatUploadDate(raw: string | null | undefined): string | undefined {
	const match = raw?.match(/^(\d{4})(\d{2})(\d{2})$/);
	if (!match) {
		return undefined;
	}

	const [, year, month, day] = match;
	return `${year}-${month}-${day}`;
}

export function toMediaMetadata(info: InfoJson): MediaMetadata {
	return {
		title: info.fulltitle ?? info.title,
		author: info.uploader ?? info.channel ?? info.creator ?? undefined,
		date: formatUploadDate(info.upload_date),
		description: info.description?.trim() || undefined,
	};
}

/** Reads the fetch tool's `.info.json` sidecar. Throws when it is not valid JSON of the expected shape. */
export async function readSidecarMetadata(sidecarPath: string): Promise<MediaMetadata> {
	const raw = await readFile(sidecarPath, "utf8");
	const info = InfoJsonSchema.parse(JSON.parse(raw));
	return toMediaMetadata(info);
}
