import type { FileGroup, FileRole } from "../core/types.js";

/**
 * A fetched file name split along the output template
 * `<title> [<id>].<ext>`:
 *
 *   name := base sep? "[" id "]" "." ext
 *
 * - the id group is the last `[...]` that is directly followed by a dot, so
 *   brackets inside the title (`Q&A [Part 2] [abc].mp4`) stay in the base;
 * - `id` is non-empty and holds no brackets;
 * - `sep` (spaces or underscores) between base and id is dropped;
 * - `ext` is everything after that dot and may have several segments
 *   (`info.json`, `f137.mp4`, `mp4.part`).
 */
export type ParsedName = {
	base: string;
	id: string;
	ext: string;
};

export const MEDIA_EXTENSIONS: readonly string[] = [
	"mp4",
	"mkv",
	"webm",
	"mov",
	"m4v",
	"flv",
	"avi",
	"m4a",
	"mp3",
	"opus",
	"ogg",
	"wav",
];

export const THUMBNAIL_EXTENSIONS: readonly string[] = ["jpg", "jpeg", "png", "webp"];

export function parseFileName(name: string): ParsedName | undefined {
	const close = name.lastIndexOf("].");
	if (close < 0) {
		return undefined;
	}

	const open = name.lastIndexOf("[", close);
	if (open < 0) {
		return undefined;
	}

	const id = name.slice(open + 1, close);
	const ext = name.slice(close + 2);
	if (!id || id.includes("]") || !ext) {
		return undefined;
	}

	const base = name.slice(0, open).replace(/[\s_]+$/, "");
	return { base, id, ext };
}

export function identityKey(parsed: ParsedName): string {
	return parsed.base || parsed.id;
}

export function classifyRole(ext: string): FileRole {
	const segments = ext.toLowerCase().split(".");
	const last = segments.at(-1) ?? "";

	if (segments.length === 2 && segments[0] === "info" && last === "json") {
		return "metadata";
	}

	if (segments.length === 1) {
		if (last === "description") {
			return "description";
		}
		if (MEDIA_EXTENSIONS.includes(last)) {
			return "media";
		}
		if (THUMBNAIL_EXTENSIONS.includes(last)) {
			return "thumbnail";
		}
	}

	// Format fragments (f137.mp4), partial downloads (mp4.part), our own
	// temp files (tmp.mp4) and anything unrecognised.
	return "other";
}

/** Last extension segment, lower-cased: `info.json` gives `json`. */
export function finalExtension(ext: string): string {
	return ext.toLowerCase().split(".").at(-1) ?? ext.toLowerCase();
}

function mediaRank(fileName: string): number {
	const parsed = parseFileName(fileName);
	const rank = parsed ? MEDIA_EXTENSIONS.indexOf(finalExtension(parsed.ext)) : -1;
	return rank < 0 ? MEDIA_EXTENSIONS.length : rank;
}

/**
 * Groups top-level file names by identity key and item id. Two posts that
 * share a title but not an id stay separate groups with the same key. Names
 * that do not follow the grammar are not grouped at all. When files of one
 * item compete for a single slot (two media containers, two thumbnails) the
 * preferred one keeps the slot and the rest become `other`.
 */
export function groupFiles(fileNames: readonly string[]): FileGroup[] {
	const groups = new Map<string, FileGroup>();

	for (const fileName of [...fileNames].sort()) {
		const parsed = parseFileName(fileName);
		if (!parsed) {
			continue;
		}

		const key = identityKey(parsed);
		const slot = `${key}\u0000${parsed.id}`;
		let group = groups.get(slot);
		if (!group) {
			group = { key, id: parsed.id, other: [] };
			groups.set(slot, group);
		}

		const role = classifyRole(parsed.ext);
		if (role === "other") {
			group.other.push(fileName);
			continue;
		}

		const current = group[role];
		if (current === undefined) {
			group[role] = fileName;
			continue;
		}

		if (role === "media" && mediaRank(fileName) < mediaRank(current)) {
			group.media = fileName;
			group.other.push(current);
			continue;
		}

		group.other.push(fileName);
	}

	return [...groups.values()].sort(
		(a, b) => a.key.localeCompare(b.key) || a.id.localeCompare(b.id),
	);
}
