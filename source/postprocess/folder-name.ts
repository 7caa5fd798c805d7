import { sanitizeFilenameSegment } from "../utils/fs.js";

export const MAX_FOLDER_NAME_LENGTH = 80;
const ELLIPSIS = "...";

/**
 * Human-readable folder name for an identity key:
 * `my_first_episode` becomes `My First Episode`.
 *
 * Title case: a letter is raised when it follows anything other than a
 * letter, digit or apostrophe, and every other letter is lowered.
 */
export function toFolderName(key: string, maxLength = MAX_FOLDER_NAME_LENGTH): string {
	const words = sanitizeFilenameSegment(key)
		.replaceAll("_", " ")
		.replace(/\s+/g, " ")
		.trim()
		.replace(/^\.+/, "")
		.split(" ")
		.filter(Boolean);

	const name = toTitleCase(words.join(" "));
	if (!name) {
		return "Untitled";
	}

	if (name.length <= maxLength) {
		return name;
	}

	return `${name.slice(0, maxLength - ELLIPSIS.length).trimEnd()}${ELLIPSIS}`;
}

function toTitleCase(text: string): string {
	return text
		.toLowerCase()
		.replace(/(^|[^\p{L}\p{N}'])(\p{L})/gu, (_match, before: string, letter: string) => {
			return `${before}${letter.toUpperCase()}`;
		});
}
