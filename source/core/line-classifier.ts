import type { ClassifiedEvent } from "./types.js";

export const PROGRESS_MARKER = "[download]";
const INFO_MARKER = "[info]";
const PAGE_MARKER = "Downloading page";
const DIAGNOSTIC_PATTERN = /(?:error|warning):/i;

/**
 * Maps one line of fetch tool output to exactly one event category.
 *
 * Rules are checked in priority order, so an error or warning line that also
 * carries the progress marker is never reported as progress.
 */
export function classifyLine(text: string): ClassifiedEvent {
	if (isErrorOrWarning(text)) {
		return { kind: "errorOrWarning", text };
	}

	if (text.trimStart().startsWith(PROGRESS_MARKER)) {
		const percent = parsePercent(text);
		if (percent === undefined) {
			return { kind: "info", text };
		}

		return { kind: "progress", percent, throughput: parseThroughput(text), text };
	}

	if (text.includes(INFO_MARKER) || text.includes(PAGE_MARKER)) {
		return { kind: "info", text };
	}

	return { kind: "debug", text };
}

export function isErrorOrWarning(text: string): boolean {
	return DIAGNOSTIC_PATTERN.test(text);
}

export function parsePercent(text: string): number | undefined {
	const match = text.match(/(\d+(?:\.\d+)?)%/);
	if (!match?.[1]) {
		return undefined;
	}

	const parsed = Number(match[1]);
	return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseThroughput(text: string): string | undefined {
	const match = text.match(/\bat\s+(\S+(?:\s+B)?\/s)(?=\s|$)/);
	return match?.[1];
}
