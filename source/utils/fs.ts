import { mkdir, stat } from "node:fs/promises";
import path from "node:path";

export async function ensureOutputDir(outputDir: string): Promise<string> {
	const resolved = path.resolve(outputDir);
	await mkdir(resolved, { recursive: true });
	const info = await stat(resolved);
	if (!info.isDirectory()) {
		throw new Error(`Output path is not a directory: ${resolved}`);
	}
	return resolved;
}

export async function pathExists(target: string): Promise<boolean> {
	try {
		await stat(target);
		return true;
	} catch {
		return false;
	}
}

/** Replaces characters that are unsafe in a single path segment with `_`. */
export function sanitizeFilenameSegment(input: string): string {
	return input
		.trim()
		.replace(/[<>:"/\\|?*]/g, "_")
		.split("")
		.map((character) => (character.charCodeAt(0) < 32 ? "_" : character))
		.join("");
}
