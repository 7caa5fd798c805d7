import type { ChildProcess } from "node:child_process";
import { delay } from "../utils/delay.js";
import type { Clock } from "./progress-throttle.js";
import { StreamReader } from "./stream-reader.js";
import type { OutputLine } from "./types.js";

export const DEFAULT_POLL_INTERVAL_MS = 100;

export type LoopResult =
	| { kind: "exited"; exitCode: number; signal: NodeJS.Signals | null }
	| { kind: "timedOut" }
	| { kind: "spawnError"; error: Error };

export type LoopOptions = {
	pollIntervalMs?: number;
	/** Wall-clock bound; the child is killed once it is exceeded. */
	timeoutMs?: number;
	now?: Clock;
};

/**
 * Cooperative supervision of one child process: poll for complete lines, hand
 * each one to `onLine`, sleep, repeat. Returns once the process has closed and
 * every buffered line has been handed over, or when the timeout expires.
 */
export async function driveProcess(
	child: ChildProcess,
	onLine: (line: OutputLine) => Promise<void> | void,
	options: LoopOptions = {},
): Promise<LoopResult> {
	const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
	const now = options.now ?? Date.now;
	const startedAt = now();
	const reader = new StreamReader([child.stdout, child.stderr]);

	const state: {
		closed?: { exitCode: number; signal: NodeJS.Signals | null };
		spawnError?: Error;
	} = {};

	child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
		state.closed = { exitCode: code ?? -1, signal };
	});
	child.once("error", (error: Error) => {
		state.spawnError = error;
	});

	for (;;) {
		// Read the flags before polling so lines that arrived ahead of the
		// close event are drained in this same pass.
		const exited = state.closed;
		const failed = state.spawnError;
		const { lines } = reader.poll();
		for (const line of lines) {
			await onLine(line);
		}

		if (failed) {
			return { kind: "spawnError", error: failed };
		}

		if (exited) {
			return { kind: "exited", ...exited };
		}

		if (options.timeoutMs !== undefined && now() - startedAt >= options.timeoutMs) {
			child.kill("SIGKILL");
			return { kind: "timedOut" };
		}

		await delay(pollIntervalMs);
	}
}
