import type { Readable } from "node:stream";
import type { OutputLine } from "./types.js";

export type PollResult = {
	lines: OutputLine[];
	ended: boolean;
};

type Source = {
	fragment: string;
	ended: boolean;
};

/**
 * Collects chunks from one or more readable streams and hands out complete
 * lines on demand. `poll()` never waits: when nothing has arrived it returns
 * an empty batch.
 *
 * Each source keeps its own partial-line fragment, so stdout and stderr of the
 * same process form one combined, arrival-ordered stream without splicing
 * half-lines together.
 */
export class StreamReader {
	readonly #sources: Source[] = [];
	#ready: OutputLine[] = [];
	#seq = 0;

	constructor(streams: ReadonlyArray<Readable | null | undefined>) {
		for (const stream of streams) {
			if (!stream) {
				continue;
			}

			const source: Source = { fragment: "", ended: false };
			this.#sources.push(source);
			stream.setEncoding("utf8");
			stream.on("data", (chunk: string) => {
				this.#accept(source, chunk);
			});
			stream.once("end", () => this.#finish(source));
			stream.once("close", () => this.#finish(source));
			stream.once("error", () => this.#finish(source));
		}
	}

	get ended(): boolean {
		return this.#sources.every((source) => source.ended);
	}

	poll(): PollResult {
		const lines = this.#ready;
		this.#ready = [];
		return { lines, ended: this.ended };
	}

	#accept(source: Source, chunk: string): void {
		const parts = (source.fragment + chunk).split(/\r\n|\n|\r/);
		source.fragment = parts.pop() ?? "";
		for (const part of parts) {
			this.#push(part);
		}
	}

	#finish(source: Source): void {
		if (source.ended) {
			return;
		}

		source.ended = true;
		const rest = source.fragment;
		source.fragment = "";
		this.#push(rest);
	}

	#push(text: string): void {
		const trimmed = text.trimEnd();
		if (!trimmed.trim()) {
			return;
		}

		this.#seq += 1;
		this.#ready.push({ text: trimmed, seq: this.#seq });
	}
}
