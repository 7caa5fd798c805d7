export type Clock = () => number;

/**
 * Fixed-rate gate: lets one event through, then refuses everything until
 * `intervalMs` of clock time has elapsed. Event count and percent deltas play
 * no part.
 */
export class ProgressThrottle {
	readonly #intervalMs: number;
	readonly #now: Clock;
	#lastPassedAt: number | undefined;

	constructor(intervalMs = 1000, now: Clock = Date.now) {
		this.#intervalMs = intervalMs;
		this.#now = now;
	}

	shouldPass(): boolean {
		const now = this.#now();
		if (
			this.#lastPassedAt !== undefined &&
			now - this.#lastPassedAt < this.#intervalMs
		) {
			return false;
		}

		this.#lastPassedAt = now;
		return true;
	}
}
