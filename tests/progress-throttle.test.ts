import { describe, expect, it } from "vitest";
import { ProgressThrottle } from "../source/core/progress-throttle.js";

describe("ProgressThrottle", () => {
	it("passes at most one event per interval", () => {
		let now = 0;
		const throttle = new ProgressThrottle(1000, () => now);
		let passed = 0;
		for (let index = 0; index < 200; index++) {
			now = index * 10;
			if (throttle.shouldPass()) {
				passed += 1;
			}
		}

		expect(passed).toBe(2);
	});

	it("passes the first event and again once the interval has elapsed", () => {
		let now = 5000;
		const throttle = new ProgressThrottle(1000, () => now);

		expect(throttle.shouldPass()).toBe(true);
		now = 5999;
		expect(throttle.shouldPass()).toBe(false);
		now = 6000;
		expect(throttle.shouldPass()).toBe(true);
	});
});
