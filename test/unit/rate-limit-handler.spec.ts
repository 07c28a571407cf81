import { describe, expect, it } from "vitest";
import {
	computeBackoffDelay,
	RateLimitHandler,
	type RateLimitOptions,
} from "../../src/rate-limit/rate-limit-handler.js";

function recordingSleep() {
	const slept: number[] = [];
	return {
		slept,
		sleep: async (ms: number) => {
			slept.push(ms);
		},
	};
}

const handlerWith = (options: Partial<RateLimitOptions>) =>
	new RateLimitHandler({
		baseDelayMs: 100,
		maxDelayMs: 1000,
		politeEvery: 1,
		...options,
	});

describe("computeBackoffDelay", () => {
	it("doubles from the base delay until it reaches the cap", () => {
		const delays = [0, 1, 2, 3, 4, 5, 6].map((attempt) =>
			computeBackoffDelay(attempt, 2000, 30_000),
		);
		expect(delays).toEqual([
			2000, 4000, 8000, 16_000, 30_000, 30_000, 30_000,
		]);
	});

	it("is non-decreasing, positive and capped for every attempt", () => {
		let previous = 0;
		for (let attempt = 0; attempt < 64; attempt++) {
			const delay = computeBackoffDelay(attempt, 2000, 300_000);
			expect(delay).toBeGreaterThan(0);
			expect(delay).toBeGreaterThanOrEqual(previous);
			expect(delay).toBeLessThanOrEqual(300_000);
			previous = delay;
		}
	});

	it("treats negative attempts as the first one", () => {
		expect(computeBackoffDelay(-3, 500, 10_000)).toBe(500);
	});

	it("never returns less than one millisecond", () => {
		expect(computeBackoffDelay(0, 0.1, 0.1)).toBe(1);
	});
});

describe("RateLimitHandler", () => {
	it("rejects invalid options", () => {
		expect(() => handlerWith({ baseDelayMs: 0, maxDelayMs: 10 })).toThrow(
			"baseDelayMs",
		);
		expect(() => handlerWith({ maxDelayMs: 50 })).toThrow("maxDelayMs");
		expect(() => handlerWith({ politeEvery: 0 })).toThrow("politeEvery");
	});

	it("sleeps the base delay before every call by default", async () => {
		const { slept, sleep } = recordingSleep();
		const handler = handlerWith({ sleep });

		await handler.beforeCall();
		await handler.beforeCall();

		expect(slept).toEqual([100, 100]);
		expect(handler.requests).toBe(2);
	});

	it("only sleeps on every Nth call when politeEvery is set", async () => {
		const { slept, sleep } = recordingSleep();
		const handler = handlerWith({ politeEvery: 3, sleep });

		for (let i = 0; i < 7; i++) {
			await handler.beforeCall();
		}

		expect(slept).toEqual([100, 100]);
		expect(handler.requests).toBe(7);
	});

	it("backs off exponentially on rate limits", async () => {
		const { slept, sleep } = recordingSleep();
		const handler = handlerWith({ maxDelayMs: 350, sleep });

		const delays = [
			await handler.onRateLimited(0),
			await handler.onRateLimited(1),
			await handler.onRateLimited(2),
		];

		expect(delays).toEqual([100, 200, 350]);
		expect(slept).toEqual([100, 200, 350]);
	});

	it("prefers a server-provided delay, capped at the maximum", async () => {
		const { slept, sleep } = recordingSleep();
		const handler = handlerWith({ maxDelayMs: 5000, sleep });

		expect(await handler.onRateLimited(0, 1500)).toBe(1500);
		expect(await handler.onRateLimited(0, 60_000)).toBe(5000);
		expect(await handler.onRateLimited(1, 0)).toBe(200);
		expect(slept).toEqual([1500, 5000, 200]);
	});

	it("uses the same schedule for transient failures", async () => {
		const { slept, sleep } = recordingSleep();
		const handler = handlerWith({ baseDelayMs: 50, sleep });

		await handler.onTransientFailure(0);
		await handler.onTransientFailure(2);

		expect(slept).toEqual([50, 200]);
	});
});
