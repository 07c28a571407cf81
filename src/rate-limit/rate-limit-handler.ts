import { setTimeout as delay } from "node:timers/promises";
import { logRateLimited } from "../utils/logger.js";

export type Sleep = (ms: number) => Promise<void>;

export type RateLimitOptions = {
	baseDelayMs: number;
	maxDelayMs: number;
	/** Sleep `baseDelayMs` before every Nth call; 1 means every call. */
	politeEvery: number;
	sleep?: Sleep;
};

const defaultSleep: Sleep = async (ms) => {
	await delay(ms);
};

/** `min(base * 2^attempt, max)`, never below 1ms. */
export function computeBackoffDelay(
	attempt: number,
	baseDelayMs: number,
	maxDelayMs: number,
): number {
	const exponent = Math.max(0, Math.floor(attempt));
	const raw = baseDelayMs * 2 ** exponent;
	return Math.max(1, Math.min(raw, maxDelayMs));
}

export class RateLimitHandler {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly politeEvery: number;
	private readonly sleep: Sleep;
	private requestCount = 0;

	constructor(options: RateLimitOptions) {
		if (!(options.baseDelayMs > 0)) {
			throw new Error(`baseDelayMs must be > 0, got ${options.baseDelayMs}`);
		}
		if (!(options.maxDelayMs >= options.baseDelayMs)) {
			throw new Error(
				`maxDelayMs (${options.maxDelayMs}) must be >= baseDelayMs (${options.baseDelayMs})`,
			);
		}
		if (!Number.isInteger(options.politeEvery) || options.politeEvery < 1) {
			throw new Error(
				`politeEvery must be an integer >= 1, got ${options.politeEvery}`,
			);
		}

		this.baseDelayMs = options.baseDelayMs;
		this.maxDelayMs = options.maxDelayMs;
		this.politeEvery = options.politeEvery;
		this.sleep = options.sleep ?? defaultSleep;
	}

	get requests(): number {
		return this.requestCount;
	}

	async beforeCall(): Promise<void> {
		this.requestCount += 1;
		if (this.requestCount % this.politeEvery === 0) {
			await this.sleep(this.baseDelayMs);
		}
	}

	backoffDelay(attempt: number): number {
		return computeBackoffDelay(attempt, this.baseDelayMs, this.maxDelayMs);
	}

	/**
	 * Waits out a throttling signal. A server-provided delay wins over the
	 * exponential schedule but is still capped at `maxDelayMs`.
	 * Returns the delay slept; the caller retries the same call.
	 */
	async onRateLimited(attempt: number, retryAfterMs?: number): Promise<number> {
		const waitMs =
			retryAfterMs !== undefined &&
			Number.isFinite(retryAfterMs) &&
			retryAfterMs > 0
				? Math.min(retryAfterMs, this.maxDelayMs)
				: this.backoffDelay(attempt);
		logRateLimited(attempt, waitMs);
		await this.sleep(waitMs);
		return waitMs;
	}

	/** Backoff for a transient failure; same schedule as throttling. */
	async onTransientFailure(attempt: number): Promise<number> {
		const waitMs = this.backoffDelay(attempt);
		await this.sleep(waitMs);
		return waitMs;
	}
}
