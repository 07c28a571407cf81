import type { RateLimitHandler } from "../rate-limit/rate-limit-handler.js";
import {
	classifyRedditError,
	errorMessage,
	isRecordUnavailable,
	RedditApiError,
	RedditSchemaError,
} from "../reddit/errors.js";
import type {
	RedditComment,
	SearchCapability,
	SearchItem,
} from "../reddit/types.js";
import { logTransientRetry } from "../utils/logger.js";
import { toEpochSeconds, type Window } from "../windows/time-windows.js";
import {
	NonRetryableError,
	WindowFatalError,
	windowErrorContext,
} from "./errors.js";
import type { Cursor } from "./progress-tracker.js";

export type StopReason =
	| "page-not-full"
	| "crossed-window-start"
	| "safety-cap";

export type RemoteSearchClientOptions = {
	subreddit: string;
	query: string;
	/** Most results a single search call can return. */
	pageCap: number;
	/** Hard stop on items checked per window, whatever the API does. */
	maxItemsPerWindow: number;
	maxTransientRetries: number;
	maxRateLimitRetries: number;
};

export type EnumerationHooks = {
	onStop?: (reason: StopReason, checked: number) => void;
};

export type CommentsResult = {
	comments: RedditComment[];
	/** Set when the comment tree could not be read and an empty one stands in. */
	unavailable?: string;
};

/**
 * Whether a call-chain for a window is done after `page`: the page came back
 * short, or it reached items older than the window's start.
 */
export function chainStopReason(
	page: readonly SearchItem[],
	pageCap: number,
	windowStartSec: number,
): Exclude<StopReason, "safety-cap"> | null {
	const oldest = page[page.length - 1];
	if (oldest && oldest.createdUtc < windowStartSec) {
		return "crossed-window-start";
	}
	if (page.length < pageCap) return "page-not-full";
	return null;
}

/**
 * Inclusive bound for the next call: the oldest timestamp seen, so items
 * sharing that second are not lost. A full page that made no progress steps
 * one second down.
 */
export function nextUpperBound(
	page: readonly SearchItem[],
	currentBound: number,
): number {
	const oldest = page[page.length - 1];
	if (!oldest || oldest.createdUtc >= currentBound) return currentBound - 1;
	return oldest.createdUtc;
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
	const result: T[] = [];
	for await (const item of items) {
		result.push(item);
	}
	return result;
}

export class RemoteSearchClient {
	constructor(
		private readonly capability: SearchCapability,
		private readonly rateLimiter: RateLimitHandler,
		private readonly options: RemoteSearchClientOptions,
	) {}

	/**
	 * Yields the window's items newest first. Each call asks for items at or
	 * below an upper bound that shrinks to the oldest item of the previous
	 * page; `resumeCursor` replaces the window's newest edge as the first bound.
	 */
	async *enumerateWindow(
		window: Window,
		resumeCursor: Cursor | null = null,
		hooks: EnumerationHooks = {},
	): AsyncGenerator<SearchItem> {
		const { subreddit, query, pageCap, maxItemsPerWindow } = this.options;
		const startSec = toEpochSeconds(window.start);
		const endSec = toEpochSeconds(window.end);

		let bound = resumeCursor ? resumeCursor.createdUtc : endSec;
		let checked = 0;

		while (true) {
			const upperBound = bound;
			const page = await this.withRetry(
				() =>
					collect(
						this.capability.search(subreddit, query, upperBound, pageCap),
					),
				window,
				upperBound,
			);
			checked += page.length;

			for (const item of page) {
				if (item.createdUtc < startSec) break;
				// At or past the end belongs to the next window.
				if (item.createdUtc >= endSec) continue;
				yield item;
			}

			const reason = chainStopReason(page, pageCap, startSec);
			if (reason) {
				hooks.onStop?.(reason, checked);
				return;
			}

			if (checked >= maxItemsPerWindow) {
				hooks.onStop?.("safety-cap", checked);
				return;
			}

			bound = nextUpperBound(page, upperBound);
		}
	}

	async loadComments(
		item: SearchItem,
		window: Window,
	): Promise<CommentsResult> {
		try {
			const comments = await this.withRetry(
				() => this.capability.fetchComments(this.options.subreddit, item.id),
				window,
				item.createdUtc,
			);
			return { comments };
		} catch (error) {
			if (
				error instanceof NonRetryableError &&
				isRecordUnavailable(error.cause)
			) {
				return { comments: [], unavailable: error.message };
			}
			throw error;
		}
	}

	/**
	 * Runs one remote call. Throttling and transient failures retry the same
	 * call; anything else is converted to the job's error taxonomy.
	 */
	private async withRetry<T>(
		call: () => Promise<T>,
		window: Window,
		upperBound: number | null,
	): Promise<T> {
		const { maxRateLimitRetries, maxTransientRetries } = this.options;
		let rateLimitAttempt = 0;
		let transientAttempt = 0;

		while (true) {
			await this.rateLimiter.beforeCall();
			try {
				return await call();
			} catch (error) {
				const kind = classifyRedditError(error);

				if (kind === "rate-limited") {
					if (rateLimitAttempt >= maxRateLimitRetries) {
						throw new WindowFatalError({
							code: "retry_budget_exhausted",
							message: `Still rate limited after ${rateLimitAttempt} retries: ${errorMessage(error)}`,
							context: windowErrorContext(window, upperBound),
							cause: error,
						});
					}
					const retryAfterMs =
						error instanceof RedditApiError ? error.retryAfterMs : undefined;
					await this.rateLimiter.onRateLimited(rateLimitAttempt, retryAfterMs);
					rateLimitAttempt += 1;
					continue;
				}

				if (kind === "transient") {
					if (transientAttempt >= maxTransientRetries) {
						throw new WindowFatalError({
							code: "retry_budget_exhausted",
							message: `Gave up after ${transientAttempt} retries: ${errorMessage(error)}`,
							context: windowErrorContext(window, upperBound),
							cause: error,
						});
					}
					logTransientRetry({
						attempt: transientAttempt + 1,
						maxAttempts: maxTransientRetries,
						delayMs: this.rateLimiter.backoffDelay(transientAttempt),
						reason: errorMessage(error),
					});
					await this.rateLimiter.onTransientFailure(transientAttempt);
					transientAttempt += 1;
					continue;
				}

				if (kind === "non-retryable") {
					throw new NonRetryableError({
						message: errorMessage(error),
						status: error instanceof RedditApiError ? error.status : undefined,
						cause: error,
					});
				}

				if (error instanceof RedditSchemaError) {
					throw new WindowFatalError({
						code: "unexpected_schema",
						message: error.message,
						context: windowErrorContext(window, upperBound),
						cause: error,
					});
				}

				throw error;
			}
		}
	}
}
