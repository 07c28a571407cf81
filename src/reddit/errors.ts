export class RedditApiError extends Error {
	readonly status: number;
	readonly path: string;
	readonly retryAfterMs?: number;

	constructor(args: {
		status: number;
		path: string;
		message: string;
		retryAfterMs?: number;
	}) {
		super(args.message);
		this.name = "RedditApiError";
		this.status = args.status;
		this.path = args.path;
		this.retryAfterMs = args.retryAfterMs;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

export class RedditNetworkError extends Error {
	readonly path: string;
	readonly isTimeout: boolean;

	constructor(args: {
		path: string;
		message: string;
		isTimeout: boolean;
		cause?: unknown;
	}) {
		super(args.message, { cause: args.cause });
		this.name = "RedditNetworkError";
		this.path = args.path;
		this.isTimeout = args.isTimeout;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

export class RedditSchemaError extends Error {
	readonly path: string;

	constructor(args: { path: string; message: string; cause?: unknown }) {
		super(args.message, { cause: args.cause });
		this.name = "RedditSchemaError";
		this.path = args.path;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

export type FailureKind =
	| "rate-limited"
	| "transient"
	| "non-retryable"
	| "fatal";

export function classifyRedditError(error: unknown): FailureKind {
	if (error instanceof RedditNetworkError) return "transient";

	if (error instanceof RedditApiError) {
		const { status } = error;
		if (status === 429 || /RATELIMIT/.test(error.message)) {
			return "rate-limited";
		}
		if (status === 408 || status >= 500) return "transient";
		if (status >= 400) return "non-retryable";
		return "fatal";
	}

	return "fatal";
}

/** Statuses that mean a single post went away, not that the job is broken. */
export function isRecordUnavailable(error: unknown): boolean {
	return (
		error instanceof RedditApiError &&
		(error.status === 403 || error.status === 404 || error.status === 410)
	);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
