import type { Window } from "../windows/time-windows.js";

export type ExtractionFailureCode =
	| "retry_budget_exhausted"
	| "unexpected_schema"
	| "non_retryable";

export type WindowErrorContext = {
	windowIndex: number;
	windowStart: string;
	windowEnd: string;
	/** Upper bound (epoch seconds) of the call that failed; null for the newest edge. */
	upperBound: number | null;
};

export const windowErrorContext = (
	window: Window,
	upperBound: number | null,
): WindowErrorContext => ({
	windowIndex: window.index,
	windowStart: window.start.toISOString(),
	windowEnd: window.end.toISOString(),
	upperBound,
});

/** Aborts the current window; the job keeps its last checkpoint and can resume. */
export class WindowFatalError extends Error {
	readonly code: Exclude<ExtractionFailureCode, "non_retryable">;
	readonly context: WindowErrorContext;

	constructor(args: {
		code: Exclude<ExtractionFailureCode, "non_retryable">;
		message: string;
		context: WindowErrorContext;
		cause?: unknown;
	}) {
		super(args.message, { cause: args.cause });
		this.name = "WindowFatalError";
		this.code = args.code;
		this.context = args.context;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** Bad credentials, missing or private subreddit: the whole job stops. */
export class NonRetryableError extends Error {
	readonly code = "non_retryable" as const;
	readonly status?: number;

	constructor(args: { message: string; status?: number; cause?: unknown }) {
		super(args.message, { cause: args.cause });
		this.name = "NonRetryableError";
		this.status = args.status;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}
