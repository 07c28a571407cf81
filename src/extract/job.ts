import { createHash } from "node:crypto";
import path from "node:path";
import { z } from "zod";
import {
	type DateRange,
	type Granularity,
	granularitySchema,
} from "../windows/time-windows.js";

export const STATE_DIR_NAME = ".reddit-backfill";

export type ExtractionJob = {
	subreddit: string;
	query: string;
	range: DateRange;
	granularity: Granularity;
	/** No start was given; the first run's start is kept. */
	openStart?: boolean;
	/** No end was given; each run extends the saved plan up to its own end. */
	openEnd?: boolean;
};

export const OPEN_START = "auto";
export const OPEN_END = "open";

export const jobIdentitySchema = z.object({
	key: z.string(),
	subreddit: z.string(),
	query: z.string(),
	startDate: z.string(),
	endDate: z.string(),
	granularity: granularitySchema,
});

export type JobIdentity = z.infer<typeof jobIdentitySchema>;

/** Dates as the operator gave them; defaulted ones are markers, not values. */
function identityDates(job: ExtractionJob): {
	startDate: string;
	endDate: string;
} {
	return {
		startDate: job.openStart ? OPEN_START : job.range.start.toISOString(),
		endDate: job.openEnd ? OPEN_END : job.range.end.toISOString(),
	};
}

/**
 * Same parameters always give the same key, so a re-run finds its saved
 * state even when a defaulted date resolves differently.
 */
export function jobKey(job: ExtractionJob): string {
	const subreddit = job.subreddit.toLowerCase();
	const { startDate, endDate } = identityDates(job);
	const digest = createHash("sha256")
		.update(
			[subreddit, job.query, startDate, endDate, job.granularity].join("\n"),
		)
		.digest("hex")
		.slice(0, 16);
	return `${subreddit.replace(/[^a-z0-9_-]/g, "_")}-${digest}`;
}

export function toJobIdentity(job: ExtractionJob): JobIdentity {
	return {
		key: jobKey(job),
		subreddit: job.subreddit,
		query: job.query,
		...identityDates(job),
		granularity: job.granularity,
	};
}

export function jobsDir(workspacePath: string): string {
	return path.join(workspacePath, STATE_DIR_NAME, "jobs");
}

export function jobStatePath(
	workspacePath: string,
	job: ExtractionJob,
): string {
	return path.join(jobsDir(workspacePath), `${jobKey(job)}.yaml`);
}

/** Fallback start when the subreddit's creation date can't be read. */
export const REDDIT_LAUNCH_DATE = new Date(Date.UTC(2005, 5, 23));

export function startOfUtcDay(date: Date): Date {
	return new Date(
		Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
	);
}

/**
 * Fills in a missing start (the subreddit's creation day) and a missing end
 * (the start of the next UTC day).
 */
export async function resolveDateRange(args: {
	startDate?: Date;
	endDate?: Date;
	lookupCreatedAt: () => Promise<Date>;
	onLookupFailed?: (error: unknown) => void;
	now?: Date;
}): Promise<DateRange> {
	const now = args.now ?? new Date();
	const end =
		args.endDate ??
		new Date(startOfUtcDay(now).getTime() + 24 * 60 * 60 * 1000);

	let start = args.startDate;
	if (!start) {
		try {
			start = startOfUtcDay(await args.lookupCreatedAt());
		} catch (error) {
			args.onLookupFailed?.(error);
			start = REDDIT_LAUNCH_DATE;
		}
	}

	if (start.getTime() >= end.getTime()) {
		throw new Error(
			`Start date ${start.toISOString()} must be before end date ${end.toISOString()}`,
		);
	}
	return { start, end };
}

export type JobFilter = {
	subreddit?: string;
	query?: string;
	granularity?: Granularity;
	startDate?: Date;
	endDate?: Date;
};

/**
 * Unset fields match anything; subreddit names compare case-insensitively.
 * A date filter only matches jobs that were given that exact date.
 */
export function matchesJobFilter(
	identity: JobIdentity,
	filter: JobFilter,
): boolean {
	if (
		filter.subreddit !== undefined &&
		identity.subreddit.toLowerCase() !== filter.subreddit.toLowerCase()
	) {
		return false;
	}
	if (filter.query !== undefined && identity.query !== filter.query) {
		return false;
	}
	if (
		filter.granularity !== undefined &&
		identity.granularity !== filter.granularity
	) {
		return false;
	}
	if (
		filter.startDate &&
		identity.startDate !== filter.startDate.toISOString()
	) {
		return false;
	}
	if (filter.endDate && identity.endDate !== filter.endDate.toISOString()) {
		return false;
	}
	return true;
}
