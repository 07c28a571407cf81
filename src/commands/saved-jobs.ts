import path from "node:path";
import { jobFilterSchema } from "../config.js";
import { jobsDir, matchesJobFilter } from "../extract/job.js";
import { listJobStates, type SavedJob } from "../extract/progress-tracker.js";
import type { Granularity } from "../windows/time-windows.js";

export interface JobFilterFlags {
	subreddit?: string;
	query?: string;
	granularity?: Granularity;
	startDate?: string;
	endDate?: string;
	workspace?: string;
}

export function hasJobFilter(flags: JobFilterFlags): boolean {
	return (
		flags.subreddit !== undefined ||
		flags.query !== undefined ||
		flags.granularity !== undefined ||
		flags.startDate !== undefined ||
		flags.endDate !== undefined
	);
}

/** Saved jobs under the workspace that match every flag given. */
export async function findSavedJobs(
	flags: JobFilterFlags,
): Promise<SavedJob[]> {
	const { workspace, ...filter } = jobFilterSchema.parse(flags);
	const saved = await listJobStates(jobsDir(path.resolve(workspace)));
	return saved.filter(({ state }) => matchesJobFilter(state.job, filter));
}
