import type { LocalContext } from "../../context.js";
import { ProgressTracker } from "../../extract/progress-tracker.js";
import { logger } from "../../utils/logger.js";
import {
	findSavedJobs,
	hasJobFilter,
	type JobFilterFlags,
} from "../saved-jobs.js";

interface ResetCommandFlags extends JobFilterFlags {
	all?: boolean;
}

export async function reset(
	this: LocalContext,
	flags: ResetCommandFlags,
): Promise<void> {
	const { all, ...filter } = flags;
	if (!all && !hasJobFilter(filter)) {
		throw new Error(
			"Pass --subreddit (or another job filter) to choose jobs, or --all to reset every job",
		);
	}

	const saved = await findSavedJobs(filter);
	if (saved.length === 0) {
		logger.info("No saved jobs match, nothing to reset");
		return;
	}

	for (const { filePath, state } of saved) {
		const removed = await new ProgressTracker(filePath).remove();
		if (removed) {
			logger.info(
				`Reset r/${state.job.subreddit} ${state.job.key} (${state.recordsExported} exported rows kept)`,
			);
		}
	}
}
