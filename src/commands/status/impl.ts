import pc from "picocolors";
import type { LocalContext } from "../../context.js";
import { OPEN_END, OPEN_START } from "../../extract/job.js";
import type { JobState } from "../../extract/progress-tracker.js";
import { formatCursor } from "../../utils/logger.js";
import {
	formatDay,
	formatWindow,
	generateWindows,
} from "../../windows/time-windows.js";
import { findSavedJobs, type JobFilterFlags } from "../saved-jobs.js";

const statusColors: Record<JobState["status"], (text: string) => string> = {
	"not-started": pc.dim,
	running: pc.yellow,
	finished: pc.green,
	failed: pc.red,
};

export function formatJobStatus(state: JobState): string[] {
	const { job } = state;
	const range = {
		start: new Date(state.plan.start),
		end: new Date(state.plan.end),
	};
	const windows = generateWindows(range, job.granularity);

	const notes = [
		job.granularity,
		...(job.startDate === OPEN_START ? ["default start"] : []),
		...(job.endDate === OPEN_END ? ["open end"] : []),
	].join(", ");
	const color = statusColors[state.status];

	const lines = [
		`${pc.bold(`r/${job.subreddit}`)} ${pc.dim(job.key)} ${color(state.status)}`,
		`  query        ${job.query}`,
		`  range        ${formatDay(range.start)} → ${formatDay(range.end)} (${notes})`,
		`  windows      ${state.completedWindows.length}/${windows.length} complete`,
		`  exported     ${state.recordsExported}`,
	];

	const current =
		state.currentWindow === null ? undefined : windows[state.currentWindow];
	if (current) {
		const cursor = state.cursor ? ` below ${formatCursor(state.cursor)}` : "";
		lines.push(`  current      ${formatWindow(current)}${cursor}`);
	}
	if (state.lastError) {
		const { code, message, at } = state.lastError;
		lines.push(
			`  last error   ${pc.red(code)} ${message} ${pc.dim(`(${at})`)}`,
		);
	}
	if (state.updatedAt) {
		lines.push(`  updated      ${state.updatedAt}`);
	}
	return lines;
}

export async function status(
	this: LocalContext,
	flags: JobFilterFlags,
): Promise<void> {
	const saved = await findSavedJobs(flags);
	if (saved.length === 0) {
		this.process.stdout.write("No saved jobs match.\n");
		return;
	}

	const blocks = saved.map(({ state }) => formatJobStatus(state).join("\n"));
	this.process.stdout.write(`${blocks.join("\n\n")}\n`);
}
