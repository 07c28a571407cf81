import pc from "picocolors";
import pino from "pino";
import pretty from "pino-pretty";
import type { Cursor } from "../extract/progress-tracker.js";
import {
	type DateRange,
	formatDay,
	formatWindow,
	type Window,
} from "../windows/time-windows.js";

export type JobLogContext = {
	subreddit: string;
};

export type WindowLogContext = JobLogContext & {
	window: Window;
	totalWindows: number;
};

const stream = pretty({
	colorize: true,
	translateTime: "HH:MM:ss",
	ignore: "pid,hostname",
	messageFormat: "{msg}",
	singleLine: true,
});

export const logger = pino(
	{
		level: process.env.LOG_LEVEL ?? "info",
	},
	stream,
);

export function logJobStarted(
	context: JobLogContext,
	args: {
		jobKey: string;
		totalWindows: number;
		range: string;
		resumed: boolean;
	},
): void {
	const mode = args.resumed ? pc.yellow("resuming") : pc.green("starting");
	logger.info(
		`${formatPrefix(context)} ${mode} ${pc.dim(args.jobKey)} ${pc.dim(
			`${args.totalWindows} windows, ${args.range}`,
		)}`,
	);
}

export function logPlanExtended(
	context: JobLogContext,
	args: { from: DateRange; to: DateRange; reopened: number[] },
): void {
	const reopened =
		args.reopened.length > 0
			? `, reopening window ${args.reopened.map((index) => index + 1).join(", ")}`
			: "";
	logger.info(
		`${formatPrefix(context)} ${pc.yellow("range moved")} ${pc.dim(
			`${formatDay(args.from.end)} → ${formatDay(args.to.end)}${reopened}`,
		)}`,
	);
}

export function logWindowSkipped(context: WindowLogContext): void {
	logger.debug(
		`${formatPrefix(context)} ${formatWindowLabel(context)} ${pc.dim("already complete")}`,
	);
}

export function logWindowStarted(
	context: WindowLogContext,
	cursor: Cursor | null,
): void {
	const detail = cursor
		? pc.yellow(`resuming below ${formatCursor(cursor)}`)
		: pc.dim("from newest edge");
	logger.info(
		`${formatPrefix(context)} ${formatWindowLabel(context)} ${detail}`,
	);
}

export function logBatchFlushed(
	context: WindowLogContext,
	appended: number,
	cursor: Cursor | null,
): void {
	const where = cursor ? pc.dim(`cursor ${formatCursor(cursor)}`) : "";
	logger.debug(
		`${formatPrefix(context)} saved ${pc.green(`${appended} new`)} ${where}`.trimEnd(),
	);
}

export function logWindowCompleted(
	context: WindowLogContext,
	exported: number,
	duplicates: number,
): void {
	const newLabel = exported > 0 ? pc.green(`${exported} new`) : pc.dim("0 new");
	logger.info(
		`${formatPrefix(context)} ${formatWindowLabel(context)} complete ${newLabel} ${pc.dim(
			`| ${duplicates} already saved`,
		)}`,
	);
}

export function logSafetyCapReached(
	context: WindowLogContext,
	checked: number,
): void {
	logger.warn(
		`${formatPrefix(context)} ${formatWindowLabel(context)} ${pc.red(
			`stopped after checking ${checked} items`,
		)}`,
	);
}

export function logRateLimited(attempt: number, delayMs: number): void {
	logger.warn(
		`${pc.yellow("rate limited")} ${pc.dim(
			`attempt ${attempt + 1}, waiting ${formatDuration(delayMs)}`,
		)}`,
	);
}

export function logTransientRetry(args: {
	attempt: number;
	maxAttempts: number;
	delayMs: number;
	reason: string;
}): void {
	logger.warn(
		`${pc.yellow("retrying")} ${pc.dim(
			`${args.attempt}/${args.maxAttempts} in ${formatDuration(args.delayMs)} (${args.reason})`,
		)}`,
	);
}

export function logRecordPlaceholder(
	context: JobLogContext,
	itemId: string,
	reason: string,
): void {
	logger.warn(
		`${formatPrefix(context)} ${pc.dim(itemId)} comments unavailable ${pc.dim(`(${reason})`)}`,
	);
}

export function logJobFinished(
	context: JobLogContext,
	args: {
		exported: number;
		recordsTotal: number;
		output: string;
		elapsedMs: number;
	},
): void {
	logger.info(
		`${formatPrefix(context)} ${pc.green("finished")} ${pc.green(
			`${args.exported} new`,
		)} ${pc.dim(`| ${args.recordsTotal} total in ${args.output} in ${formatDuration(args.elapsedMs)}`)}`,
	);
}

export function logJobFailed(
	context: JobLogContext,
	args: {
		code: string;
		message: string;
		window?: Window;
		cursor?: Cursor | null;
	},
): void {
	const where = args.window
		? ` ${pc.dim(`window ${formatWindow(args.window)}`)}`
		: "";
	const cursor = args.cursor
		? ` ${pc.dim(`cursor ${formatCursor(args.cursor)}`)}`
		: "";
	logger.error(
		`${formatPrefix(context)} ${pc.red("failed")} ${pc.bold(args.code)}${where}${cursor} ${pc.dim(
			args.message,
		)}`,
	);
}

export function logStartDateFallback(
	context: JobLogContext,
	fallback: Date,
	reason: string,
): void {
	logger.warn(
		`${formatPrefix(context)} ${pc.yellow("creation date unavailable")} ${pc.dim(
			`starting from ${fallback.toISOString().slice(0, 10)} (${reason})`,
		)}`,
	);
}

export function logRunSummary(
	context: JobLogContext,
	summary: {
		windowsCompleted: number;
		windowsSkipped: number;
		windowsTruncated: number;
		windowsTotal: number;
		recordsExported: number;
		duplicatesSkipped: number;
		placeholders: number;
	},
): void {
	const windows = `${summary.windowsCompleted + summary.windowsSkipped}/${summary.windowsTotal} windows`;
	const details = [
		`${summary.windowsSkipped} skipped`,
		`${summary.windowsTruncated} truncated`,
		`${summary.duplicatesSkipped} duplicates`,
		`${summary.placeholders} without comments`,
	].join(", ");
	logger.info(
		`${formatPrefix(context)} ${windows} ${pc.green(`${summary.recordsExported} exported`)} ${pc.dim(details)}`,
	);
}

export function formatCursor(cursor: Cursor): string {
	return `${new Date(cursor.createdUtc * 1000).toISOString()} (${cursor.id})`;
}

function formatPrefix(context: JobLogContext): string {
	const logo = pc.yellow("👽");
	const subreddit = pc.bold(pc.white(`r/${context.subreddit}`));
	return `${logo}  ${subreddit}`;
}

function formatWindowLabel(context: WindowLogContext): string {
	const position = pc.dim(
		`[${context.window.index + 1}/${context.totalWindows}]`,
	);
	return `${position} ${pc.cyan(formatWindow(context.window))}`;
}

function formatDuration(ms: number): string {
	if (ms < 1000) {
		return `${Math.round(ms)}ms`;
	}
	return `${(ms / 1000).toFixed(1)}s`;
}
