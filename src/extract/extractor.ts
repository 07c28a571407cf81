import { toExportRecord } from "../reddit/mapping.js";
import type { ExportRecord, SearchItem } from "../reddit/types.js";
import {
	type JobLogContext,
	logBatchFlushed,
	logJobFailed,
	logJobFinished,
	logJobStarted,
	logPlanExtended,
	logRecordPlaceholder,
	logSafetyCapReached,
	logWindowCompleted,
	logWindowSkipped,
	logWindowStarted,
	type WindowLogContext,
} from "../utils/logger.js";
import {
	type DateRange,
	formatDay,
	generateWindows,
	type Window,
} from "../windows/time-windows.js";
import {
	type ExtractionFailureCode,
	NonRetryableError,
	WindowFatalError,
} from "./errors.js";
import type { IncrementalExporter } from "./incremental-exporter.js";
import { type ExtractionJob, jobKey } from "./job.js";
import {
	type Cursor,
	olderCursor,
	type ProgressTracker,
} from "./progress-tracker.js";
import type { RemoteSearchClient, StopReason } from "./search-client.js";

export type ExtractorDeps = {
	client: RemoteSearchClient;
	tracker: ProgressTracker;
	exporter: IncrementalExporter;
	/** Records buffered before each export write and checkpoint. */
	batchSize: number;
};

export type ExtractionFailure = {
	code: ExtractionFailureCode;
	message: string;
	windowIndex: number;
	cursor: Cursor | null;
};

export type ExtractionSummary = {
	status: "finished" | "failed";
	jobKey: string;
	windowsTotal: number;
	windowsCompleted: number;
	windowsSkipped: number;
	windowsTruncated: number;
	recordsExported: number;
	recordsTotal: number;
	duplicatesSkipped: number;
	placeholders: number;
	elapsedMs: number;
	failure?: ExtractionFailure;
};

type WindowResult =
	| { ok: true; truncated: boolean }
	| { ok: false; error: WindowFatalError; cursor: Cursor | null };

const cursorOf = (item: SearchItem): Cursor => ({
	createdUtc: item.createdUtc,
	id: item.id,
});

const sameRange = (a: DateRange, b: DateRange) =>
	a.start.getTime() === b.start.getTime() &&
	a.end.getTime() === b.end.getTime();

/**
 * The range this run walks. A defaulted start keeps the saved one; a
 * defaulted end only grows. Windows whose bounds move are reopened, the
 * ones before them stay complete.
 */
async function adoptPlan(
	job: ExtractionJob,
	tracker: ProgressTracker,
	context: JobLogContext,
): Promise<DateRange> {
	const saved = tracker.plannedRange();
	const range: DateRange = {
		start: job.openStart ? saved.start : job.range.start,
		end:
			job.openEnd && saved.end.getTime() > job.range.end.getTime()
				? saved.end
				: job.range.end,
	};
	if (sameRange(range, saved)) return range;

	const before = generateWindows(saved, job.granularity);
	const after = generateWindows(range, job.granularity);
	const reopened = await tracker.replan(range, (index) => {
		const a = before[index];
		const b = after[index];
		return a !== undefined && b !== undefined && sameRange(a, b);
	});
	logPlanExtended(context, { from: saved, to: range, reopened });
	return range;
}

/**
 * Walks the job's windows in order, skipping completed ones and resuming the
 * one in progress from its saved cursor. Window-level failures end the run
 * with a `failed` summary; non-retryable errors are rethrown.
 */
export async function extractHistory(
	job: ExtractionJob,
	deps: ExtractorDeps,
): Promise<ExtractionSummary> {
	const { tracker, exporter } = deps;
	if (!Number.isInteger(deps.batchSize) || deps.batchSize < 1) {
		throw new Error(`batchSize must be an integer >= 1, got ${deps.batchSize}`);
	}

	const startedAt = Date.now();
	const context = { subreddit: job.subreddit };

	const state = await tracker.load(job);
	const resumed = state.status !== "not-started";
	const range = await adoptPlan(job, tracker, context);
	const windows = generateWindows(range, job.granularity);

	await exporter.load();
	await tracker.settlePending((id) => exporter.has(id));
	await tracker.markRunning();

	logJobStarted(context, {
		jobKey: jobKey(job),
		totalWindows: windows.length,
		range: `${formatDay(range.start)} → ${formatDay(range.end)}`,
		resumed,
	});

	const summary: ExtractionSummary = {
		status: "finished",
		jobKey: jobKey(job),
		windowsTotal: windows.length,
		windowsCompleted: 0,
		windowsSkipped: 0,
		windowsTruncated: 0,
		recordsExported: 0,
		recordsTotal: exporter.rowCount,
		duplicatesSkipped: 0,
		placeholders: 0,
		elapsedMs: 0,
	};

	for (const window of windows) {
		const windowContext: WindowLogContext = {
			...context,
			window,
			totalWindows: windows.length,
		};

		if (tracker.isWindowComplete(window.index)) {
			summary.windowsSkipped += 1;
			logWindowSkipped(windowContext);
			continue;
		}

		const result = await extractWindow(window, windowContext, deps, summary);
		summary.recordsTotal = exporter.rowCount;

		if (!result.ok) {
			summary.status = "failed";
			summary.failure = {
				code: result.error.code,
				message: result.error.message,
				windowIndex: window.index,
				cursor: result.cursor,
			};
			summary.elapsedMs = Date.now() - startedAt;
			return summary;
		}

		summary.windowsCompleted += 1;
		if (result.truncated) summary.windowsTruncated += 1;
	}

	await tracker.markFinished();
	summary.elapsedMs = Date.now() - startedAt;
	logJobFinished(context, {
		exported: summary.recordsExported,
		recordsTotal: summary.recordsTotal,
		output: exporter.outputPath,
		elapsedMs: summary.elapsedMs,
	});
	return summary;
}

async function extractWindow(
	window: Window,
	context: WindowLogContext,
	deps: ExtractorDeps,
	summary: ExtractionSummary,
): Promise<WindowResult> {
	const { client, tracker, exporter, batchSize } = deps;

	const startCursor = tracker.resumeCursor(window.index);
	await tracker.markWindowStarted(window.index, startCursor);
	logWindowStarted(context, startCursor);

	let cursor = startCursor;
	let buffer: ExportRecord[] = [];
	const pendingIds = new Set<string>();
	let exported = 0;
	let duplicates = 0;
	const stop: { reason: StopReason | null; checked: number } = {
		reason: null,
		checked: 0,
	};

	// Pending ids, export, then checkpoint: the saved cursor never runs ahead
	// of saved rows.
	const flush = async () => {
		const batch = buffer;
		buffer = [];
		pendingIds.clear();

		let appended = 0;
		if (batch.length > 0) {
			await tracker.beginBatch(batch.map((record) => record.id));
			appended = await exporter.append(batch);
		}
		await tracker.checkpoint(window.index, cursor, appended);

		exported += appended;
		duplicates += batch.length - appended;
		summary.recordsExported += appended;
		logBatchFlushed(context, appended, cursor);
	};

	try {
		const items = client.enumerateWindow(window, startCursor, {
			onStop: (reason, checked) => {
				stop.reason = reason;
				stop.checked = checked;
			},
		});

		for await (const item of items) {
			if (exporter.has(item.id) || pendingIds.has(item.id)) {
				duplicates += 1;
				summary.duplicatesSkipped += 1;
				cursor = olderCursor(cursor, cursorOf(item));
				continue;
			}

			const { comments, unavailable } = await client.loadComments(item, window);
			if (unavailable) {
				summary.placeholders += 1;
				logRecordPlaceholder(context, item.id, unavailable);
			}

			buffer.push(toExportRecord(item, comments));
			pendingIds.add(item.id);
			cursor = olderCursor(cursor, cursorOf(item));

			if (buffer.length >= batchSize) {
				await flush();
			}
		}
	} catch (error) {
		if (
			!(
				error instanceof WindowFatalError ||
				error instanceof NonRetryableError
			)
		) {
			throw error;
		}

		await flush();
		await tracker.markFailed({
			code: error.code,
			message: error.message,
			window: window.index,
		});
		logJobFailed(context, {
			code: error.code,
			message: error.message,
			window,
			cursor,
		});

		if (error instanceof NonRetryableError) throw error;
		return { ok: false, error, cursor };
	}

	await flush();
	await tracker.markWindowComplete(window.index);

	const truncated = stop.reason === "safety-cap";
	if (truncated) {
		logSafetyCapReached(context, stop.checked);
	}
	logWindowCompleted(context, exported, duplicates);
	return { ok: true, truncated };
}
