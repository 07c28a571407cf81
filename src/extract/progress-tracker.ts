import { readdir, readFile, rm } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { isMissingFileError, writeFileAtomic } from "../utils/atomic-write.js";
import type { DateRange } from "../windows/time-windows.js";
import { type ExtractionJob, jobIdentitySchema, toJobIdentity } from "./job.js";

const cursorSchema = z.object({
	createdUtc: z.number(),
	id: z.string(),
});

export type Cursor = z.infer<typeof cursorSchema>;

export const jobStatusSchema = z.enum([
	"not-started",
	"running",
	"finished",
	"failed",
]);
export type JobStatus = z.infer<typeof jobStatusSchema>;

const lastErrorSchema = z.object({
	code: z.string(),
	message: z.string(),
	window: z.number().int().nonnegative().nullable().default(null),
	at: z.string(),
});

/** The resolved range that window indices refer to. */
const planSchema = z.object({
	start: z.string(),
	end: z.string(),
});

// Unknown keys are stripped, so newer state files still load.
const jobStateSchema = z.object({
	version: z.literal(1).default(1),
	job: jobIdentitySchema,
	plan: planSchema,
	status: jobStatusSchema.default("not-started"),
	completedWindows: z.array(z.number().int().nonnegative()).default([]),
	currentWindow: z.number().int().nonnegative().nullable().default(null),
	cursor: cursorSchema.nullable().default(null),
	recordsExported: z.number().int().nonnegative().default(0),
	/** Ids of the batch being written, cleared by its checkpoint. */
	pendingIds: z.array(z.string()).default([]),
	lastError: lastErrorSchema.optional(),
	updatedAt: z.string().optional(),
});

export type JobState = z.infer<typeof jobStateSchema>;

/** Negative when `a` is older than `b`. Ids are base36, so longer means newer. */
export function compareCursors(a: Cursor, b: Cursor): number {
	if (a.createdUtc !== b.createdUtc) return a.createdUtc - b.createdUtc;
	if (a.id.length !== b.id.length) return a.id.length - b.id.length;
	return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function olderCursor(a: Cursor | null, b: Cursor | null): Cursor | null {
	if (!a) return b;
	if (!b) return a;
	return compareCursors(b, a) < 0 ? b : a;
}

export function createJobState(job: ExtractionJob): JobState {
	return {
		version: 1,
		job: toJobIdentity(job),
		plan: {
			start: job.range.start.toISOString(),
			end: job.range.end.toISOString(),
		},
		status: "not-started",
		completedWindows: [],
		currentWindow: null,
		cursor: null,
		recordsExported: 0,
		pendingIds: [],
	};
}

export async function readJobState(filePath: string): Promise<JobState | null> {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		if (isMissingFileError(error)) return null;
		throw error;
	}
	return jobStateSchema.parse(YAML.parse(raw));
}

export class ProgressTracker {
	readonly filePath: string;
	private current: JobState | null = null;

	constructor(filePath: string) {
		this.filePath = filePath;
	}

	get state(): JobState {
		if (!this.current) {
			throw new Error("ProgressTracker.load() must be called before use");
		}
		return this.current;
	}

	/** Loads the saved state for this job, or an empty one on the first run. */
	async load(job: ExtractionJob): Promise<JobState> {
		const identity = toJobIdentity(job);
		const saved = await readJobState(this.filePath);

		if (saved && saved.job.key !== identity.key) {
			throw new Error(
				`State file ${this.filePath} belongs to job ${saved.job.key}, ` +
					`not ${identity.key}`,
			);
		}

		this.current = saved ?? createJobState(job);
		return this.state;
	}

	plannedRange(): DateRange {
		const { plan } = this.state;
		return { start: new Date(plan.start), end: new Date(plan.end) };
	}

	/**
	 * Moves the job onto a new range. Completed windows and the cursor are
	 * kept only where `keep` says the window did not change; returns the
	 * completed indices that were reopened.
	 */
	async replan(
		range: DateRange,
		keep: (index: number) => boolean,
	): Promise<number[]> {
		const state = this.state;
		const reopened = state.completedWindows.filter((index) => !keep(index));

		state.plan = {
			start: range.start.toISOString(),
			end: range.end.toISOString(),
		};
		state.completedWindows = state.completedWindows.filter(keep);
		if (state.currentWindow !== null && !keep(state.currentWindow)) {
			state.currentWindow = null;
			state.cursor = null;
		}
		await this.save();
		return reopened;
	}

	isWindowComplete(index: number): boolean {
		return this.state.completedWindows.includes(index);
	}

	/** The saved mid-window cursor, only when `index` is the window in progress. */
	resumeCursor(index: number): Cursor | null {
		return this.state.currentWindow === index ? this.state.cursor : null;
	}

	async save(): Promise<void> {
		const state = this.state;
		state.updatedAt = new Date().toISOString();
		const validated = jobStateSchema.parse(state);
		await writeFileAtomic(this.filePath, YAML.stringify(validated));
	}

	async markRunning(): Promise<void> {
		this.state.status = "running";
		delete this.state.lastError;
		await this.save();
	}

	async markWindowStarted(index: number, cursor: Cursor | null): Promise<void> {
		this.applyCursor(index, cursor);
		await this.save();
	}

	async recordCount(delta: number): Promise<void> {
		this.applyCount(delta);
		await this.save();
	}

	/** Records the ids of a batch before it is written to the export store. */
	async beginBatch(ids: string[]): Promise<void> {
		this.state.pendingIds = [...ids];
		await this.save();
	}

	/** Cursor advance and exported-count delta in a single write. */
	async checkpoint(
		index: number,
		cursor: Cursor | null,
		delta: number,
	): Promise<void> {
		assertCountDelta(delta);
		this.applyCursor(index, cursor);
		this.applyCount(delta);
		this.state.pendingIds = [];
		await this.save();
	}

	async markWindowComplete(index: number): Promise<void> {
		const state = this.state;
		if (!state.completedWindows.includes(index)) {
			state.completedWindows = [...state.completedWindows, index].sort(
				(a, b) => a - b,
			);
		}
		if (state.currentWindow === index) {
			state.currentWindow = null;
			state.cursor = null;
		}
		await this.save();
	}

	/**
	 * Settles a batch left pending by a crash: the ids that reached the export
	 * store count as exported by this job. Returns how many did.
	 */
	async settlePending(isExported: (id: string) => boolean): Promise<number> {
		const { pendingIds } = this.state;
		if (pendingIds.length === 0) return 0;

		const written = pendingIds.filter(isExported).length;
		this.state.recordsExported += written;
		this.state.pendingIds = [];
		await this.save();
		return written;
	}

	async markFinished(): Promise<void> {
		this.state.status = "finished";
		this.state.currentWindow = null;
		this.state.cursor = null;
		await this.save();
	}

	async markFailed(args: {
		code: string;
		message: string;
		window: number | null;
	}): Promise<void> {
		this.state.status = "failed";
		this.state.lastError = { ...args, at: new Date().toISOString() };
		await this.save();
	}

	async remove(): Promise<boolean> {
		this.current = null;
		try {
			await rm(this.filePath);
			return true;
		} catch (error) {
			if (isMissingFileError(error)) return false;
			throw error;
		}
	}

	private applyCursor(index: number, cursor: Cursor | null): void {
		const state = this.state;
		if (state.completedWindows.includes(index)) {
			throw new Error(
				`Window ${index} is already complete and cannot be re-entered`,
			);
		}

		if (state.currentWindow !== index) {
			state.currentWindow = index;
			state.cursor = cursor;
			return;
		}

		// The cursor only moves toward the window's older edge.
		state.cursor = olderCursor(state.cursor, cursor);
	}

	private applyCount(delta: number): void {
		assertCountDelta(delta);
		this.state.recordsExported += delta;
	}
}

function assertCountDelta(delta: number): void {
	if (!Number.isInteger(delta) || delta < 0) {
		throw new Error(
			`Record count delta must be a non-negative integer, got ${delta}`,
		);
	}
}

export type SavedJob = {
	filePath: string;
	state: JobState;
};

/** Every job state saved under `jobsDir`, sorted by file name. */
export async function listJobStates(jobsDir: string): Promise<SavedJob[]> {
	let entries: string[];
	try {
		entries = await readdir(jobsDir);
	} catch (error) {
		if (isMissingFileError(error)) return [];
		throw error;
	}

	const saved: SavedJob[] = [];
	for (const entry of entries.filter((name) => name.endsWith(".yaml")).sort()) {
		const filePath = path.join(jobsDir, entry);
		const state = await readJobState(filePath);
		if (state) saved.push({ filePath, state });
	}
	return saved;
}
