import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import YAML from "yaml";
import {
	type ExtractionJob,
	jobsDir,
	jobStatePath,
	toJobIdentity,
} from "../../src/extract/job.js";
import {
	compareCursors,
	listJobStates,
	olderCursor,
	ProgressTracker,
	readJobState,
} from "../../src/extract/progress-tracker.js";

const job: ExtractionJob = {
	subreddit: "testsub",
	query: "*",
	range: {
		start: new Date(Date.UTC(2024, 0, 1)),
		end: new Date(Date.UTC(2024, 3, 1)),
	},
	granularity: "monthly",
};

const cursor = (createdUtc: number, id: string) => ({ createdUtc, id });

describe("cursor ordering", () => {
	it("orders by timestamp, then by id length and value", () => {
		const abc = cursor(100, "abc");

		expect(compareCursors(cursor(100, "z"), cursor(200, "a"))).toBeLessThan(0);
		expect(compareCursors(cursor(100, "zz"), abc)).toBeLessThan(0);
		expect(compareCursors(cursor(100, "abd"), abc)).toBeGreaterThan(0);
		expect(compareCursors(cursor(100, "abc"), abc)).toBe(0);
	});

	it("picks the older of two cursors", () => {
		const newer = { createdUtc: 500, id: "b" };
		const older = { createdUtc: 400, id: "a" };
		expect(olderCursor(newer, older)).toBe(older);
		expect(olderCursor(older, newer)).toBe(older);
		expect(olderCursor(null, newer)).toBe(newer);
		expect(olderCursor(newer, null)).toBe(newer);
	});
});

describe("ProgressTracker", () => {
	let workspace: string;
	let statePath: string;

	beforeEach(async () => {
		workspace = await mkdtemp(path.join(os.tmpdir(), "progress-tracker-"));
		statePath = jobStatePath(workspace, job);
	});

	afterEach(async () => {
		await rm(workspace, { recursive: true, force: true });
	});

	it("starts an unseen job from an empty state without writing it", async () => {
		const tracker = new ProgressTracker(statePath);

		const state = await tracker.load(job);

		expect(state).toMatchObject({
			version: 1,
			status: "not-started",
			completedWindows: [],
			currentWindow: null,
			cursor: null,
			recordsExported: 0,
			pendingIds: [],
			plan: {
				start: "2024-01-01T00:00:00.000Z",
				end: "2024-04-01T00:00:00.000Z",
			},
		});
		expect(state.job).toEqual(toJobIdentity(job));
		expect(await readJobState(statePath)).toBeNull();
	});

	it("refuses to use the state before it is loaded", () => {
		expect(() => new ProgressTracker(statePath).state).toThrow("load()");
	});

	it("persists checkpoints and resumes the current window from its cursor", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markRunning();
		await tracker.markWindowComplete(0);
		await tracker.markWindowStarted(1, null);
		await tracker.checkpoint(1, { createdUtc: 1_707_000_000, id: "abc" }, 10);

		const reloaded = new ProgressTracker(statePath);
		const state = await reloaded.load(job);

		expect(state.status).toBe("running");
		expect(state.completedWindows).toEqual([0]);
		expect(state.currentWindow).toBe(1);
		expect(state.recordsExported).toBe(10);
		expect(typeof state.updatedAt).toBe("string");
		expect(reloaded.isWindowComplete(0)).toBe(true);
		expect(reloaded.isWindowComplete(1)).toBe(false);
		expect(reloaded.resumeCursor(1)).toEqual(cursor(1_707_000_000, "abc"));
		expect(reloaded.resumeCursor(2)).toBeNull();
	});

	it("only moves the cursor toward the older edge", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markWindowStarted(0, null);

		await tracker.checkpoint(0, { createdUtc: 1_705_000_000, id: "b" }, 2);
		await tracker.checkpoint(0, { createdUtc: 1_706_000_000, id: "c" }, 0);
		await tracker.checkpoint(0, { createdUtc: 1_704_500_000, id: "a" }, 1);

		expect(tracker.state.cursor).toEqual(cursor(1_704_500_000, "a"));
		expect(tracker.state.recordsExported).toBe(3);
	});

	it("starts a new current window with the given cursor", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markWindowStarted(0, { createdUtc: 1_705_000_000, id: "b" });
		await tracker.markWindowStarted(1, null);

		expect(tracker.state.currentWindow).toBe(1);
		expect(tracker.state.cursor).toBeNull();
	});

	it("never re-enters a completed window", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markWindowStarted(0, null);
		await tracker.markWindowComplete(0);

		expect(tracker.state.currentWindow).toBeNull();
		expect(tracker.state.cursor).toBeNull();
		await expect(tracker.markWindowStarted(0, null)).rejects.toThrow(
			"already complete",
		);
		await expect(tracker.checkpoint(0, null, 1)).rejects.toThrow(
			"already complete",
		);
		expect(tracker.state.recordsExported).toBe(0);
	});

	it("keeps completed windows sorted and unique", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markWindowComplete(2);
		await tracker.markWindowComplete(0);
		await tracker.markWindowComplete(2);

		expect(tracker.state.completedWindows).toEqual([0, 2]);
	});

	it("adds exported counts and rejects negative ones", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);

		await tracker.recordCount(4);
		await tracker.recordCount(0);

		expect(tracker.state.recordsExported).toBe(4);
		await expect(tracker.recordCount(-1)).rejects.toThrow("non-negative");
		await expect(tracker.recordCount(1.5)).rejects.toThrow("non-negative");
	});

	it("clears the pending batch at its checkpoint", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markWindowStarted(0, null);

		await tracker.beginBatch(["a1", "b2"]);
		expect((await readJobState(statePath))?.pendingIds).toEqual(["a1", "b2"]);

		await tracker.checkpoint(0, { createdUtc: 1_704_500_000, id: "a1" }, 2);
		const saved = await readJobState(statePath);
		expect(saved?.pendingIds).toEqual([]);
		expect(saved?.recordsExported).toBe(2);
	});

	it("counts only the pending ids that reached the export store", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.recordCount(10);
		await tracker.beginBatch(["a1", "b2", "c3"]);

		const reloaded = new ProgressTracker(statePath);
		await reloaded.load(job);
		const stored = new Set(["a1", "c3", "z9"]);

		expect(await reloaded.settlePending((id) => stored.has(id))).toBe(2);
		expect(await reloaded.settlePending((id) => stored.has(id))).toBe(0);
		const saved = await readJobState(statePath);
		expect(saved?.recordsExported).toBe(12);
		expect(saved?.pendingIds).toEqual([]);
	});

	it("reopens only the windows a new range moves", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markWindowComplete(0);
		await tracker.markWindowComplete(2);
		await tracker.markWindowStarted(1, cursor(1_707_000_000, "abc"));

		const reopened = await tracker.replan(
			{ start: job.range.start, end: new Date(Date.UTC(2024, 3, 5)) },
			(index) => index < 3,
		);

		expect(reopened).toEqual([]);
		expect(tracker.plannedRange().end).toEqual(
			new Date(Date.UTC(2024, 3, 5)),
		);
		expect(tracker.state.completedWindows).toEqual([0, 2]);
		expect(tracker.resumeCursor(1)).toEqual(cursor(1_707_000_000, "abc"));

		const shrunk = await tracker.replan(job.range, (index) => index === 0);
		expect(shrunk).toEqual([2]);
		const saved = await readJobState(statePath);
		expect(saved?.completedWindows).toEqual([0]);
		expect(saved?.currentWindow).toBeNull();
		expect(saved?.cursor).toBeNull();
		expect(saved?.plan).toEqual({
			start: "2024-01-01T00:00:00.000Z",
			end: "2024-04-01T00:00:00.000Z",
		});
	});

	it("records failures and clears them on the next run", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		const failure = {
			code: "retry_budget_exhausted",
			message: "boom",
			window: 1,
		};
		await tracker.markFailed(failure);

		const failed = await readJobState(statePath);
		expect(failed?.status).toBe("failed");
		expect(failed?.lastError).toMatchObject(failure);

		await tracker.markRunning();
		const running = await readJobState(statePath);
		expect(running?.status).toBe("running");
		expect(running?.lastError).toBeUndefined();
	});

	it("refuses a state file that belongs to another job", async () => {
		const other: ExtractionJob = { ...job, query: "flair:news" };
		const tracker = new ProgressTracker(statePath);
		await tracker.load(other);
		await tracker.save();

		await expect(new ProgressTracker(statePath).load(job)).rejects.toThrow(
			"belongs to job",
		);
	});

	it("ignores fields it does not know about", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markRunning();

		const raw: Record<string, unknown> = YAML.parse(
			await readFile(statePath, "utf8"),
		);
		const extended = { ...raw, futureField: { nested: true } };
		await writeFile(statePath, YAML.stringify(extended), "utf8");

		const state = await new ProgressTracker(statePath).load(job);
		expect(state.status).toBe("running");
		expect(state).not.toHaveProperty("futureField");
	});

	it("writes through a temp file that never lingers", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.save();

		await expect(readFile(`${statePath}.tmp`, "utf8")).rejects.toMatchObject({
			code: "ENOENT",
		});
	});

	it("lists saved jobs and removes them", async () => {
		const tracker = new ProgressTracker(statePath);
		await tracker.load(job);
		await tracker.markRunning();

		const saved = await listJobStates(jobsDir(workspace));
		expect(saved).toHaveLength(1);
		expect(saved[0]?.filePath).toBe(statePath);
		expect(saved[0]?.state.job.key).toBe(toJobIdentity(job).key);

		expect(await tracker.remove()).toBe(true);
		expect(await tracker.remove()).toBe(false);
		expect(await listJobStates(jobsDir(workspace))).toEqual([]);
	});

	it("lists nothing for a workspace without saved jobs", async () => {
		expect(await listJobStates(path.join(workspace, "missing"))).toEqual([]);
	});
});
