import { z } from "zod";

export const granularitySchema = z.enum(["monthly", "yearly"]);
export type Granularity = z.infer<typeof granularitySchema>;

export type DateRange = {
	start: Date;
	end: Date;
};

/** Half-open interval `[start, end)`. */
export type Window = {
	index: number;
	start: Date;
	end: Date;
};

function nextBoundary(current: Date, granularity: Granularity): Date {
	const year = current.getUTCFullYear();
	switch (granularity) {
		case "monthly":
			return new Date(Date.UTC(year, current.getUTCMonth() + 1, 1));
		case "yearly":
			return new Date(Date.UTC(year + 1, 0, 1));
	}
}

/**
 * Splits `[start, end)` into contiguous windows aligned on UTC calendar
 * boundaries. The first and last windows may be partial.
 */
export function generateWindows(
	range: DateRange,
	granularity: Granularity,
): Window[] {
	const startMs = range.start.getTime();
	const endMs = range.end.getTime();
	if (Number.isNaN(startMs) || Number.isNaN(endMs)) {
		throw new Error("Window range must use valid dates");
	}

	const windows: Window[] = [];
	let current = new Date(startMs);

	while (current.getTime() < endMs) {
		const boundary = nextBoundary(current, granularity);
		const windowEnd = new Date(Math.min(boundary.getTime(), endMs));
		windows.push({ index: windows.length, start: current, end: windowEnd });
		current = windowEnd;
	}

	return windows;
}

export function toEpochSeconds(date: Date): number {
	return Math.floor(date.getTime() / 1000);
}

export function formatDay(date: Date): string {
	return date.toISOString().slice(0, 10);
}

export function formatWindow(window: Window): string {
	return `${formatDay(window.start)} → ${formatDay(window.end)}`;
}
