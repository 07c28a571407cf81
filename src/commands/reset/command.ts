import { buildCommand } from "@stricli/core";
import { granularitySchema } from "../../windows/time-windows.js";

export const resetCommand = buildCommand({
	loader: async () => {
		const { reset } = await import("./impl.js");
		return reset;
	},
	parameters: {
		flags: {
			subreddit: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Only jobs for this subreddit",
			},
			query: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Only jobs with this exact query",
			},
			granularity: {
				kind: "enum",
				values: granularitySchema.options,
				optional: true,
				brief: "Only jobs with this window width",
			},
			startDate: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Only jobs starting on this day (YYYY-MM-DD)",
			},
			endDate: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Only jobs ending on this day (YYYY-MM-DD)",
			},
			all: {
				kind: "boolean",
				optional: true,
				brief: "Reset every saved job when no other filter is given",
			},
			workspace: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Directory holding the saved job state",
			},
		},
	},
	docs: {
		brief: "Forget the saved progress of extraction jobs",
		fullDescription:
			"Deletes the matching job state files so the next run starts from the first window. The CSV output is kept, and rows already in it are not exported again.",
	},
});
