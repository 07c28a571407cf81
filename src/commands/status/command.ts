import { buildCommand } from "@stricli/core";
import { granularitySchema } from "../../windows/time-windows.js";

export const statusCommand = buildCommand({
	loader: async () => {
		const { status } = await import("./impl.js");
		return status;
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
			workspace: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Directory holding the saved job state",
			},
		},
	},
	docs: {
		brief: "Show the saved progress of extraction jobs",
		fullDescription:
			"Reads the job state files in the workspace. Nothing is sent to Reddit.",
	},
});
