import { buildCommand, numberParser } from "@stricli/core";
import { granularitySchema } from "../../windows/time-windows.js";

export const extractCommand = buildCommand({
	loader: async () => {
		const { extract } = await import("./impl.js");
		return extract;
	},
	parameters: {
		flags: {
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "YAML file with default settings; flags override it",
			},
			subreddit: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Subreddit to back-fill, with or without the r/ prefix",
			},
			query: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Search query; * matches every post",
			},
			startDate: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "First day to include (YYYY-MM-DD, UTC). Defaults to the subreddit's creation day",
			},
			endDate: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Day after the last one to include (YYYY-MM-DD, UTC). Defaults to tomorrow",
			},
			granularity: {
				kind: "enum",
				values: granularitySchema.options,
				optional: true,
				brief: "Width of each search window",
			},
			output: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "CSV file to append records to, relative to the workspace",
			},
			workspace: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Directory holding the output file and saved job state",
			},
			batchSize: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Records written per checkpoint",
			},
			baseDelayMs: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Courtesy delay before remote calls and first backoff step",
			},
			maxDelayMs: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Upper bound for a single backoff delay",
			},
			politeEvery: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Apply the courtesy delay before every Nth remote call",
			},
			pageCap: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Items requested per search call (at most 1000)",
			},
			maxItemsPerWindow: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Stop a window after checking this many items",
			},
			maxTransientRetries: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Retries for network errors and 5xx responses",
			},
			maxRateLimitRetries: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Retries for rate-limited responses",
			},
			requestTimeoutMs: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Timeout for a single HTTP request",
			},
			sleepBetweenRequestsMs: {
				kind: "parsed",
				parse: numberParser,
				optional: true,
				brief: "Pause between listing pages inside one search call",
			},
			clientId: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Reddit app client id (or REDDIT_CLIENT_ID)",
			},
			clientSecret: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Reddit app client secret (or REDDIT_CLIENT_SECRET)",
			},
			userAgent: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "User-Agent sent to Reddit (or REDDIT_USER_AGENT)",
			},
		},
	},
	docs: {
		brief: "Extract a subreddit's search history into a CSV file",
		fullDescription:
			"Splits the date range into monthly or yearly windows and pages through each one newest first. Progress is checkpointed after every batch, so an interrupted run picks up where it stopped.",
	},
});
