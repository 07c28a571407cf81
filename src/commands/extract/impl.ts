import path from "node:path";
import {
	type ConfigFile,
	loadConfigFile,
	resolveCredentials,
	resolveSettings,
} from "../../config.js";
import type { LocalContext } from "../../context.js";
import { NonRetryableError } from "../../extract/errors.js";
import { extractHistory } from "../../extract/extractor.js";
import { IncrementalExporter } from "../../extract/incremental-exporter.js";
import {
	type ExtractionJob,
	jobStatePath,
	REDDIT_LAUNCH_DATE,
	resolveDateRange,
} from "../../extract/job.js";
import { ProgressTracker } from "../../extract/progress-tracker.js";
import { RemoteSearchClient } from "../../extract/search-client.js";
import { RateLimitHandler } from "../../rate-limit/rate-limit-handler.js";
import { RedditApi } from "../../reddit/api.js";
import {
	classifyRedditError,
	errorMessage,
	RedditApiError,
} from "../../reddit/errors.js";
import { logRunSummary, logStartDateFallback } from "../../utils/logger.js";
import type { Granularity } from "../../windows/time-windows.js";

interface ExtractCommandFlags {
	config?: string;
	subreddit?: string;
	query?: string;
	startDate?: string;
	endDate?: string;
	granularity?: Granularity;
	output?: string;
	workspace?: string;
	batchSize?: number;
	baseDelayMs?: number;
	maxDelayMs?: number;
	politeEvery?: number;
	pageCap?: number;
	maxItemsPerWindow?: number;
	maxTransientRetries?: number;
	maxRateLimitRetries?: number;
	requestTimeoutMs?: number;
	sleepBetweenRequestsMs?: number;
	clientId?: string;
	clientSecret?: string;
	userAgent?: string;
}

export async function extract(
	this: LocalContext,
	flags: ExtractCommandFlags,
): Promise<void> {
	const { config, clientId, clientSecret, userAgent, ...settingFlags } =
		flags;
	const file: ConfigFile = config ? await loadConfigFile(config) : {};
	const settings = resolveSettings({ file, flags: settingFlags });

	// Checked before anything touches the network.
	const credentials = resolveCredentials({
		clientId: clientId ?? file.clientId,
		clientSecret: clientSecret ?? file.clientSecret,
		userAgent: userAgent ?? file.userAgent,
	});

	const context = { subreddit: settings.subreddit };
	const api = new RedditApi({
		...credentials,
		requestTimeoutMs: settings.requestTimeoutMs,
		sleepBetweenRequestsMs: settings.sleepBetweenRequestsMs,
	});

	const range = await resolveDateRange({
		startDate: settings.startDate,
		endDate: settings.endDate,
		lookupCreatedAt: () => api.subredditCreatedAt(settings.subreddit),
		onLookupFailed: (error) => {
			if (classifyRedditError(error) === "non-retryable") {
				throw new NonRetryableError({
					message: `Cannot read r/${settings.subreddit}: ${errorMessage(error)}`,
					status:
						error instanceof RedditApiError ? error.status : undefined,
					cause: error,
				});
			}
			logStartDateFallback(context, REDDIT_LAUNCH_DATE, errorMessage(error));
		},
	});

	const job: ExtractionJob = {
		subreddit: settings.subreddit,
		query: settings.query,
		range,
		granularity: settings.granularity,
		openStart: settings.startDate === undefined,
		openEnd: settings.endDate === undefined,
	};

	const workspace = path.resolve(settings.workspace);
	const tracker = new ProgressTracker(jobStatePath(workspace, job));
	const exporter = new IncrementalExporter(
		path.resolve(workspace, settings.output),
	);
	const rateLimiter = new RateLimitHandler({
		baseDelayMs: settings.baseDelayMs,
		maxDelayMs: settings.maxDelayMs,
		politeEvery: settings.politeEvery,
	});
	const client = new RemoteSearchClient(api, rateLimiter, {
		subreddit: settings.subreddit,
		query: settings.query,
		pageCap: settings.pageCap,
		maxItemsPerWindow: settings.maxItemsPerWindow,
		maxTransientRetries: settings.maxTransientRetries,
		maxRateLimitRetries: settings.maxRateLimitRetries,
	});

	const summary = await extractHistory(job, {
		client,
		tracker,
		exporter,
		batchSize: settings.batchSize,
	});
	logRunSummary(context, summary);

	if (summary.failure) {
		const { code, windowIndex, message } = summary.failure;
		throw new Error(
			`Extraction stopped in window ${windowIndex + 1}/${summary.windowsTotal} (${code}): ${message}. Run the same command again to resume.`,
		);
	}
}
