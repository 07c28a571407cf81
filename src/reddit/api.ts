import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import type { Sleep } from "../rate-limit/rate-limit-handler.js";
import {
	errorMessage,
	RedditApiError,
	RedditNetworkError,
	RedditSchemaError,
} from "./errors.js";
import { DELETED_AUTHOR } from "./mapping.js";
import type { RedditComment, SearchCapability, SearchItem } from "./types.js";

const AUTH_URL = "https://www.reddit.com/api/v1/access_token";
const API_BASE_URL = "https://oauth.reddit.com";
const LISTING_PAGE_SIZE = 100;
/** Refresh the token this long before Reddit says it expires. */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const tokenSchema = z.object({
	access_token: z.string(),
	expires_in: z.number(),
});

const childSchema = z.object({
	kind: z.string(),
	data: z.unknown(),
});

const listingSchema = z.object({
	data: z.object({
		children: z.array(childSchema),
		after: z.string().nullable().optional(),
	}),
});

const postSchema = z.object({
	id: z.string(),
	title: z.string(),
	selftext: z.string().default(""),
	author: z.string().nullable().optional(),
	score: z.number(),
	num_comments: z.number(),
	created_utc: z.number(),
	permalink: z.string(),
});

const commentSchema = z.object({
	id: z.string(),
	author: z.string().default(DELETED_AUTHOR),
	body: z.string().default(""),
	score: z.number().default(0),
	created_utc: z.number(),
	depth: z.number().default(0),
	// Reddit sends "" when a comment has no replies.
	replies: z
		.union([
			z.literal(""),
			z.object({ data: z.object({ children: z.array(childSchema) }) }),
		])
		.optional(),
});

const commentsResponseSchema = z.tuple([listingSchema, listingSchema]);

const aboutSchema = z.object({
	data: z.object({ created_utc: z.number() }),
});

type Child = z.infer<typeof childSchema>;

export type RedditApiOptions = {
	clientId: string;
	clientSecret: string;
	userAgent: string;
	requestTimeoutMs: number;
	sleepBetweenRequestsMs: number;
	authUrl?: string;
	apiBaseUrl?: string;
	sleep?: Sleep;
	now?: () => number;
};

/**
 * Build the search expression. With an upper bound the query switches to
 * cloudsearch syntax so the bound is applied server-side (inclusive).
 */
export function buildSearchQuery(query: string, before: number | null): string {
	const trimmed = query.trim();
	const isWildcard = trimmed === "" || trimmed === "*";
	if (before === null) return isWildcard ? "*" : trimmed;

	const range = `timestamp:0..${Math.ceil(before)}`;
	if (isWildcard) return range;
	return `(and '${trimmed.replace(/'/g, "\\'")}' ${range})`;
}

function parseRetryAfterMs(headers: Headers): number | undefined {
	const raw = headers.get("retry-after") ?? headers.get("x-ratelimit-reset");
	if (raw && /^\d+(\.\d+)?$/.test(raw)) {
		return Math.ceil(Number(raw) * 1000);
	}
	return undefined;
}

function toSearchItem(data: unknown, path: string): SearchItem {
	const parsed = postSchema.safeParse(data);
	if (!parsed.success) {
		throw new RedditSchemaError({
			path,
			message: `Unexpected post shape from ${path}: ${parsed.error.message}`,
			cause: parsed.error,
		});
	}

	const post = parsed.data;
	return {
		id: post.id,
		title: post.title,
		selftext: post.selftext,
		author: post.author && post.author !== DELETED_AUTHOR ? post.author : null,
		score: post.score,
		numComments: post.num_comments,
		createdUtc: post.created_utc,
		permalink: post.permalink,
	};
}

function parseComments(children: Child[], path: string): RedditComment[] {
	const comments: RedditComment[] = [];

	for (const child of children) {
		if (child.kind !== "t1") continue; // t1 = comment, "more" stubs are skipped

		const parsed = commentSchema.safeParse(child.data);
		if (!parsed.success) {
			throw new RedditSchemaError({
				path,
				message: `Unexpected comment shape from ${path}: ${parsed.error.message}`,
				cause: parsed.error,
			});
		}

		const data = parsed.data;
		const comment: RedditComment = {
			id: data.id,
			author: data.author,
			body: data.body,
			score: data.score,
			created_utc: data.created_utc,
			depth: data.depth,
		};

		if (data.replies) {
			comment.replies = parseComments(data.replies.data.children, path);
		}

		comments.push(comment);
	}

	return comments;
}

function parseBody<T>(
	text: string,
	path: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
	let body: unknown;
	try {
		body = JSON.parse(text);
	} catch (error) {
		throw new RedditSchemaError({
			path,
			message: `Reddit returned invalid JSON (${path})`,
			cause: error,
		});
	}

	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		throw new RedditSchemaError({
			path,
			message: `Unexpected response shape from ${path}: ${parsed.error.message}`,
			cause: parsed.error,
		});
	}
	return parsed.data;
}

export class RedditApi implements SearchCapability {
	private readonly authUrl: string;
	private readonly apiBaseUrl: string;
	private readonly sleep: Sleep;
	private readonly now: () => number;
	private token: { value: string; expiresAt: number } | null = null;

	constructor(private readonly options: RedditApiOptions) {
		this.authUrl = options.authUrl ?? AUTH_URL;
		this.apiBaseUrl = options.apiBaseUrl ?? API_BASE_URL;
		this.sleep =
			options.sleep ??
			(async (ms) => {
				await delay(ms);
			});
		this.now = options.now ?? Date.now;
	}

	async *search(
		subreddit: string,
		query: string,
		before: number | null,
		limit: number,
	): AsyncGenerator<SearchItem> {
		let after: string | undefined;
		let yielded = 0;

		while (yielded < limit) {
			const params = new URLSearchParams({
				q: buildSearchQuery(query, before),
				restrict_sr: "1",
				sort: "new",
				limit: String(Math.min(LISTING_PAGE_SIZE, limit - yielded)),
				raw_json: "1",
			});
			if (before !== null) params.set("syntax", "cloudsearch");
			if (after) params.set("after", after);

			const path = `/r/${encodeURIComponent(subreddit)}/search`;
			const listing = await this.fetchJson(`${path}?${params}`, listingSchema);
			// t3 = post
			const posts = listing.data.children.filter(
				(child) => child.kind === "t3",
			);

			for (const child of posts) {
				yield toSearchItem(child.data, path);
				yielded += 1;
				if (yielded >= limit) return;
			}

			after = listing.data.after ?? undefined;
			if (!after || posts.length === 0) return;

			// Be nice to Reddit's API
			await this.sleep(this.options.sleepBetweenRequestsMs);
		}
	}

	async fetchComments(
		subreddit: string,
		postId: string,
	): Promise<RedditComment[]> {
		const cleanId = postId.replace(/^t3_/, "");
		const path = `/r/${encodeURIComponent(subreddit)}/comments/${encodeURIComponent(cleanId)}`;
		const [, comments] = await this.fetchJson(
			`${path}?limit=500&depth=10&raw_json=1`,
			commentsResponseSchema,
		);
		return parseComments(comments.data.children, path);
	}

	async subredditCreatedAt(subreddit: string): Promise<Date> {
		const about = await this.fetchJson(
			`/r/${encodeURIComponent(subreddit)}/about`,
			aboutSchema,
		);
		return new Date(about.data.created_utc * 1000);
	}

	private async accessToken(): Promise<string> {
		if (this.token && this.token.expiresAt > this.now()) {
			return this.token.value;
		}

		const credentials = Buffer.from(
			`${this.options.clientId}:${this.options.clientSecret}`,
		).toString("base64");
		const body = new URLSearchParams({ grant_type: "client_credentials" });

		const token = await this.request(
			this.authUrl,
			"/api/v1/access_token",
			{
				method: "POST",
				headers: {
					Authorization: `Basic ${credentials}`,
					"Content-Type": "application/x-www-form-urlencoded",
				},
				body,
			},
			tokenSchema,
		);

		this.token = {
			value: token.access_token,
			expiresAt:
				this.now() + token.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
		};
		return token.access_token;
	}

	private async fetchJson<T>(
		pathWithQuery: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	): Promise<T> {
		const token = await this.accessToken();
		const path = pathWithQuery.split("?")[0] ?? pathWithQuery;
		return this.request(
			`${this.apiBaseUrl}${pathWithQuery}`,
			path,
			{ headers: { Authorization: `Bearer ${token}` } },
			schema,
		);
	}

	/** The timeout covers the whole exchange, body included. */
	private async request<T>(
		url: string,
		path: string,
		init: {
			method?: string;
			headers: Record<string, string>;
			body?: URLSearchParams;
		},
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	): Promise<T> {
		const controller = new AbortController();
		const timeout = setTimeout(
			() => controller.abort(),
			this.options.requestTimeoutMs,
		);

		try {
			let response: Response;
			try {
				response = await fetch(url, {
					...init,
					headers: {
						...init.headers,
						"User-Agent": this.options.userAgent,
					},
					signal: controller.signal,
				});
			} catch (error) {
				throw this.networkError(path, error, controller.signal.aborted);
			}

			if (!response.ok) {
				const detail = await response.text().catch(() => "");
				throw new RedditApiError({
					status: response.status,
					path,
					message: `Reddit API error: ${response.status} ${response.statusText} (${path})${
						detail.includes("RATELIMIT") ? " RATELIMIT" : ""
					}`,
					retryAfterMs:
						response.status === 429
							? parseRetryAfterMs(response.headers)
							: undefined,
				});
			}

			let text: string;
			try {
				text = await response.text();
			} catch (error) {
				// The connection dropped or stalled mid-body.
				throw this.networkError(path, error, controller.signal.aborted);
			}
			return parseBody(text, path, schema);
		} finally {
			clearTimeout(timeout);
		}
	}

	private networkError(
		path: string,
		error: unknown,
		isTimeout: boolean,
	): RedditNetworkError {
		return new RedditNetworkError({
			path,
			isTimeout,
			message: isTimeout
				? `Reddit request timeout after ${this.options.requestTimeoutMs}ms (${path})`
				: `Reddit request failed (${path}): ${errorMessage(error)}`,
			cause: error,
		});
	}
}
