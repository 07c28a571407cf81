import type { ExportRecord, RedditComment, SearchItem } from "./types.js";

export const DELETED_AUTHOR = "[deleted]";
const REDDIT_BASE_URL = "https://www.reddit.com";
const REMOVED_BODIES = new Set(["[deleted]", "[removed]"]);

export function buildPostUrl(permalink: string): string {
	return `${REDDIT_BASE_URL}${permalink}`;
}

/** Recovers the post id from a `/comments/<id>/` url; null when it has none. */
export function recordIdFromUrl(url: string): string | null {
	const match = /\/comments\/([a-z0-9]+)(?:\/|$)/i.exec(url);
	return match?.[1] ?? null;
}

/**
 * Flatten nested comments into a single array with depth preserved.
 */
export function flattenComments(comments: RedditComment[]): RedditComment[] {
	const result: RedditComment[] = [];

	function traverse(items: RedditComment[]) {
		for (const comment of items) {
			result.push(comment);
			if (comment.replies) {
				traverse(comment.replies);
			}
		}
	}

	traverse(comments);
	return result;
}

export function formatCommentsAsText(comments: RedditComment[]): string {
	return flattenComments(comments)
		.filter((comment) => !REMOVED_BODIES.has(comment.body))
		.map((comment) => `${comment.author || DELETED_AUTHOR}\n${comment.body}`)
		.join("\n\n");
}

export function toExportRecord(
	item: SearchItem,
	comments: RedditComment[],
): ExportRecord {
	return {
		id: item.id,
		url: buildPostUrl(item.permalink),
		title: item.title,
		date: new Date(item.createdUtc * 1000),
		user: item.author ?? DELETED_AUTHOR,
		nVotes: item.score,
		nComments: item.numComments,
		textOp: item.selftext,
		textComments: formatCommentsAsText(comments),
	};
}
