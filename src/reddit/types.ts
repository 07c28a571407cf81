export type RedditComment = {
	id: string;
	author: string;
	body: string;
	score: number;
	created_utc: number;
	depth: number;
	replies?: RedditComment[];
};

/** One search hit, newest-first order as returned by the API. */
export type SearchItem = {
	id: string;
	title: string;
	selftext: string;
	/** `null` when the account was deleted. */
	author: string | null;
	score: number;
	numComments: number;
	/** Epoch seconds. */
	createdUtc: number;
	permalink: string;
};

/**
 * The remote search capability. `search` yields at most `limit` items with
 * `createdUtc <= before` (all items when `before` is null), newest first.
 */
export interface SearchCapability {
	search(
		subreddit: string,
		query: string,
		before: number | null,
		limit: number,
	): AsyncIterable<SearchItem>;
	fetchComments(subreddit: string, postId: string): Promise<RedditComment[]>;
}

export type ExportRecord = {
	id: string;
	url: string;
	title: string;
	date: Date;
	user: string;
	nVotes: number;
	nComments: number;
	textOp: string;
	textComments: string;
};
