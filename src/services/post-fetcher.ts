import type { ApiPost, Post } from '../types/post';
import { ApiPostSchema, PostsResponseSchema } from '../types/post';
import {
	BASE_SEARCH_TAGS,
	E621_MAX_LIMIT,
	E621_POSTS_ENDPOINT,
	FETCH_TIMEOUT_MS,
	LOOKBACK_HOURS,
} from '../constants';
import { buildHeaders, type ApiIdentity } from '../utils/headers';
import { formatUtcDate } from '../utils/time';
import logger, { errorMessage } from '../utils/logger';

export class FetchError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'FetchError';
	}
}

export type PostFetchResult = { ok: true; posts: Post[] } | { ok: false; error: FetchError };

export interface PostFetcherOptions {
	identity: ApiIdentity;
	endpoint?: string;
	timeoutMs?: number;
	now?: () => number;
}

/**
 * Tag expression for one run: the fixed filter, the rolling lower date bound, then the
 * channel's own query. The bound is the UTC calendar date of now minus 24h, inclusive.
 */
export function buildSearchTags(query: string, now: number): string {
	const since = formatUtcDate(now - LOOKBACK_HOURS * 60 * 60 * 1000);
	return [...BASE_SEARCH_TAGS, `date:>=${since}`, query.trim()].filter(Boolean).join(' ');
}

export function clampLimit(limit: number): number {
	if (!Number.isFinite(limit)) return E621_MAX_LIMIT;
	return Math.min(Math.max(Math.floor(limit), 1), E621_MAX_LIMIT);
}

export function toPost(raw: ApiPost): Post {
	return {
		id: raw.id,
		tags: raw.tags,
		score: raw.score.total,
		favCount: raw.fav_count,
		media: { url: raw.file.url, ext: raw.file.ext, size: raw.file.size },
	};
}

export class PostFetcher {
	private readonly endpoint: string;
	private readonly timeoutMs: number;
	private readonly now: () => number;

	constructor(private readonly options: PostFetcherOptions) {
		this.endpoint = options.endpoint ?? E621_POSTS_ENDPOINT;
		this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Fetch posts for a topical query. Transport and format problems come back as a FetchError
	 * value; the caller treats them as "no posts this run".
	 */
	async fetch(query: string, limit: number): Promise<PostFetchResult> {
		const params = new URLSearchParams({
			tags: buildSearchTags(query, this.now()),
			limit: String(clampLimit(limit)),
		});
		const url = `${this.endpoint}?${params.toString()}`;

		let body: unknown;
		try {
			const response = await fetch(url, {
				headers: buildHeaders(this.options.identity),
				signal: AbortSignal.timeout(this.timeoutMs),
			});

			if (!response.ok) {
				return this.fail(new FetchError(`HTTP ${response.status}`, response.status));
			}

			body = await response.json();
		} catch (err) {
			const message = isTimeout(err) ? 'Timeout' : errorMessage(err);
			return this.fail(new FetchError(message, undefined, { cause: err }));
		}

		const parsed = PostsResponseSchema.safeParse(body);
		if (!parsed.success) {
			return this.fail(new FetchError('Response is not a posts listing'));
		}

		const posts: Post[] = [];
		let dropped = 0;
		for (const raw of parsed.data.posts) {
			const result = ApiPostSchema.safeParse(raw);
			if (result.success) {
				posts.push(toPost(result.data));
			} else {
				dropped++;
			}
		}
		if (dropped > 0) {
			logger.warn(`[Fetch] Dropped ${dropped} malformed post records`);
		}

		return { ok: true, posts };
	}

	private fail(error: FetchError): PostFetchResult {
		logger.error(`[Fetch] Failed to fetch posts: ${error.message}`, { status: error.status });
		return { ok: false, error };
	}
}

function isTimeout(err: unknown): boolean {
	return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}
