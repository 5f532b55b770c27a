import { z } from 'zod';

/** Raw post record as returned by `GET /posts.json`. Only the fields the relay reads are validated. */
export const ApiPostSchema = z.object({
	id: z.number().int(),
	tags: z.record(z.string(), z.array(z.string())),
	score: z.object({ total: z.number().int() }),
	fav_count: z.number().int(),
	file: z.object({
		// null when the post is hidden from anonymous or unprivileged users
		url: z.string().nullable(),
		ext: z.string(),
		size: z.number().int().nonnegative(),
	}),
});

export type ApiPost = z.infer<typeof ApiPostSchema>;

export const PostsResponseSchema = z.object({
	posts: z.array(z.unknown()),
});

export interface MediaRef {
	url: string | null;
	ext: string;
	/** Bytes, as declared by the API */
	size: number;
}

export interface Post {
	readonly id: number;
	/** Category (artist, character, general, ...) to tag list */
	readonly tags: Readonly<Record<string, readonly string[]>>;
	readonly score: number;
	readonly favCount: number;
	readonly media: Readonly<MediaRef>;
}
