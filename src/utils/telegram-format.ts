import type { Post } from '../types/post';
import { E621_BASE_URL, NO_CHARACTER, TAG_LINE_MAX_LENGTH, UNKNOWN_ARTIST } from '../constants';
import { escapeHtml, truncate } from './text';

export function postUrl(postId: number): string {
	return `${E621_BASE_URL}/posts/${postId}`;
}

/**
 * Render the HTML caption for a post.
 * Raw tag values are escaped exactly once, after truncation, so entities are never cut in half.
 */
export function buildCaption(post: Post): string {
	const artists = formatTagLine(post.tags['artist'], UNKNOWN_ARTIST);
	const characters = formatTagLine(post.tags['character'], NO_CHARACTER);

	return [
		`<b>Artist:</b> ${artists}`,
		`<b>Characters:</b> ${characters}`,
		`<b>Score:</b> ${post.score}`,
		`<b>Favorites:</b> ${post.favCount}`,
		`<a href="${postUrl(post.id)}">Original Post</a>`,
	].join('\n');
}

function formatTagLine(tags: readonly string[] | undefined, fallback: string): string {
	if (!tags || tags.length === 0) return escapeHtml(fallback);
	return escapeHtml(truncate(tags.join(', '), TAG_LINE_MAX_LENGTH));
}
