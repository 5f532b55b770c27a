import { readFile } from 'fs/promises';
import type { Post } from '../types/post';
import logger, { errorMessage } from '../utils/logger';

/**
 * Load the tag blacklist from a JSON array of strings.
 * Never throws: a missing or unreadable file leaves the relay running with an empty blacklist.
 */
export async function loadBlacklist(path: string): Promise<ReadonlySet<string>> {
	let raw: string;
	try {
		raw = await readFile(path, 'utf8');
	} catch (err) {
		if (errorCode(err) === 'ENOENT') {
			logger.warn(`Blacklist file '${path}' not found, using an empty blacklist`);
		} else {
			logger.error(`Could not read blacklist file '${path}', using an empty blacklist`, { error: errorMessage(err) });
		}
		return new Set();
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err) {
		logger.error(`Error decoding '${path}', using an empty blacklist`, { error: errorMessage(err) });
		return new Set();
	}

	if (!Array.isArray(parsed)) {
		logger.error(`Blacklist '${path}' must be a JSON array of tags, using an empty blacklist`);
		return new Set();
	}

	const tags = parsed.filter((tag): tag is string => typeof tag === 'string');
	if (tags.length !== parsed.length) {
		logger.warn(`Ignored ${parsed.length - tags.length} non-string blacklist entries`);
	}
	logger.info(`Loaded ${tags.length} blacklisted tags`);
	return new Set(tags);
}

/** True when any tag of any category on the post is blacklisted. */
export function isBlacklisted(post: Post, blacklist: ReadonlySet<string>): boolean {
	if (blacklist.size === 0) return false;
	for (const tags of Object.values(post.tags)) {
		for (const tag of tags) {
			if (blacklist.has(tag)) return true;
		}
	}
	return false;
}

function errorCode(err: unknown): string | undefined {
	return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}
