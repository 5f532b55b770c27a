import type { ChannelContext, ChannelStats } from '../types/channel';
import type { DispatchOutcome } from '../types/dispatch';
import type { Post } from '../types/post';
import type { PostFetcher } from '../services/post-fetcher';
import type { Dispatcher } from '../services/telegram-bot/dispatcher';
import { isBlacklisted } from '../services/blacklist';
import logger, { errorMessage } from '../utils/logger';

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export interface PipelineDeps {
	fetcher: Pick<PostFetcher, 'fetch'>;
	dispatcher: Pick<Dispatcher, 'dispatch'>;
	blacklist: ReadonlySet<string>;
	postLimit: number;
	/** Pause between deliveries, to stay under Telegram's rate limits */
	postDelayMs: number;
	/** Aborted on shutdown; the loop stops before the next post */
	signal?: AbortSignal;
	sleep?: (ms: number) => Promise<void>;
	now?: () => number;
}

export type RunStatus = 'completed' | 'fetch-failed' | 'interrupted';

export interface RunSummary {
	channel: string;
	status: RunStatus;
	fetched: number;
	filtered: number;
	delivered: number;
	failed: number;
	skipped: number;
}

/**
 * One scheduled run for one channel: fetch, drop blacklisted posts, deliver the rest one at a
 * time. Per-post failures are counted and never stop the run; a fetch failure ends it early.
 */
export async function runChannel(ctx: ChannelContext, deps: PipelineDeps): Promise<RunSummary> {
	const { config, stats } = ctx;
	const now = deps.now ?? Date.now;
	const wait = deps.sleep ?? sleep;

	const summary: RunSummary = {
		channel: config.name,
		status: 'completed',
		fetched: 0,
		filtered: 0,
		delivered: 0,
		failed: 0,
		skipped: 0,
	};

	stats.lastRunAt = now();
	logger.info(`[Cron] Running channel ${config.name}`, { destination: config.destination, query: config.query });

	const result = await deps.fetcher.fetch(config.query, deps.postLimit);
	if (!result.ok) {
		stats.errors.fetch++;
		logger.warn(`[Cron] No data retrieved for ${config.name}, retrying at the next trigger`);
		return { ...summary, status: 'fetch-failed' };
	}

	summary.fetched = result.posts.length;
	if (result.posts.length === 0) {
		logger.info(`[Cron] No new posts for ${config.name}, nothing to send`);
		return summary;
	}

	const queue: Post[] = [];
	for (const post of result.posts) {
		if (isBlacklisted(post, deps.blacklist)) {
			recordOutcome(stats, { status: 'skipped', reason: 'blacklisted' }, now());
			summary.filtered++;
		} else {
			queue.push(post);
		}
	}

	logger.info(
		`[Cron] Found ${queue.length} posts after blacklisting (out of ${result.posts.length} total) for ${config.name}`
	);

	for (let i = 0; i < queue.length; i++) {
		if (i > 0) await wait(deps.postDelayMs);
		// Shutdown can arrive during the delay
		if (deps.signal?.aborted) {
			logger.warn(`[Cron] Shutdown requested, stopping ${config.name} with ${queue.length - i} posts unsent`);
			summary.status = 'interrupted';
			break;
		}

		const post = queue[i];
		let outcome: DispatchOutcome;
		try {
			outcome = await deps.dispatcher.dispatch(post, config.destination);
		} catch (err) {
			logger.error(`[Cron] Dispatcher threw for post ${post.id}`, { error: errorMessage(err) });
			outcome = { status: 'failed', reason: 'unexpected', message: errorMessage(err) };
		}

		recordOutcome(stats, outcome, now());
		if (outcome.status === 'delivered') summary.delivered++;
		else if (outcome.status === 'failed') summary.failed++;
		else summary.skipped++;
	}

	logger.info(`[Cron] Finished ${config.name}`, { ...summary });
	return summary;
}

export function recordOutcome(stats: ChannelStats, outcome: DispatchOutcome, at: number): void {
	switch (outcome.status) {
		case 'delivered':
			stats.processed++;
			stats.sent++;
			stats.lastSuccessAt = at;
			break;
		case 'skipped':
			if (outcome.reason === 'blacklisted') {
				stats.filtered++;
			} else {
				stats.processed++;
				stats.skipped++;
			}
			break;
		case 'failed':
			stats.processed++;
			stats.errors[outcome.reason]++;
			break;
	}
}
