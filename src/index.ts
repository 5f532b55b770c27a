import { Bot } from 'grammy';
import { serve } from '@hono/node-server';
import { ConfigurationError, loadConfig } from './config';
import { createChannelContext } from './types/channel';
import { loadBlacklist } from './services/blacklist';
import { PostFetcher } from './services/post-fetcher';
import { MediaNormalizer } from './services/media-normalizer';
import { FfmpegTranscoder } from './services/transcoder';
import { Dispatcher, TelegramTransport } from './services/telegram-bot';
import { createMetricsRegistry } from './services/metrics';
import { runChannel } from './cron/run-channel';
import { Scheduler } from './cron/scheduler';
import { createServerApp } from './app';
import { buildUserAgent } from './utils/headers';
import logger, { errorMessage } from './utils/logger';

async function main(): Promise<void> {
	const config = loadConfig();
	const blacklist = await loadBlacklist(config.blacklistFile);

	const bot = new Bot(config.telegramBotToken, {
		client: { timeoutSeconds: Math.ceil(config.sendTimeoutMs / 1000) },
	});
	const transport = new TelegramTransport(bot.api, config.sendTimeoutMs);
	const normalizer = new MediaNormalizer(new FfmpegTranscoder(config.ffmpegPath), {
		userAgent: buildUserAgent(config.e621Username),
		tmpRoot: config.tmpDir,
	});
	const dispatcher = new Dispatcher(transport, normalizer);
	const fetcher = new PostFetcher({
		identity: { username: config.e621Username, apiKey: config.e621ApiKey },
	});

	const channels = config.channels.map(createChannelContext);
	const shutdown = new AbortController();

	const scheduler = new Scheduler(
		channels,
		(ctx) =>
			runChannel(ctx, {
				fetcher,
				dispatcher,
				blacklist,
				postLimit: config.postLimit,
				postDelayMs: config.postDelayMs,
				signal: shutdown.signal,
			}),
		{ pollIntervalMs: config.pollIntervalMs }
	);

	const server =
		config.metricsPort === undefined
			? null
			: serve({ fetch: createServerApp(createMetricsRegistry(channels), channels).fetch, port: config.metricsPort }, (info) => {
					logger.info(`Metrics server listening on port ${info.port}`);
				});

	const stop = async (signal: string): Promise<void> => {
		logger.info(`Received ${signal}, finishing in-flight posts before exit`);
		shutdown.abort();
		await scheduler.stop();
		server?.close();
		logger.info('Scheduler stopped.');
	};

	for (const signal of ['SIGINT', 'SIGTERM'] as const) {
		process.once(signal, () => {
			stop(signal).then(
				() => process.exit(0),
				(err: unknown) => {
					logger.error('Error during shutdown', { error: errorMessage(err) });
					process.exit(1);
				}
			);
		});
	}

	logger.info('Starting scheduler. Press Ctrl+C to exit.');
	scheduler.start();
}

main().catch((err: unknown) => {
	if (err instanceof ConfigurationError) {
		logger.error(`Configuration error: ${err.message}`);
	} else {
		logger.error('An unexpected error occurred', { error: errorMessage(err) });
	}
	process.exit(1);
});
