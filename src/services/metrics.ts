import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import type { ChannelContext, ErrorCounterKey } from '../types/channel';

const ERROR_REASONS: readonly ErrorCounterKey[] = [
	'fetch',
	'transcode-error',
	'transport-error',
	'transport-timeout',
	'unexpected',
];

/**
 * Prometheus registry whose values are read from the channel contexts at scrape time.
 * The counters themselves live on each context; nothing here is written by the pipeline.
 */
export function createMetricsRegistry(channels: readonly ChannelContext[], withDefaults = true): Registry {
	const registry = new Registry();
	if (withDefaults) collectDefaultMetrics({ register: registry });

	// Counters mirror the totals on each context, so every scrape resets and re-adds them
	const perChannelTotal = (name: string, help: string, read: (ctx: ChannelContext) => number): Counter<'channel'> =>
		new Counter({
			name,
			help,
			labelNames: ['channel'],
			registers: [registry],
			collect() {
				this.reset();
				for (const ctx of channels) {
					this.inc({ channel: ctx.config.name }, read(ctx));
				}
			},
		});

	perChannelTotal('relay_posts_processed_total', 'Posts handed to the dispatcher', (ctx) => ctx.stats.processed);
	perChannelTotal('relay_posts_sent_total', 'Posts delivered to the channel', (ctx) => ctx.stats.sent);
	perChannelTotal('relay_posts_filtered_total', 'Posts dropped by the blacklist', (ctx) => ctx.stats.filtered);
	perChannelTotal(
		'relay_posts_skipped_total',
		'Posts skipped because their media was unavailable',
		(ctx) => ctx.stats.skipped
	);

	new Counter({
		name: 'relay_errors_total',
		help: 'Errors by category',
		labelNames: ['channel', 'reason'],
		registers: [registry],
		collect() {
			this.reset();
			for (const ctx of channels) {
				for (const reason of ERROR_REASONS) {
					this.inc({ channel: ctx.config.name, reason }, ctx.stats.errors[reason]);
				}
			}
		},
	});

	new Gauge({
		name: 'relay_last_success_timestamp_seconds',
		help: 'Time of the last delivered post',
		labelNames: ['channel'],
		registers: [registry],
		collect() {
			for (const ctx of channels) {
				if (ctx.stats.lastSuccessAt !== null) {
					this.set({ channel: ctx.config.name }, ctx.stats.lastSuccessAt / 1000);
				}
			}
		},
	});

	return registry;
}
