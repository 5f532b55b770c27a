import type { Context } from 'hono';
import type { ChannelContext } from '../types/channel';

export function handleHealth(channels: readonly ChannelContext[]) {
	return (c: Context) =>
		c.json({
			status: 'ok',
			timestamp: new Date().toISOString(),
			channels: channels.map((ctx) => ({
				name: ctx.config.name,
				lastRunAt: toIso(ctx.stats.lastRunAt),
				lastSuccessAt: toIso(ctx.stats.lastSuccessAt),
			})),
		});
}

function toIso(timestamp: number | null): string | null {
	return timestamp === null ? null : new Date(timestamp).toISOString();
}
