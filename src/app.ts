import { Hono } from 'hono';
import type { Registry } from 'prom-client';
import type { ChannelContext } from './types/channel';
import { handleHealth } from './routes/health';
import { handleMetrics } from './routes/metrics';
import logger from './utils/logger';

/** Pull endpoint for operators: health summary and Prometheus metrics. */
export function createServerApp(registry: Registry, channels: readonly ChannelContext[]): Hono {
	const app = new Hono();

	app.get('/health', handleHealth(channels));
	app.get('/metrics', handleMetrics(registry));

	app.notFound((c) => c.json({ error: 'Not found', endpoints: ['/health', '/metrics'] }, 404));

	app.onError((err, c) => {
		logger.error('[HTTP] Unhandled error', { error: err.message });
		return c.json({ error: 'Internal Server Error' }, 500);
	});

	return app;
}
