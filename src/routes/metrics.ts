import type { Context } from 'hono';
import type { Registry } from 'prom-client';

export function handleMetrics(registry: Registry) {
	return async (c: Context) => {
		const body = await registry.metrics();
		return c.body(body, 200, { 'Content-Type': registry.contentType });
	};
}
