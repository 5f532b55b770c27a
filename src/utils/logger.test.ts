import { afterEach, describe, expect, it, vi } from 'vitest';

describe('logger', () => {
	const previousLevel = process.env.LOG_LEVEL;

	afterEach(() => {
		if (previousLevel === undefined) delete process.env.LOG_LEVEL;
		else process.env.LOG_LEVEL = previousLevel;
		vi.doUnmock('dotenv');
		vi.resetModules();
	});

	it('takes its level from the .env file', async () => {
		delete process.env.LOG_LEVEL;
		vi.resetModules();
		vi.doMock('dotenv', () => ({
			config: () => {
				process.env.LOG_LEVEL = 'debug';
				return { parsed: { LOG_LEVEL: 'debug' } };
			},
		}));

		const { default: logger } = await import('./logger');

		expect(logger.level).toBe('debug');
	});

	it('defaults to info', async () => {
		delete process.env.LOG_LEVEL;
		vi.resetModules();
		vi.doMock('dotenv', () => ({ config: () => ({ parsed: {} }) }));

		const { default: logger } = await import('./logger');

		expect(logger.level).toBe('info');
	});
});
