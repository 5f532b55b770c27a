import { readFileSync } from 'fs';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type { ChannelConfig } from '../types/channel';
import {
	DEFAULT_BLACKLIST_FILE,
	DEFAULT_CHANNEL_NAME,
	DEFAULT_CHANNEL_TIME,
	DEFAULT_POLL_INTERVAL_MS,
	DEFAULT_POST_DELAY_MS,
	DEFAULT_SEND_TIMEOUT_MS,
	E621_MAX_LIMIT,
	OFFSET_CHANNEL_NAME,
	OFFSET_CHANNEL_TIME,
} from '../constants';
import { parseTimeOfDay } from '../utils/time';

// Runs before anything reads process.env at import time (the logger among them)
loadEnv();

export const LOG_LEVEL = process.env.LOG_LEVEL?.trim() || 'info';
export const NODE_ENV = process.env.NODE_ENV;

export class ConfigurationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ConfigurationError';
	}
}

export interface AppConfig {
	telegramBotToken: string;
	e621Username: string;
	e621ApiKey?: string;
	channels: ChannelConfig[];
	blacklistFile: string;
	postLimit: number;
	postDelayMs: number;
	sendTimeoutMs: number;
	pollIntervalMs: number;
	metricsPort?: number;
	ffmpegPath: string;
	tmpDir?: string;
}

const ChannelFileSchema = z.array(
	z.object({
		name: z.string().min(1),
		destination: z.union([z.string().min(1), z.number().int()]).transform(String),
		query: z.string().default(''),
		time: z.string(),
		utcOffsetMinutes: z.number().int().min(-720).max(840).default(0),
	})
);

const REQUIRED_ENV_VARS = ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHANNEL_ID', 'E621_USERNAME'] as const;

/**
 * Build the runtime configuration from environment variables (and the optional channels file).
 * Throws ConfigurationError on anything missing or invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const missing = REQUIRED_ENV_VARS.filter((key) => !env[key]?.trim());
	if (missing.length > 0) {
		throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
	}

	const required = (key: (typeof REQUIRED_ENV_VARS)[number]): string => env[key]?.trim() ?? '';
	const query = env.CHANNEL_QUERY?.trim() ?? '';

	const channels: ChannelConfig[] = [
		envChannel(DEFAULT_CHANNEL_NAME, required('TELEGRAM_CHANNEL_ID'), query, DEFAULT_CHANNEL_TIME),
	];

	const offsetChannelId = env.TELEGRAM_OFFSET_CHANNEL_ID?.trim();
	if (offsetChannelId) {
		channels.push(envChannel(OFFSET_CHANNEL_NAME, offsetChannelId, query, OFFSET_CHANNEL_TIME));
	}

	const channelsFile = env.CHANNELS_FILE?.trim();
	if (channelsFile) {
		channels.push(...loadChannelsFile(channelsFile));
	}

	const names = new Set<string>();
	for (const channel of channels) {
		if (names.has(channel.name)) {
			throw new ConfigurationError(`Duplicate channel name: ${channel.name}`);
		}
		names.add(channel.name);
	}

	const metricsPort = env.METRICS_PORT?.trim() ? parseIntVar(env, 'METRICS_PORT', 0, 1, 65535) : undefined;

	return {
		telegramBotToken: required('TELEGRAM_BOT_TOKEN'),
		e621Username: required('E621_USERNAME'),
		e621ApiKey: env.E621_API_KEY?.trim() || undefined,
		channels,
		blacklistFile: env.BLACKLIST_FILE?.trim() || DEFAULT_BLACKLIST_FILE,
		postLimit: parseIntVar(env, 'POST_LIMIT', E621_MAX_LIMIT, 1, E621_MAX_LIMIT),
		postDelayMs: parseIntVar(env, 'POST_DELAY_MS', DEFAULT_POST_DELAY_MS, 0),
		sendTimeoutMs: parseIntVar(env, 'SEND_TIMEOUT_MS', DEFAULT_SEND_TIMEOUT_MS, 1000),
		pollIntervalMs: parseIntVar(env, 'POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS, 1000, 60_000),
		metricsPort,
		ffmpegPath: env.FFMPEG_PATH?.trim() || 'ffmpeg',
		tmpDir: env.TMP_DIR?.trim() || undefined,
	};
}

function envChannel(name: string, destination: string, query: string, time: string): ChannelConfig {
	const parsed = parseTimeOfDay(time);
	if (!parsed) throw new ConfigurationError(`Invalid trigger time for channel ${name}: ${time}`);
	return { name, destination, query, trigger: { ...parsed, utcOffsetMinutes: 0 } };
}

export function loadChannelsFile(path: string): ChannelConfig[] {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, 'utf8'));
	} catch (err) {
		throw new ConfigurationError(`Could not read channels file '${path}'`, { cause: err });
	}

	const result = ChannelFileSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
		throw new ConfigurationError(`Invalid channels file '${path}': ${issues}`);
	}

	return result.data.map((entry) => {
		const time = parseTimeOfDay(entry.time);
		if (!time) {
			throw new ConfigurationError(`Invalid time '${entry.time}' for channel ${entry.name}, expected HH:MM`);
		}
		return {
			name: entry.name,
			destination: entry.destination,
			query: entry.query.trim(),
			trigger: { ...time, utcOffsetMinutes: entry.utcOffsetMinutes },
		};
	});
}

function parseIntVar(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
	const raw = env[key]?.trim();
	if (!raw) return fallback;
	const value = Number(raw);
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new ConfigurationError(`${key} must be an integer between ${min} and ${max}, got '${raw}'`);
	}
	return value;
}
