import type { FailureReason } from './dispatch';

export interface TriggerTime {
	hour: number;
	minute: number;
	/** Offset of the channel's clock from UTC, e.g. 120 for UTC+2 */
	utcOffsetMinutes: number;
}

export interface ChannelConfig {
	/** Unique logical name, used as the metrics label */
	name: string;
	/** Topical filter appended to the fixed search tags */
	query: string;
	/** Telegram chat id or @channel username */
	destination: string;
	trigger: TriggerTime;
}

export type ErrorCounterKey = FailureReason | 'fetch';

export interface ChannelStats {
	processed: number;
	sent: number;
	filtered: number;
	skipped: number;
	errors: Record<ErrorCounterKey, number>;
	lastSuccessAt: number | null;
	lastRunAt: number | null;
}

/** Everything one channel's pipeline reads and mutates. Never shared between channels. */
export interface ChannelContext {
	readonly config: ChannelConfig;
	readonly stats: ChannelStats;
}

export function createChannelContext(config: ChannelConfig): ChannelContext {
	return {
		config,
		stats: {
			processed: 0,
			sent: 0,
			filtered: 0,
			skipped: 0,
			errors: {
				fetch: 0,
				'transcode-error': 0,
				'transport-error': 0,
				'transport-timeout': 0,
				unexpected: 0,
			},
			lastSuccessAt: null,
			lastRunAt: null,
		},
	};
}
