import type { ChannelContext } from '../types/channel';
import { DEFAULT_POLL_INTERVAL_MS, MAX_CATCHUP_MINUTES } from '../constants';
import { epochMinute, matchesTrigger } from '../utils/time';
import logger, { errorMessage } from '../utils/logger';

export interface SchedulerOptions {
	pollIntervalMs?: number;
	now?: () => number;
}

interface ChannelState {
	/** In-flight run; null while Idle */
	running: Promise<void> | null;
	/** Latest epoch minute this channel fired for */
	lastFiredMinute: number | null;
}

/**
 * Fires each channel's pipeline when the wall clock reaches its trigger time.
 *
 * Polling is coarse, so every tick evaluates all minutes since the previous tick (bounded by
 * MAX_CATCHUP_MINUTES) and a channel never fires twice for the same or an earlier minute.
 * A channel that is still running when its trigger comes round again is skipped.
 */
export class Scheduler {
	private readonly pollIntervalMs: number;
	private readonly now: () => number;
	private readonly states = new Map<string, ChannelState>();
	private timer: ReturnType<typeof setInterval> | null = null;
	private lastTickMinute: number | null = null;

	constructor(
		private readonly channels: readonly ChannelContext[],
		private readonly runPipeline: (ctx: ChannelContext) => Promise<unknown>,
		options: SchedulerOptions = {}
	) {
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.now = options.now ?? Date.now;
		for (const ctx of channels) {
			this.states.set(ctx.config.name, { running: null, lastFiredMinute: null });
		}
	}

	start(): void {
		if (this.timer !== null) return;
		logger.info('[Scheduler] Started', {
			pollIntervalMs: this.pollIntervalMs,
			channels: this.channels.map((ctx) => `${ctx.config.name}@${formatTrigger(ctx)}`),
		});
		this.tick();
		this.timer = setInterval(() => this.tick(), this.pollIntervalMs);
	}

	/** Evaluate triggers at `now`. Returns the names of the channels fired by this tick. */
	tick(now = this.now()): string[] {
		const current = epochMinute(now);
		const first =
			this.lastTickMinute === null
				? current
				: Math.max(Math.min(this.lastTickMinute + 1, current), current - MAX_CATCHUP_MINUTES + 1);
		this.lastTickMinute = current;

		const fired: string[] = [];
		for (let minute = first; minute <= current; minute++) {
			for (const ctx of this.channels) {
				if (this.maybeFire(ctx, minute)) fired.push(ctx.config.name);
			}
		}
		return fired;
	}

	isRunning(name: string): boolean {
		return this.states.get(name)?.running != null;
	}

	/** Stop polling and wait for in-flight runs to finish. */
	async stop(): Promise<void> {
		if (this.timer !== null) {
			clearInterval(this.timer);
			this.timer = null;
		}
		const inFlight = [...this.states.values()]
			.map((state) => state.running)
			.filter((run): run is Promise<void> => run !== null);
		await Promise.all(inFlight);
		logger.info('[Scheduler] Stopped');
	}

	private maybeFire(ctx: ChannelContext, minute: number): boolean {
		const state = this.states.get(ctx.config.name);
		if (!state || !matchesTrigger(ctx.config.trigger, minute)) return false;
		if (state.lastFiredMinute !== null && minute <= state.lastFiredMinute) return false;

		state.lastFiredMinute = minute;
		if (state.running) {
			logger.warn(`[Scheduler] ${ctx.config.name} is still running, skipping this trigger`);
			return false;
		}

		// Runs never reject: errors are logged here and the channel returns to Idle
		state.running = Promise.resolve()
			.then(() => this.runPipeline(ctx))
			.then(
				() => undefined,
				(err: unknown) => {
					logger.error(`[Scheduler] Run for ${ctx.config.name} failed`, { error: errorMessage(err) });
				}
			)
			.finally(() => {
				state.running = null;
			});
		return true;
	}
}

function formatTrigger(ctx: ChannelContext): string {
	const { hour, minute, utcOffsetMinutes } = ctx.config.trigger;
	const hh = String(hour).padStart(2, '0');
	const mm = String(minute).padStart(2, '0');
	const sign = utcOffsetMinutes < 0 ? '-' : '+';
	return `${hh}:${mm} UTC${sign}${Math.abs(utcOffsetMinutes)}m`;
}
