import type { TriggerTime } from '../types/channel';

const MS_PER_MINUTE = 60_000;
const MINUTES_PER_DAY = 24 * 60;

/** Whole minutes since the epoch. Identifies a calendar minute independently of timezone. */
export function epochMinute(timestampMs: number): number {
	return Math.floor(timestampMs / MS_PER_MINUTE);
}

/** True when `minute` (epoch minutes) is the trigger's hour:minute on the trigger's clock. */
export function matchesTrigger(trigger: TriggerTime, minute: number): boolean {
	const local = minute + trigger.utcOffsetMinutes;
	const minuteOfDay = ((local % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
	return minuteOfDay === trigger.hour * 60 + trigger.minute;
}

/**
 * Parse "HH:MM" (24h). Returns null for anything else.
 */
export function parseTimeOfDay(value: string): { hour: number; minute: number } | null {
	const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
	if (!match) return null;
	const hour = Number(match[1]);
	const minute = Number(match[2]);
	if (hour > 23 || minute > 59) return null;
	return { hour, minute };
}

/** YYYY-MM-DD of the given instant in UTC. */
export function formatUtcDate(timestampMs: number): string {
	return new Date(timestampMs).toISOString().slice(0, 10);
}
