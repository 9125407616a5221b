// packages/game-core/src/dayKey.ts
//
// Calendar-day arithmetic in the local time zone. Every "same day" or
// "days since" decision in the engine goes through these helpers.

import type { DayKey } from '@eqle/protocol';

const MS_PER_DAY = 86_400_000;

const pad = (n: number) => String(n).padStart(2, '0');

/** Map an instant to its local calendar day, e.g. "2024-03-09". */
export function dayKey(date: Date): DayKey {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function dayNumber(key: DayKey): number {
  const [y, m, d] = key.split('-').map(Number);
  return Date.UTC(y, m - 1, d) / MS_PER_DAY;
}

/**
 * Whole calendar days from `from` to `to`. Computed on the day keys,
 * so DST transitions never produce 23- or 25-hour "days".
 */
export function daysBetween(from: DayKey, to: DayKey): number {
  return dayNumber(to) - dayNumber(from);
}

/** Local midnight that starts the day after `now`. */
export function nextMidnight(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
}

/** Milliseconds until the next puzzle unlocks. */
export function timeUntilNextPuzzle(now: Date): number {
  return nextMidnight(now).getTime() - now.getTime();
}

/** "HH:MM:SS" countdown, as shown under the end-of-game summary. */
export function formatCountdown(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}
