// packages/game-core/src/stats.ts
//
// Lifetime statistics and win streaks.
//
// Stats change only when a session ends, and at most once per calendar day:
// `LastStatsUpdate` records the day that was last counted, and a second
// terminal signal on the same day is ignored.

import {
  MAX_GUESSES,
  counterSchema,
  dayKeySchema,
  winDistributionSchema,
  type DayKey,
} from '@eqle/protocol';
import type { Logger } from 'pino';
import { daysBetween } from './dayKey.js';
import { StorageKeys, readValue, type KeyValueStore } from './storage.js';

export type Stats = {
  totalPlayed: number;
  totalWon: number;
  winDistribution: number[];
  currentStreak: number;
  bestStreak: number;
  /** Lowest tries-to-win so far; MAX_GUESSES until something better. */
  fewestTries: number;
};

export type StatsSnapshot = Stats & { winPercentage: number };

export type StreakState = {
  stats: Stats;
  lastWinDate: DayKey | null;
};

export type TerminalResult = {
  won: boolean;
  triesUsed: number;
  today: DayKey;
};

export const emptyStats = (): Stats => ({
  totalPlayed: 0,
  totalWon: 0,
  winDistribution: Array<number>(MAX_GUESSES).fill(0),
  currentStreak: 0,
  bestStreak: 0,
  fewestTries: MAX_GUESSES,
});

export function winPercentage(stats: Stats): number {
  if (stats.totalPlayed === 0) return 0;
  return Math.round((stats.totalWon / stats.totalPlayed) * 100);
}

/**
 * applyTerminal computes the next streak state for a finished session.
 * Pure: the caller decides whether today was already counted.
 */
export function applyTerminal(
  prev: StreakState,
  { won, triesUsed, today }: TerminalResult,
): StreakState {
  const s = prev.stats;
  const next: Stats = { ...s, winDistribution: [...s.winDistribution] };

  next.totalPlayed += 1;
  if (won) {
    if (s.totalWon === 0 || triesUsed < s.fewestTries) {
      next.fewestTries = triesUsed;
    }
    next.totalWon += 1;
    if (triesUsed >= 1 && triesUsed <= MAX_GUESSES) {
      next.winDistribution[triesUsed - 1] += 1;
    }
  }

  if (prev.lastWinDate === null) {
    next.currentStreak = won ? 1 : 0;
  } else {
    const days = daysBetween(prev.lastWinDate, today);
    if (days === 1) {
      next.currentStreak = won ? s.currentStreak + 1 : 0;
    } else if (days !== 0) {
      next.currentStreak = won ? 1 : 0;
    }
  }
  next.bestStreak = Math.max(s.bestStreak, next.currentStreak);

  return { stats: next, lastWinDate: won ? today : prev.lastWinDate };
}

/**
 * StreakTracker reads and writes the stats fields of the key/value store.
 */
export class StreakTracker {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log: Logger,
  ) {}

  /** Reload every stats field; missing or corrupt ones use defaults. */
  load(): StreakState {
    const d = emptyStats();
    const k = StorageKeys;
    const counter = (key: string, fallback: number) =>
      readValue(this.store, key, counterSchema, this.log) ?? fallback;
    const stats: Stats = {
      totalPlayed: counter(k.totalGamesPlayed, d.totalPlayed),
      totalWon: counter(k.totalGamesWon, d.totalWon),
      winDistribution:
        readValue(this.store, k.winDistribution, winDistributionSchema, this.log, true) ??
        d.winDistribution,
      currentStreak: counter(k.currentStreak, d.currentStreak),
      bestStreak: counter(k.bestStreak, d.bestStreak),
      fewestTries: counter(k.fewestTries, d.fewestTries),
    };
    // 0 means "never recorded"
    if (stats.fewestTries < 1 || stats.fewestTries > MAX_GUESSES) {
      stats.fewestTries = MAX_GUESSES;
    }
    const lastWinDate =
      readValue(this.store, k.lastWinDate, dayKeySchema, this.log) ?? null;
    return { stats, lastWinDate };
  }

  snapshot(): StatsSnapshot {
    const { stats } = this.load();
    return { ...stats, winPercentage: winPercentage(stats) };
  }

  /**
   * Count a finished session. Returns false, and writes nothing, when
   * today's session has already been counted.
   */
  onSessionTerminal(result: TerminalResult): boolean {
    const counted = this.store.get(StorageKeys.lastStatsUpdate);
    if (counted === result.today) {
      this.log.debug({ today: result.today }, 'stats already updated today, skipping');
      return false;
    }

    const next = applyTerminal(this.load(), result);
    const s = next.stats;
    const k = StorageKeys;
    const entries: Record<string, string> = {
      [k.lastStatsUpdate]: result.today,
      [k.totalGamesPlayed]: String(s.totalPlayed),
      [k.totalGamesWon]: String(s.totalWon),
      [k.winDistribution]: JSON.stringify(s.winDistribution),
      [k.currentStreak]: String(s.currentStreak),
      [k.bestStreak]: String(s.bestStreak),
      [k.fewestTries]: String(s.fewestTries),
    };
    if (next.lastWinDate !== null) entries[k.lastWinDate] = next.lastWinDate;
    this.store.setMany(entries);

    this.log.info(
      {
        won: result.won,
        triesUsed: result.triesUsed,
        totalPlayed: s.totalPlayed,
        totalWon: s.totalWon,
        currentStreak: s.currentStreak,
      },
      'stats updated',
    );
    return true;
  }
}
