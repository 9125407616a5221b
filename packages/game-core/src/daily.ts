// packages/game-core/src/daily.ts
//
// Daily gating: one puzzle per local calendar day.
//
//   • The answer is cached with the day it was generated for; the same day
//     always gets the same puzzle, across restarts.
//   • A finished session records its completion instant; while that instant
//     falls on today, no new session may start.

import type { DayKey } from '@eqle/protocol';
import type { Logger } from 'pino';
import { dayKey } from './dayKey.js';
import { validateEquation } from './equation.js';
import { generateEquation, type GeneratorOptions } from './generator.js';
import { StorageKeys, type KeyValueStore } from './storage.js';

export type DailyAnswer = {
  answer: string;
  /** True when the answer was generated now rather than read from cache. */
  fresh: boolean;
};

export class DailyGate {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log: Logger,
    private readonly generatorFor: (today: DayKey) => GeneratorOptions,
  ) {}

  /** Day of the last completed session, or null if none is recorded. */
  completedOn(): DayKey | null {
    const raw = this.store.get(StorageKeys.lastGameCompletedDate);
    if (raw === undefined) return null;
    const at = new Date(raw);
    if (Number.isNaN(at.getTime())) {
      this.log.warn({ value: raw }, 'ignoring unreadable completion date');
      return null;
    }
    return dayKey(at);
  }

  canPlayToday(today: DayKey): boolean {
    return this.completedOn() !== today;
  }

  /**
   * Today's answer from cache, or a newly generated one. Generating for a
   * new day also clears yesterday's completion marker.
   */
  answerFor(today: DayKey): DailyAnswer {
    const k = StorageKeys;
    const cachedDay = this.store.get(k.lastEquationDate);
    const cached = this.store.get(k.dailyEquation);
    if (cachedDay === today && cached !== undefined) {
      if (validateEquation(cached).valid) return { answer: cached, fresh: false };
      this.log.warn({ today }, 'cached equation is invalid, generating a new one');
    }

    const generated = generateEquation(this.generatorFor(today));
    this.store.setMany({
      [k.dailyEquation]: generated.equation,
      [k.lastEquationDate]: today,
    });
    if (cachedDay !== today && this.completedOn() !== today) {
      this.store.remove(k.lastGameCompletedDate);
    }

    this.log.info(
      { today, source: generated.source, attempts: generated.attempts },
      'generated daily equation',
    );
    return { answer: generated.equation, fresh: true };
  }
}
