// packages/game-core/src/engine.ts
//
// EquationEngine: the facade a presentation layer talks to.
//
// Responsibilities:
//   • Open today's puzzle: cached or generated answer, resumed or fresh session.
//   • Route player commands to the session state machine.
//   • Persist the session explicitly after every accepted command.
//   • Mark completion and hand the result to the StreakTracker once a
//     session becomes terminal.
//
// The day boundary is re-checked on every command, so a process left
// running past midnight rolls over to the new puzzle on the next input.

import {
  counterSchema,
  dayKeySchema,
  keyColorsSchema,
  savedGuessesSchema,
  type CommandOutcome,
  type DayKey,
  type Rejection,
  type StartOutcome,
  type SubmitOutcome,
} from '@eqle/protocol';
import { pino, type Logger } from 'pino';
import { DailyGate } from './daily.js';
import { dayKey, nextMidnight } from './dayKey.js';
import type { GeneratorOptions } from './generator.js';
import { seededRandom, type RandomSource } from './random.js';
import { Session, reject, rowsMatchCursor, type SessionView } from './session.js';
import { StreakTracker, type StatsSnapshot } from './stats.js';
import { StorageKeys, readValue, type KeyValueStore } from './storage.js';

export type EngineOptions = {
  store: KeyValueStore;
  /** Wall clock; injectable for tests. */
  clock?: () => Date;
  /** Random source for puzzle generation. Ignored when `seed` is set. */
  random?: RandomSource;
  /** Derive each day's puzzle from `${seed}:${day}`. */
  seed?: string;
  maxAttempts?: number;
  logger?: Logger;
};

export type SessionSnapshot = SessionView & {
  day: DayKey;
  triesUsed: number;
  /** Revealed only once the session is over. */
  answer: string | null;
  completedAt: Date | null;
  nextPuzzleAt: Date;
};

export class EquationEngine {
  private readonly store: KeyValueStore;
  private readonly clock: () => Date;
  private readonly log: Logger;
  private readonly gate: DailyGate;
  private readonly streaks: StreakTracker;

  private today: DayKey;
  private session: Session;
  private resumed: boolean;

  constructor(options: EngineOptions) {
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? pino({ level: 'silent' });
    const { seed, random, maxAttempts } = options;
    this.gate = new DailyGate(
      this.store,
      this.log,
      (today): GeneratorOptions => ({
        random: seed !== undefined ? seededRandom(`${seed}:${today}`) : random,
        maxAttempts,
      }),
    );
    this.streaks = new StreakTracker(this.store, this.log);

    this.today = dayKey(this.clock());
    const opened = this.openDay(this.today);
    this.session = opened.session;
    this.resumed = opened.resumed;
  }

  /* ------------------------------------------------------------------------ */
  /*                                 Commands                                 */
  /* ------------------------------------------------------------------------ */

  /**
   * Begin (or resume) today's session. Refused when today's puzzle has
   * already been completed; the finished board stays readable through
   * currentState().
   */
  startSession(): StartOutcome {
    this.rollover();
    if (!this.canPlayToday()) {
      const { message } = reject('alreadyPlayedToday');
      return { ok: false, reason: 'alreadyPlayedToday', message };
    }
    return { ok: true, resumed: this.resumed };
  }

  canPlayToday(): boolean {
    return this.gate.canPlayToday(dayKey(this.clock()));
  }

  insertCharacter(c: string): CommandOutcome {
    this.rollover();
    const outcome = this.blocked() ?? this.session.insertCharacter(c);
    if (outcome.accepted) this.persist();
    return outcome;
  }

  deleteCharacter(): CommandOutcome {
    this.rollover();
    const outcome = this.blocked() ?? this.session.deleteCharacter();
    if (outcome.accepted) this.persist();
    return outcome;
  }

  submitGuess(): SubmitOutcome {
    this.rollover();
    const outcome = this.blocked() ?? this.session.submitGuess();
    if (!outcome.accepted) {
      this.log.debug({ reason: outcome.reason }, 'guess rejected');
      return outcome;
    }
    this.persist();
    this.settle();
    return outcome;
  }

  /* ------------------------------------------------------------------------ */
  /*                                  Queries                                 */
  /* ------------------------------------------------------------------------ */

  currentState(): SessionSnapshot {
    const view = this.session.view();
    return {
      ...view,
      day: this.today,
      triesUsed: this.session.triesUsed,
      answer: view.terminal ? this.session.answer : null,
      completedAt: this.completedAt(),
      nextPuzzleAt: this.nextPuzzleAt(),
    };
  }

  stats(): StatsSnapshot {
    return this.streaks.snapshot();
  }

  nextPuzzleAt(): Date {
    return nextMidnight(this.clock());
  }

  /* ------------------------------------------------------------------------ */
  /*                                 Internals                                */
  /* ------------------------------------------------------------------------ */

  /**
   * Today's puzzle was completed but the saved board could not be restored:
   * refuse input rather than let a second session count.
   */
  private blocked(): Rejection | null {
    if (this.session.terminal || this.canPlayToday()) return null;
    return reject('alreadyPlayedToday');
  }

  private rollover() {
    const today = dayKey(this.clock());
    if (today === this.today) return;
    this.log.info({ from: this.today, to: today }, 'new day, starting a fresh puzzle');
    this.today = today;
    const opened = this.openDay(today);
    this.session = opened.session;
    this.resumed = opened.resumed;
  }

  private openDay(today: DayKey): { session: Session; resumed: boolean } {
    const { answer, fresh } = this.gate.answerFor(today);
    if (!fresh) {
      const restored = this.restore(answer, today);
      if (restored) {
        this.session = restored;
        this.log.debug({ today, row: restored.triesUsed }, 'resumed saved session');
        this.settle();
        return { session: restored, resumed: true };
      }
    }
    const session = Session.fresh(answer);
    this.session = session;
    this.persist();
    return { session, resumed: false };
  }

  /** Saved progress for today, or null when absent, stale or corrupt. */
  private restore(answer: string, today: DayKey): Session | null {
    const k = StorageKeys;
    const playedOn = readValue(this.store, k.lastPlayedDate, dayKeySchema, this.log);
    if (playedOn !== today) return null;

    const guesses = readValue(this.store, k.savedGuesses, savedGuessesSchema, this.log, true);
    const row = readValue(this.store, k.currentGuessIndex, counterSchema, this.log);
    const column = readValue(this.store, k.currentCharIndex, counterSchema, this.log);
    const keys =
      readValue(this.store, k.keyColors, keyColorsSchema, this.log, true) ?? {};
    if (guesses === undefined || row === undefined || column === undefined) {
      this.log.warn({ today }, 'saved session incomplete, starting fresh');
      return null;
    }
    if (!rowsMatchCursor(guesses, row, column)) {
      this.log.warn({ today, row, column }, 'saved rows do not match the cursor, starting fresh');
      return null;
    }
    return new Session({ answer, guesses, row, column, keys });
  }

  private completedAt(): Date | null {
    if (this.gate.completedOn() !== this.today) return null;
    const raw = this.store.get(StorageKeys.lastGameCompletedDate);
    return raw === undefined ? null : new Date(raw);
  }

  /**
   * Write the whole session in one batch. A terminal session also records
   * its completion instant, once.
   */
  private persist() {
    const k = StorageKeys;
    const data = this.session.toData();
    const entries: Record<string, string> = {
      [k.savedGuesses]: JSON.stringify(data.guesses),
      [k.currentGuessIndex]: String(data.row),
      [k.currentCharIndex]: String(data.column),
      [k.keyColors]: JSON.stringify(data.keys),
      [k.lastPlayedDate]: this.today,
    };
    if (this.session.terminal && this.gate.completedOn() !== this.today) {
      entries[k.lastGameCompletedDate] = this.clock().toISOString();
    }
    this.store.setMany(entries);
  }

  /**
   * Finish bookkeeping for a terminal session. Safe to call repeatedly:
   * the completion marker is written once and the tracker ignores a second
   * update on the same day.
   */
  private settle() {
    if (!this.session.terminal) return;
    if (this.gate.completedOn() !== this.today) this.persist();
    this.streaks.onSessionTerminal({
      won: this.session.status === 'won',
      triesUsed: this.session.triesUsed,
      today: this.today,
    });
  }
}
