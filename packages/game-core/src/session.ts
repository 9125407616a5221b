// packages/game-core/src/session.ts
//
// The guess-by-guess state machine for one day's puzzle.
//
//   inProgress ──submit(all correct)──▶ won
//       │
//       └──submit(6th guess, not solved)──▶ lost
//
// Commands never throw; a rejected command returns its reason and leaves
// the session untouched.

import {
  EQUATION_LENGTH,
  MAX_GUESSES,
  type CommandOutcome,
  type EvaluatedFeedback,
  type Guess,
  type KeyFeedback,
  type Rejection,
  type RejectionReason,
  type SessionStatus,
  type SubmitOutcome,
  type TileFeedback,
} from '@eqle/protocol';
import { EQUATION_CHARS, MESSAGES, validateEquation } from './equation.js';
import { isSolved, mergeKeyFeedback, scoreEquation } from './scoring.js';

const REJECTION_MESSAGES: Record<
  Exclude<RejectionReason, keyof typeof MESSAGES>,
  string
> = {
  sessionTerminal: "Today's puzzle is finished.",
  alreadyPlayedToday: "You've already played today. Come back tomorrow!",
  unsupportedCharacter: 'Only digits, + - * / and = can be typed.',
  rowFull: 'The row is full. Submit or delete a character.',
  rowEmpty: 'Nothing to delete.',
};

export function reject(reason: keyof typeof REJECTION_MESSAGES): Rejection {
  return { accepted: false, reason, message: REJECTION_MESSAGES[reason] };
}

export const emptyGuess = (): Guess => ({
  equation: ' '.repeat(EQUATION_LENGTH),
  feedback: Array<TileFeedback>(EQUATION_LENGTH).fill('unset'),
});

export type SessionData = {
  answer: string;
  guesses: Guess[];
  row: number;
  column: number;
  keys: KeyFeedback;
};

/**
 * Whether saved rows agree with the cursor: rows above it are typed and
 * scored, the current row holds exactly `column` typed characters, rows
 * below are blank, and no row before the last scored one is solved.
 */
export function rowsMatchCursor(guesses: Guess[], row: number, column: number): boolean {
  if (guesses.length !== MAX_GUESSES || row > MAX_GUESSES) return false;
  if (column > EQUATION_LENGTH || (row === MAX_GUESSES && column > 0)) return false;
  const blank = ' '.repeat(EQUATION_LENGTH);
  return guesses.every((g, i) => {
    const unscored = g.feedback.every((f) => f === 'unset');
    if (i < row) {
      if (g.equation.includes(' ') || g.feedback.includes('unset')) return false;
      return i === row - 1 || !isSolved(g.feedback);
    }
    if (i > row) return unscored && g.equation === blank;
    const typed = g.equation.slice(0, column);
    return unscored && !typed.includes(' ') && g.equation === typed + blank.slice(column);
  });
}

export type SessionView = {
  guesses: Guess[];
  cursor: { row: number; column: number };
  status: SessionStatus;
  terminal: boolean;
  keyFeedback: KeyFeedback;
};

export class Session {
  private guesses: Guess[];
  private row: number;
  private column: number;
  private keys: KeyFeedback;
  readonly answer: string;

  constructor(data: SessionData) {
    this.answer = data.answer;
    this.guesses = data.guesses.map((g) => ({ ...g, feedback: [...g.feedback] }));
    this.row = data.row;
    this.column = data.column;
    this.keys = { ...data.keys };
  }

  static fresh(answer: string): Session {
    return new Session({
      answer,
      guesses: Array.from({ length: MAX_GUESSES }, emptyGuess),
      row: 0,
      column: 0,
      keys: {},
    });
  }

  get status(): SessionStatus {
    if (this.row > 0 && isSolved(this.guesses[this.row - 1].feedback))
      return 'won';
    if (this.row >= MAX_GUESSES) return 'lost';
    return 'inProgress';
  }

  get terminal(): boolean {
    return this.status !== 'inProgress';
  }

  /** Number of finalized guesses. */
  get triesUsed(): number {
    return this.row;
  }

  insertCharacter(c: string): CommandOutcome {
    if (this.terminal) return reject('sessionTerminal');
    if (c.length !== 1 || !EQUATION_CHARS.includes(c))
      return reject('unsupportedCharacter');
    if (this.column >= EQUATION_LENGTH) return reject('rowFull');

    this.writeAt(this.column, c);
    this.column += 1;
    return { accepted: true };
  }

  deleteCharacter(): CommandOutcome {
    if (this.terminal) return reject('sessionTerminal');
    if (this.column <= 0) return reject('rowEmpty');

    this.column -= 1;
    this.writeAt(this.column, ' ');
    return { accepted: true };
  }

  submitGuess(): SubmitOutcome {
    if (this.terminal) return reject('sessionTerminal');
    if (this.column !== EQUATION_LENGTH) {
      return {
        accepted: false,
        reason: 'incompleteInput',
        message: MESSAGES.incompleteInput,
      };
    }

    const current = this.guesses[this.row];
    const check = validateEquation(current.equation);
    if (!check.valid) {
      return { accepted: false, reason: check.reason, message: check.message };
    }

    const feedback = scoreEquation(this.answer, current.equation);
    this.guesses[this.row] = { equation: current.equation, feedback };
    this.keys = mergeKeyFeedback(this.keys, current.equation, feedback);
    this.row += 1;
    this.column = 0;

    return {
      accepted: true,
      feedback: feedback.filter((f): f is EvaluatedFeedback => f !== 'unset'),
      round: this.row,
      status: this.status,
    };
  }

  view(): SessionView {
    return {
      guesses: this.guesses.map((g) => ({ ...g, feedback: [...g.feedback] })),
      cursor: { row: this.row, column: this.column },
      status: this.status,
      terminal: this.terminal,
      keyFeedback: { ...this.keys },
    };
  }

  /** Everything needed to rebuild this session later. */
  toData(): SessionData {
    const v = this.view();
    return {
      answer: this.answer,
      guesses: v.guesses,
      row: v.cursor.row,
      column: v.cursor.column,
      keys: v.keyFeedback,
    };
  }

  private writeAt(index: number, c: string) {
    const g = this.guesses[this.row];
    g.equation = g.equation.slice(0, index) + c + g.equation.slice(index + 1);
  }
}
