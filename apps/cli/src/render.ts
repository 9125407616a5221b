/**
 * render.ts
 *
 * Plain-text rendering of the board, keyboard and stats for the terminal.
 *
 * Tile legend:
 *   [7]  correct
 *   (7)  present
 *    7   absent
 *   _7_  typed, not yet submitted
 *   ___  empty
 */

import {
  EQUATION_CHARS,
  formatCountdown,
  type SessionSnapshot,
  type StatsSnapshot,
} from '@eqle/game-core';
import type { KeyFeedback, TileFeedback } from '@eqle/protocol';

export function tile(c: string, f: TileFeedback | undefined): string {
  switch (f) {
    case 'correct':
      return `[${c}]`;
    case 'present':
      return `(${c})`;
    case 'absent':
      return ` ${c} `;
    default:
      return c === ' ' ? '___' : `_${c}_`;
  }
}

export function renderBoard(state: SessionSnapshot): string[] {
  return state.guesses.map((g) =>
    [...g.equation].map((c, i) => tile(c, g.feedback[i])).join(''),
  );
}

/** Keyboard row; keys never evaluated are shown as typed-but-unknown. */
export function renderKeyboard(keys: KeyFeedback): string {
  return [...EQUATION_CHARS]
    .map((c) => (Object.hasOwn(keys, c) ? tile(c, keys[c]) : tile(c, 'unset')))
    .join('');
}

export function renderStats(stats: StatsSnapshot): string[] {
  const widest = Math.max(1, ...stats.winDistribution);
  return [
    `Played ${stats.totalPlayed}  Win % ${stats.winPercentage}  ` +
      `Streak ${stats.currentStreak}  Best ${stats.bestStreak}  ` +
      `Fewest tries ${stats.fewestTries}`,
    ...stats.winDistribution.map((n, i) => {
      const bar = '#'.repeat(Math.round((n / widest) * 20));
      return `${i + 1} | ${bar}${bar ? ' ' : ''}${n}`;
    }),
  ];
}

export function renderSummary(state: SessionSnapshot, now: Date): string[] {
  const lines: string[] = [];
  if (state.status === 'won') {
    lines.push(`Solved in ${state.triesUsed}/6!`);
  } else if (state.status === 'lost') {
    lines.push(`Out of guesses. The answer was ${state.answer ?? '?'}.`);
  }
  const ms = state.nextPuzzleAt.getTime() - now.getTime();
  lines.push(`Next puzzle in ${formatCountdown(ms)}`);
  return lines;
}
