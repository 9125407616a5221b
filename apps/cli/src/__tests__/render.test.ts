// apps/cli/src/__tests__/render.test.ts
//
// Unit tests for the plain-text board, keyboard and stats rendering.

import type { SessionSnapshot } from '@eqle/game-core';
import { renderKeyboard, renderStats, renderSummary, tile } from '../render.js';

describe('tile', () => {
  it('draws each feedback state', () => {
    expect(tile('7', 'correct')).toBe('[7]');
    expect(tile('7', 'present')).toBe('(7)');
    expect(tile('7', 'absent')).toBe(' 7 ');
    expect(tile('7', 'unset')).toBe('_7_');
    expect(tile(' ', 'unset')).toBe('___');
  });
});

describe('renderKeyboard', () => {
  it('marks evaluated keys and leaves the rest plain', () => {
    expect(renderKeyboard({ '1': 'correct', '+': 'present', '0': 'absent' })).toBe(
      ' 0 [1]_2__3__4__5__6__7__8__9_(+)_-__*__/__=_',
    );
  });
});

describe('renderStats', () => {
  it('prints the summary line and a scaled distribution', () => {
    expect(
      renderStats({
        totalPlayed: 3,
        totalWon: 2,
        winDistribution: [0, 0, 2, 1, 0, 0],
        currentStreak: 1,
        bestStreak: 2,
        fewestTries: 3,
        winPercentage: 67,
      }),
    ).toEqual([
      'Played 3  Win % 67  Streak 1  Best 2  Fewest tries 3',
      '1 | 0',
      '2 | 0',
      '3 | #################### 2',
      '4 | ########## 1',
      '5 | 0',
      '6 | 0',
    ]);
  });
});

describe('renderSummary', () => {
  const base: SessionSnapshot = {
    guesses: [],
    cursor: { row: 6, column: 0 },
    status: 'lost',
    terminal: true,
    keyFeedback: {},
    day: '2024-06-12',
    triesUsed: 6,
    answer: '12+57=69',
    completedAt: null,
    nextPuzzleAt: new Date(2024, 5, 13),
  };

  it('reveals the answer after a loss', () => {
    const now = new Date(base.nextPuzzleAt.getTime() - 3_723_000);
    expect(renderSummary(base, now)).toEqual([
      'Out of guesses. The answer was 12+57=69.',
      'Next puzzle in 01:02:03',
    ]);
  });

  it('shows the number of tries after a win', () => {
    const now = new Date(base.nextPuzzleAt.getTime() - 60_000);
    expect(renderSummary({ ...base, status: 'won', triesUsed: 3 }, now)).toEqual([
      'Solved in 3/6!',
      'Next puzzle in 00:01:00',
    ]);
  });
});
