// apps/cli/src/__tests__/commands.test.ts
//
// Tests for handleLine(): terminal input routed through a real engine
// backed by an in-memory store.

import { EquationEngine, MemoryStore, StorageKeys } from '@eqle/game-core';
import { HELP, handleLine } from '../commands.js';

const NOW = new Date(2024, 5, 12, 10, 0, 0); // 2024-06-12, local
const EMPTY_ROW = '___'.repeat(8);

function engineFor(answer: string) {
  const store = new MemoryStore({
    [StorageKeys.dailyEquation]: answer,
    [StorageKeys.lastEquationDate]: '2024-06-12',
  });
  return new EquationEngine({ store, clock: () => NOW });
}

describe('handleLine', () => {
  it('types a partial row and shows the board', () => {
    const engine = engineFor('12+57=69');
    const { output, quit } = handleLine(engine, '12+', NOW);
    expect(quit).toBe(false);
    expect(output[0]).toBe('_1__2__+_' + '___'.repeat(5));
    expect(output.slice(1, 6)).toEqual(Array(5).fill(EMPTY_ROW));
  });

  it('submits a full row and prints the summary on a win', () => {
    const engine = engineFor('12+57=69');
    expect(handleLine(engine, '12+57=69', NOW).output).toEqual([
      '[1][2][+][5][7][=][6][9]',
      EMPTY_ROW,
      EMPTY_ROW,
      EMPTY_ROW,
      EMPTY_ROW,
      EMPTY_ROW,
      '',
      '_0_[1][2]_3__4_[5][6][7]_8_[9][+]_-__*__/_[=]',
      '',
      'Solved in 1/6!',
      'Next puzzle in 14:00:00',
      'Played 1  Win % 100  Streak 1  Best 1  Fewest tries 1',
      '1 | #################### 1',
      '2 | 0',
      '3 | 0',
      '4 | 0',
      '5 | 0',
      '6 | 0',
    ]);
  });

  it('prints the rejection message for a wrong equation', () => {
    const engine = engineFor('12+57=69');
    expect(handleLine(engine, '10+10=21', NOW).output).toEqual([
      "That equation doesn't add up!",
    ]);
    expect(engine.currentState().cursor).toEqual({ row: 0, column: 8 });
  });

  it('replaces a rejected row with the next equation typed', () => {
    const engine = engineFor('12+57=69');
    handleLine(engine, '10+10=21', NOW);
    const { output } = handleLine(engine, '12+57=69', NOW);
    expect(output[0]).toBe('[1][2][+][5][7][=][6][9]');
    expect(engine.currentState()).toMatchObject({ status: 'won', triesUsed: 1 });
  });

  it('submits a full row on a blank line or the submit command', () => {
    const engine = engineFor('12+57=69');
    handleLine(engine, '10+10=21', NOW);
    expect(handleLine(engine, '', NOW).output).toEqual(["That equation doesn't add up!"]);
    expect(handleLine(engine, 'submit', NOW).output).toEqual(["That equation doesn't add up!"]);

    handleLine(engine, 'del', NOW);
    expect(engine.insertCharacter('0')).toEqual({ accepted: true });
    // 10+10=20 against 12+57=69: only 1, +, = placed; the second 1 is used up
    expect(handleLine(engine, '', NOW).output[0]).toBe('[1] 0 [+] 1  0 [=](2) 0 ');
    expect(engine.currentState().cursor).toEqual({ row: 1, column: 0 });
  });

  it('reports an incomplete row on submit', () => {
    const engine = engineFor('12+57=69');
    handleLine(engine, '12+5', NOW);
    expect(handleLine(engine, 'submit', NOW).output).toEqual(['Complete the equation first!']);
  });

  it('refuses input longer than the row', () => {
    const engine = engineFor('12+57=69');
    expect(handleLine(engine, '12+57=690', NOW).output).toEqual([
      'Too many characters: a row holds 8.',
    ]);
    handleLine(engine, '12+', NOW);
    expect(handleLine(engine, '57=690', NOW).output).toEqual([
      'Too many characters: a row holds 8.',
    ]);
    expect(engine.currentState().cursor).toEqual({ row: 0, column: 3 });
  });

  it('stops typing at the first unsupported character', () => {
    const engine = engineFor('12+57=69');
    expect(handleLine(engine, '12x', NOW).output).toEqual([
      'Only digits, + - * / and = can be typed.',
    ]);
    expect(engine.currentState().cursor.column).toBe(2);
  });

  it('deletes one character or the whole row', () => {
    const engine = engineFor('12+57=69');
    handleLine(engine, '12+5', NOW);
    handleLine(engine, 'del', NOW);
    expect(engine.currentState().guesses[0].equation).toBe('12+     ');
    handleLine(engine, 'clear', NOW);
    expect(engine.currentState().cursor.column).toBe(0);
    expect(handleLine(engine, 'del', NOW).output).toEqual(['Nothing to delete.']);
  });

  it('handles help, stats, blank lines and quit', () => {
    const engine = engineFor('12+57=69');
    expect(handleLine(engine, 'help', NOW).output).toEqual(HELP);
    expect(handleLine(engine, '   ', NOW)).toEqual({ output: [], quit: false });
    expect(handleLine(engine, 'stats', NOW).output[0]).toBe(
      'Played 0  Win % 0  Streak 0  Best 0  Fewest tries 6',
    );
    expect(handleLine(engine, 'QUIT', NOW)).toEqual({ output: [], quit: true });
  });
});
