/**
 * commands.ts
 *
 * Turns one line of terminal input into engine commands and returns the
 * lines to print.
 *
 * Input:
 *   12+57=69   type characters; a full row is submitted automatically,
 *              and typing onto a rejected full row replaces it
 *   submit     submit the current row (a blank line does too, once full)
 *   del        delete the last character
 *   clear      delete the whole row
 *   board      show the board and keyboard
 *   stats      show statistics
 *   help       show this list
 *   quit       exit
 */

import type { EquationEngine } from '@eqle/game-core';
import { EQUATION_LENGTH } from '@eqle/protocol';
import {
  renderBoard,
  renderKeyboard,
  renderStats,
  renderSummary,
} from './render.js';

export const HELP = [
  'Type an equation such as 12+57=69; a full row is submitted.',
  'Typing onto a rejected row replaces it.',
  'Commands: submit, del, clear, board, stats, help, quit',
  'Tiles: [x] correct, (x) present, plain x absent',
];

export type LineResult = { output: string[]; quit: boolean };

function boardLines(engine: EquationEngine): string[] {
  const state = engine.currentState();
  return [...renderBoard(state), '', renderKeyboard(state.keyFeedback)];
}

function clearRow(engine: EquationEngine) {
  let r = engine.deleteCharacter();
  while (r.accepted) r = engine.deleteCharacter();
}

function submitRow(engine: EquationEngine, now: Date): string[] {
  const submitted = engine.submitGuess();
  if (!submitted.accepted) return [submitted.message];

  const state = engine.currentState();
  const output = boardLines(engine);
  if (state.terminal) {
    output.push('', ...renderSummary(state, now), ...renderStats(engine.stats()));
  }
  return output;
}

export function handleLine(
  engine: EquationEngine,
  line: string,
  now: Date = new Date(),
): LineResult {
  const input = line.trim();
  const done = (output: string[]): LineResult => ({ output, quit: false });
  const rowFull = () => engine.currentState().cursor.column === EQUATION_LENGTH;

  switch (input.toLowerCase()) {
    case '':
      return done(rowFull() ? submitRow(engine, now) : []);
    case 'submit':
      return done(submitRow(engine, now));
    case 'quit':
    case 'exit':
      return { output: [], quit: true };
    case 'help':
      return done(HELP);
    case 'stats':
      return done(renderStats(engine.stats()));
    case 'board':
      return done(boardLines(engine));
    case 'del': {
      const r = engine.deleteCharacter();
      return done(r.accepted ? boardLines(engine) : [r.message]);
    }
    case 'clear':
      clearRow(engine);
      return done(boardLines(engine));
  }

  const typed = input.replaceAll(' ', '');
  const replacing = rowFull();
  const from = replacing ? 0 : engine.currentState().cursor.column;
  if (from + typed.length > EQUATION_LENGTH) {
    return done([`Too many characters: a row holds ${EQUATION_LENGTH}.`]);
  }
  if (replacing) clearRow(engine);

  for (const c of typed) {
    const r = engine.insertCharacter(c);
    if (!r.accepted) return done([r.message]);
  }
  return done(rowFull() ? submitRow(engine, now) : boardLines(engine));
}
