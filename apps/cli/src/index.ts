// apps/cli/src/index.ts
//
// Terminal client for the daily equation puzzle.
//
// Responsibilities:
//   • Load configuration from the environment (.env supported).
//   • Keep progress and stats in a JSON state file between runs.
//   • Read lines from stdin and route them through the engine.
//
// Logs go to stderr so they never interleave with the board on stdout.

import 'dotenv/config';
import { stdin as input, stdout as output } from 'node:process';
import readline from 'node:readline/promises';
import { destination, pino } from 'pino';

import { EquationEngine, JsonFileStore } from '@eqle/game-core';
import { HELP, handleLine } from './commands.js';
import { loadConfig } from './config.js';
import { renderBoard, renderKeyboard, renderSummary } from './render.js';

const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL }, destination(2));

async function main() {
  const store = new JsonFileStore(config.EQLE_STATE_FILE, log);
  const engine = new EquationEngine({ store, seed: config.EQLE_SEED, logger: log });
  log.info({ stateFile: config.EQLE_STATE_FILE }, 'engine ready');

  const start = engine.startSession();
  const state = engine.currentState();
  if (!start.ok) {
    console.log(start.message);
    console.log([...renderBoard(state), ...renderSummary(state, new Date())].join('\n'));
    return;
  }

  console.log(start.resumed ? "Resuming today's puzzle." : "Today's puzzle is ready.");
  console.log([...HELP, '', ...renderBoard(state), '', renderKeyboard(state.keyFeedback)].join('\n'));

  const rl = readline.createInterface({ input, output });
  try {
    for await (const line of rl) {
      const result = handleLine(engine, line);
      if (result.output.length) console.log(result.output.join('\n'));
      if (result.quit || engine.currentState().terminal) break;
    }
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  log.error({ err }, 'cli crashed');
  process.exitCode = 1;
});
