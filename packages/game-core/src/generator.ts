// packages/game-core/src/generator.ts
//
// Daily equation generation by rejection sampling.
//
// Shapes produced (all exactly 8 characters):
//   • one operator:  "AA+BB=CC" or "AA-BB=CC"
//   • two operators: "AAoBoC=D", evaluated left to right, D a single digit
//
// Sampling is bounded; when every attempt is rejected the generator falls
// back to a fixed pool of known-good equations. The random source is
// injectable so tests can drive both paths.

import { EQUATION_LENGTH } from '@eqle/protocol';
import {
  OPERATORS,
  applyOperator,
  renderEquation,
  type Operator,
} from './equation.js';
import {
  defaultRandom,
  pick,
  randomInt,
  type RandomSource,
} from './random.js';

export const FALLBACK_EQUATIONS = [
  '10+10=20',
  '50-10=40',
  '10+2-3=9',
  '18/2*1=9',
] as const;

export const DEFAULT_MAX_ATTEMPTS = 100;

export type GeneratorOptions = {
  random?: RandomSource;
  maxAttempts?: number;
};

export type GeneratedEquation = {
  equation: string;
  source: 'random' | 'fallback';
  attempts: number;
};

function sampleOneOperator(random: RandomSource): string {
  const op = pick(random, ['+', '-'] as const);
  if (op === '+') {
    const a = randomInt(random, 10, 49);
    const b = randomInt(random, 10, 99 - a);
    return renderEquation([a, b], [op], a + b);
  }
  const a = randomInt(random, 20, 99);
  const b = randomInt(random, 10, a - 10);
  return renderEquation([a, b], [op], a - b);
}

function sampleTwoOperators(random: RandomSource): string | null {
  const a = randomInt(random, 10, 99);
  const op1: Operator = pick(random, OPERATORS);
  const b = randomInt(random, 0, 9);
  const step1 = applyOperator(a, op1, b);
  if (step1 === null || step1 < 0) return null;

  const op2: Operator = pick(random, OPERATORS);
  const c = randomInt(random, 0, 9);
  const step2 = applyOperator(step1, op2, c);
  if (step2 === null || step2 < 0 || step2 > 9) return null;

  return renderEquation([a, b, c], [op1, op2], step2);
}

/**
 * generateEquation samples until it finds a valid 8-character equation or
 * runs out of attempts.
 *
 * @example
 *   generateEquation({ random: () => 0 })
 *   // → { equation: '10+10=20', source: 'random', attempts: 1 }
 */
export function generateEquation(
  options: GeneratorOptions = {},
): GeneratedEquation {
  const random = options.random ?? defaultRandom;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

  for (let attempts = 1; attempts <= maxAttempts; attempts++) {
    const operatorCount = randomInt(random, 1, 2);
    const equation =
      operatorCount === 1
        ? sampleOneOperator(random)
        : sampleTwoOperators(random);
    if (equation !== null && equation.length === EQUATION_LENGTH) {
      return { equation, source: 'random', attempts };
    }
  }

  return {
    equation: pick(random, FALLBACK_EQUATIONS),
    source: 'fallback',
    attempts: maxAttempts,
  };
}
