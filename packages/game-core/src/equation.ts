// packages/game-core/src/equation.ts
//
// Guess validation: grammar and arithmetic checks an equation must pass
// before it can be scored.
//
// Evaluation is strictly left to right, with no operator precedence:
//   "2+3*4=20" is valid, "2+3*4=14" is not.
//
// Each rejection carries a distinct reason so the caller can tell
// "not finished typing" apart from "typed but wrong".

import { EQUATION_LENGTH, type RejectionReason } from '@eqle/protocol';

export type Operator = '+' | '-' | '*' | '/';

export const OPERATORS: readonly Operator[] = ['+', '-', '*', '/'];

/** Characters a player may type into a guess row. */
export const EQUATION_CHARS = '0123456789+-*/=';

const GRAMMAR = /^\d+[+\-*/]\d+([+\-*/]\d+)*=\d+$/;

export type ParsedEquation = {
  operands: number[];
  operators: Operator[];
  result: number;
};

export type ValidationResult =
  | { valid: true; equation: ParsedEquation }
  | {
      valid: false;
      reason: Extract<
        RejectionReason,
        'incompleteInput' | 'malformedEquation' | 'arithmeticMismatch'
      >;
      message: string;
    };

export const MESSAGES = {
  incompleteInput: 'Complete the equation first!',
  malformedEquation: 'Invalid equation!',
  arithmeticMismatch: "That equation doesn't add up!",
  divisionNotExact: 'Division must leave no remainder!',
} as const;

function isOperator(c: string): c is Operator {
  return c === '+' || c === '-' || c === '*' || c === '/';
}

function parseNonNegative(s: string): number | null {
  if (!/^\d+$/.test(s)) return null;
  const n = Number.parseInt(s, 10);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Apply one operator step. Returns null for a zero divisor or a
 * division that leaves a remainder.
 */
export function applyOperator(
  current: number,
  op: Operator,
  next: number,
): number | null {
  switch (op) {
    case '+':
      return current + next;
    case '-':
      return current - next;
    case '*':
      return current * next;
    case '/':
      if (next === 0 || current % next !== 0) return null;
      return current / next;
  }
}

/**
 * evaluateLeftToRight folds operands with operators, ignoring precedence.
 * Returns null when a division step is invalid.
 */
export function evaluateLeftToRight(
  operands: readonly number[],
  operators: readonly Operator[],
): number | null {
  if (operands.length === 0 || operators.length !== operands.length - 1)
    return null;
  let current = operands[0];
  for (let i = 0; i < operators.length; i++) {
    const step = applyOperator(current, operators[i], operands[i + 1]);
    if (step === null) return null;
    current = step;
  }
  return current;
}

/**
 * validateEquation applies the acceptance rules in order and stops at the
 * first failure.
 *
 * @example
 *   validateEquation('12+57=69') // { valid: true, ... }
 *   validateEquation('10+10=21') // { valid: false, reason: 'arithmeticMismatch', ... }
 */
export function validateEquation(candidate: string): ValidationResult {
  if (candidate.length !== EQUATION_LENGTH) {
    return {
      valid: false,
      reason: 'incompleteInput',
      message: MESSAGES.incompleteInput,
    };
  }

  const malformed: ValidationResult = {
    valid: false,
    reason: 'malformedEquation',
    message: MESSAGES.malformedEquation,
  };

  const clean = candidate.replaceAll(' ', '');
  if (!GRAMMAR.test(clean)) return malformed;

  const [lhs, rhs] = clean.split('=');
  const operandText = lhs.split(/[+\-*/]/);
  const operands: number[] = [];
  for (const text of operandText) {
    const n = parseNonNegative(text);
    if (n === null) return malformed;
    operands.push(n);
  }
  const result = parseNonNegative(rhs);
  if (result === null) return malformed;

  const operators = [...lhs].filter(isOperator);
  if (operators.length !== operands.length - 1) return malformed;

  const value = evaluateLeftToRight(operands, operators);
  if (value === null) {
    return {
      valid: false,
      reason: 'arithmeticMismatch',
      message: MESSAGES.divisionNotExact,
    };
  }
  if (value !== result) {
    return {
      valid: false,
      reason: 'arithmeticMismatch',
      message: MESSAGES.arithmeticMismatch,
    };
  }

  return { valid: true, equation: { operands, operators, result } };
}

/** Render operands and operators back into "A+B-C=R" form. */
export function renderEquation(
  operands: readonly number[],
  operators: readonly Operator[],
  result: number,
): string {
  let out = String(operands[0]);
  for (let i = 0; i < operators.length; i++) {
    out += operators[i] + String(operands[i + 1]);
  }
  return `${out}=${result}`;
}
