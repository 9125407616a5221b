// packages/game-core/src/scoring.ts
//
// Equation scoring logic, shared by the session state machine and any
// presentation layer that wants to preview feedback.
// Implements the standard two-pass algorithm to evaluate a guess
// against the correct answer, over the equation alphabet instead of letters.
//
// Feedback legend:
//   - "correct": right character, right position
//   - "present": character occurs elsewhere in the answer
//   - "absent":  character not in the answer, or all its occurrences used
//
// Rules:
//   • Both equations must have the same length.
//   • Only digits, + - * /, = and space are allowed.
//   • Spaces (untyped positions) are never counted and never marked.
//   • Repeated characters are handled by counting the non-correct answer
//     characters and decrementing counts as matches are used.

import type {
  EvaluatedFeedback,
  KeyFeedback,
  TileFeedback,
} from '@eqle/protocol';

const ALPHABET = /^[0-9+\-*/= ]*$/;

/**
 * scoreEquation compares a guess against the answer and produces a per-character evaluation.
 *
 * @param answer - the day's equation
 * @param guess  - the player's equation, same length as the answer
 * @returns      - one feedback value per position; spaces stay "unset"
 *
 * Example:
 *   answer = "10+10=20", guess = "01+01=20"
 *   → ["present", "present", "correct", "present",
 *      "present", "correct", "correct", "correct"]
 */
export function scoreEquation(answer: string, guess: string): TileFeedback[] {
  if (answer.length !== guess.length)
    throw new Error('Equations must have the same length');
  if (!ALPHABET.test(answer) || !ALPHABET.test(guess)) {
    throw new Error('Only digits, operators, = and spaces allowed');
  }

  const n = answer.length;
  const feedback: TileFeedback[] = Array<TileFeedback>(n).fill('unset');
  const counts = new Map<string, number>();

  // Pass 1: mark exact positions and count remaining answer characters
  for (let i = 0; i < n; i++) {
    if (guess[i] !== ' ' && guess[i] === answer[i]) {
      feedback[i] = 'correct';
    } else if (answer[i] !== ' ') {
      counts.set(answer[i], (counts.get(answer[i]) ?? 0) + 1);
    }
  }

  // Pass 2: "present" while the character still has stock, otherwise "absent"
  for (let i = 0; i < n; i++) {
    const c = guess[i];
    if (c === ' ' || feedback[i] === 'correct') continue;
    const left = counts.get(c) ?? 0;
    if (left > 0) {
      feedback[i] = 'present';
      counts.set(c, left - 1);
    } else {
      feedback[i] = 'absent';
    }
  }

  return feedback;
}

const rank: Record<EvaluatedFeedback, number> = {
  absent: 0,
  present: 1,
  correct: 2,
};

/**
 * mergeKeyFeedback folds one evaluated row into the keyboard map.
 *
 * The caller owns `keys`; a new map is returned. A key keeps its best
 * feedback so far (correct > present > absent) and is never downgraded.
 */
export function mergeKeyFeedback(
  keys: Readonly<KeyFeedback>,
  guess: string,
  feedback: readonly TileFeedback[],
): KeyFeedback {
  const next: KeyFeedback = { ...keys };
  for (let i = 0; i < guess.length; i++) {
    const f = feedback[i];
    if (f === undefined || f === 'unset') continue;
    const c = guess[i];
    const current = next[c];
    if (current === undefined || rank[f] > rank[current]) next[c] = f;
  }
  return next;
}

/** True when every tile of a row is "correct". */
export function isSolved(feedback: readonly TileFeedback[]): boolean {
  return feedback.length > 0 && feedback.every((f) => f === 'correct');
}
