// packages/protocol/src/index.ts
//
// Shared protocol definitions for the equation puzzle engine and whatever
// presentation layer drives it.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - TileFeedback: per-character evaluation ("correct", "present", "absent", "unset").
//   - Guess / SavedGuesses / KeyColors: the shapes persisted for mid-day resume.
//   - WinDistribution and day keys used by the stats bookkeeping.
//   - Rejection reasons and the outcome shapes returned by engine commands.
//
// Persisted blobs are parsed with these schemas on load, so a corrupt value
// falls back to a default instead of leaking into the engine.

import { z } from 'zod';

export const EQUATION_LENGTH = 8;
export const MAX_GUESSES = 6;

/**
 * TileFeedback schema:
 *  - "correct" → right character, right position
 *  - "present" → character occurs elsewhere in the answer
 *  - "absent"  → character not in the answer (or its occurrences are used up)
 *  - "unset"   → not evaluated yet
 */
export const tileFeedbackSchema = z.enum(['correct', 'present', 'absent', 'unset']);
export type TileFeedback = z.infer<typeof tileFeedbackSchema>;

/** Feedback after evaluation; `unset` never survives scoring. */
export const evaluatedFeedbackSchema = z.enum(['correct', 'present', 'absent']);
export type EvaluatedFeedback = z.infer<typeof evaluatedFeedbackSchema>;

export type SessionStatus = 'inProgress' | 'won' | 'lost';

/** Calendar day in local time, e.g. "2024-03-09". */
export const dayKeySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
export type DayKey = z.infer<typeof dayKeySchema>;

/* -------------------------------------------------------------------------- */
/*                              Persisted shapes                              */
/* -------------------------------------------------------------------------- */

/**
 * One guess row. `equation` holds spaces for untyped positions.
 */
export const guessSchema = z.object({
  equation: z
    .string()
    .length(EQUATION_LENGTH)
    .regex(/^[0-9+\-*/= ]+$/),
  feedback: z.array(tileFeedbackSchema).length(EQUATION_LENGTH),
});
export type Guess = z.infer<typeof guessSchema>;

export const savedGuessesSchema = z.array(guessSchema).length(MAX_GUESSES);

export const keyColorsSchema = z.record(
  z.string().length(1),
  evaluatedFeedbackSchema,
);
export type KeyFeedback = z.infer<typeof keyColorsSchema>;

export const winDistributionSchema = z
  .array(z.number().int().nonnegative())
  .length(MAX_GUESSES);

export const counterSchema = z.coerce.number().int().nonnegative();

/* -------------------------------------------------------------------------- */
/*                              Command outcomes                              */
/* -------------------------------------------------------------------------- */

// Outcomes are built by the engine and handed straight to the caller; they
// never cross a parse boundary, so they are plain types.

/**
 * Reasons a command can be rejected. None of them are fatal: the engine
 * leaves its state unchanged and reports the reason.
 */
export type RejectionReason =
  | 'incompleteInput'
  | 'malformedEquation'
  | 'arithmeticMismatch'
  | 'sessionTerminal'
  | 'alreadyPlayedToday'
  | 'unsupportedCharacter'
  | 'rowFull'
  | 'rowEmpty';

export type Rejection = {
  accepted: false;
  reason: RejectionReason;
  message: string;
};

export type CommandOutcome = { accepted: true } | Rejection;

/**
 * Accepted submission:
 *  - feedback: the finalized tiles of the submitted row
 *  - round:    1-based number of guesses used so far
 *  - status:   session status after the guess
 */
export type SubmitAccepted = {
  accepted: true;
  feedback: EvaluatedFeedback[];
  round: number;
  status: SessionStatus;
};

export type SubmitOutcome = SubmitAccepted | Rejection;

export type StartOutcome =
  | { ok: true; resumed: boolean }
  | { ok: false; reason: 'alreadyPlayedToday'; message: string };
