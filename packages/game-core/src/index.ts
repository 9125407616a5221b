// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • scoring.ts   → two-pass feedback (scoreEquation) and keyboard merge
//   • equation.ts  → guess validation and left-to-right evaluation
//   • generator.ts → daily equation generation with fallback pool
//   • random.ts    → injectable and seeded random sources
//   • session.ts   → per-day guess state machine
//   • dayKey.ts    → local calendar-day helpers
//   • daily.ts     → daily gate (cached answer, once-per-day play)
//   • stats.ts     → lifetime stats and streaks
//   • storage.ts   → key/value store interface and adapters
//   • engine.ts    → EquationEngine facade
//
// Example usage:
//   import { EquationEngine, MemoryStore } from '@eqle/game-core';

export * from './scoring.js';
export * from './equation.js';
export * from './generator.js';
export * from './random.js';
export * from './session.js';
export * from './dayKey.js';
export * from './daily.js';
export * from './stats.js';
export * from './storage.js';
export * from './engine.js';
