// packages/game-core/src/storage.ts
//
// Key/value persistence used to survive restarts.
//
// The engine only needs an opaque, synchronous string store. Two adapters
// ship here:
//   • MemoryStore   → tests and embedding hosts that persist elsewhere
//   • JsonFileStore → one JSON object in a file, used by the CLI
//
// `setMany` is the unit of atomicity: callers batch every field of one
// transition into a single call so a reader never sees half of it.

import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { z, type ZodType, type ZodTypeDef } from 'zod';

export interface KeyValueStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  setMany(entries: Readonly<Record<string, string>>): void;
  remove(key: string): void;
}

export const StorageKeys = {
  dailyEquation: 'DailyEquation',
  lastEquationDate: 'LastEquationDate',
  lastGameCompletedDate: 'LastGameCompletedDate',
  lastPlayedDate: 'LastPlayedDate',
  lastStatsUpdate: 'LastStatsUpdate',
  lastWinDate: 'LastWinDate',
  currentStreak: 'CurrentStreak',
  bestStreak: 'BestStreak',
  totalGamesPlayed: 'TotalGamesPlayed',
  totalGamesWon: 'TotalGamesWon',
  winDistribution: 'WinDistribution',
  fewestTries: 'FewestTries',
  savedGuesses: 'SavedGuesses',
  currentGuessIndex: 'CurrentGuessIndex',
  currentCharIndex: 'CurrentCharIndex',
  keyColors: 'KeyColors',
} as const;

/**
 * readValue fetches one key and validates it. Missing keys yield undefined;
 * unparsable or invalid values are logged and also yield undefined, so the
 * caller can fall back to its default.
 */
export function readValue<T>(
  store: KeyValueStore,
  key: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  log?: Logger,
  json = false,
): T | undefined {
  const raw = store.get(key);
  if (raw === undefined) return undefined;
  let value: unknown = raw;
  if (json) {
    try {
      value = JSON.parse(raw);
    } catch {
      log?.warn({ key }, 'stored value is not JSON, using default');
      return undefined;
    }
  }
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  log?.warn({ key, issues: parsed.error.issues.length }, 'stored value failed validation, using default');
  return undefined;
}

export class MemoryStore implements KeyValueStore {
  private readonly data = new Map<string, string>();

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [k, v] of Object.entries(initial)) this.data.set(k, v);
  }

  get(key: string) {
    return this.data.get(key);
  }

  set(key: string, value: string) {
    this.data.set(key, value);
  }

  setMany(entries: Readonly<Record<string, string>>) {
    for (const [k, v] of Object.entries(entries)) this.data.set(k, v);
  }

  remove(key: string) {
    this.data.delete(key);
  }

  /** Plain-object copy of the contents, handy in tests. */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.data);
  }
}

const fileSchema = z.record(z.string(), z.string());

/**
 * JsonFileStore keeps every key in one JSON file.
 *
 * Reads happen once, at construction; every write rewrites the file through
 * a temp file + rename, so the file on disk is always a complete snapshot.
 * An unreadable or corrupt file is treated as empty, and a write that fails
 * is logged without interrupting the caller.
 */
export class JsonFileStore implements KeyValueStore {
  private readonly data: Record<string, string>;

  constructor(
    private readonly file: string,
    private readonly log?: Logger,
  ) {
    this.data = this.load();
  }

  private load(): Record<string, string> {
    if (!fs.existsSync(this.file)) return {};
    try {
      const parsed = fileSchema.safeParse(
        JSON.parse(fs.readFileSync(this.file, 'utf8')),
      );
      if (parsed.success) return parsed.data;
      this.log?.warn({ file: this.file }, 'state file has unexpected shape, starting empty');
    } catch (err) {
      this.log?.warn({ file: this.file, err }, 'state file unreadable, starting empty');
    }
    return {};
  }

  /**
   * A failed write keeps the values in memory for the rest of the run and
   * logs at error; the next successful write persists them all.
   */
  private flush() {
    const tmp = `${this.file}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      fs.writeFileSync(tmp, JSON.stringify(this.data, null, 2));
      fs.renameSync(tmp, this.file);
    } catch (err) {
      this.log?.error({ file: this.file, err }, 'state file not written');
    }
  }

  get(key: string) {
    return Object.hasOwn(this.data, key) ? this.data[key] : undefined;
  }

  set(key: string, value: string) {
    this.data[key] = value;
    this.flush();
  }

  setMany(entries: Readonly<Record<string, string>>) {
    Object.assign(this.data, entries);
    this.flush();
  }

  remove(key: string) {
    if (!Object.hasOwn(this.data, key)) return;
    delete this.data[key];
    this.flush();
  }
}
