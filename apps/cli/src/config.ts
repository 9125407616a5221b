// apps/cli/src/config.ts
//
// Environment configuration for the terminal client.
//
//   EQLE_STATE_FILE  where progress and stats are kept (JSON file)
//   EQLE_SEED        optional; every install sharing a seed gets the same puzzles
//   LOG_LEVEL        pino level, logs go to stderr

import { z } from 'zod';

export const envSchema = z.object({
  EQLE_STATE_FILE: z.string().min(1).default('.eqle-state.json'),
  EQLE_SEED: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid environment: ${fields}`);
  }
  return parsed.data;
}
