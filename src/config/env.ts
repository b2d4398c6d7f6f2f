/**
 * Agrarian BNPL - Runtime Configuration
 * Environment variables parsed once at boot; FAIL LOUDLY on bad values.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { MIN_SEED } from '../shared/cli';

const IntFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const ConfigSchema = z.object({
  PORT: IntFromEnv(3001),
  DATABASE_URL: z.preprocess(v => (v === '' ? undefined : v), z.string().url().optional()),
  RATE_LIMIT_WINDOW_MS: IntFromEnv(60_000),
  RATE_LIMIT_MAX: IntFromEnv(120),
  BATCH_MAX_SIZE: IntFromEnv(500),
  DASHBOARD_SAMPLE_SIZE: IntFromEnv(1000),
  DASHBOARD_SEED: z.coerce.number().int().min(MIN_SEED).default(42),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

export function loadEnvFile(): void {
  dotenv.config();
}
