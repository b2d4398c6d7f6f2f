/**
 * Agrarian BNPL - Script argument helpers
 */

/**
 * Positional integer argument; `fallback` when absent, throws below `min`
 */
export function parseIntArg(value: string | undefined, fallback: number, name: string, min: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

export const MIN_SAMPLE_COUNT = 1;
export const MIN_SEED = 0;
