import { SEED_ENV_VAR } from './constants.js';

/**
 * Load the simulation seed from the environment.
 *
 * Detection order:
 * 1. SIM_SEED unset or blank → undefined (runs use Math.random)
 * 2. SIM_SEED is an integer literal → that number
 * 3. Otherwise → the trimmed string (hashed by SeededRandom)
 *
 * @param env - Environment to read. Defaults to process.env.
 * @returns Seed for SeededRandom, or undefined for an unseeded run.
 *
 * @example
 * ```typescript
 * import { loadSeed, SeededRandom, mathRandomSource } from '@marketsim/core';
 * const seed = loadSeed();
 * const random = seed === undefined ? mathRandomSource : new SeededRandom(seed);
 * ```
 */
export function loadSeed(env: NodeJS.ProcessEnv = process.env): number | string | undefined {
  const raw = env[SEED_ENV_VAR]?.trim();
  if (raw === undefined || raw === '') {
    return undefined;
  }

  if (/^-?\d+$/.test(raw)) {
    const parsed = Number(raw);
    if (!Number.isSafeInteger(parsed)) {
      throw new RangeError(
        `${SEED_ENV_VAR} is out of range: ${raw}. ` +
          'Numeric seeds must be safe integers. ' +
          'To fix: Use a smaller number, or any non-numeric string as the seed.',
      );
    }
    return parsed;
  }

  return raw;
}
