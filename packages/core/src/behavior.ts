import {
  BASE_REENTRY_CHANCE,
  DEEP_DISCOUNT_INDEX,
  DEEP_DISCOUNT_REENTRY_CHANCE,
  DEFAULT_STAY_PROBABILITY,
  DISCOUNT_INDEX,
  DISCOUNT_REENTRY_CHANCE,
} from './constants.js';
import type { MarketState, Personality, PersonalityProfiles, StayBucket, StayLookup } from './types.js';

/**
 * Map a market state to the personality-table bucket it is read from.
 * Crash shares the "down" bucket; boom has no bucket.
 */
export function stayBucketFor(state: MarketState): StayBucket | null {
  switch (state) {
    case 'up':
    case 'down':
    case 'flat':
      return state;
    case 'crash':
      return 'down';
    case 'boom':
      return null;
  }
}

/**
 * Stay-in probability for a personality in a market state.
 *
 * Total over every (personality, state) pair: when the state has no bucket
 * (boom) or the profile lacks the bucket, DEFAULT_STAY_PROBABILITY (0.6) is
 * returned and the lookup is marked `defaulted`.
 *
 * @param profiles - Personality stay-in table.
 * @param personality - Agent personality.
 * @param state - Market state just revealed.
 * @returns The probability and where it came from.
 */
export function resolveStayProbability(
  profiles: PersonalityProfiles,
  personality: Personality,
  state: MarketState,
): StayLookup {
  const bucket = stayBucketFor(state);
  const probability = bucket === null ? undefined : profiles[personality][bucket];

  if (bucket === null || probability === undefined) {
    return { state, bucket: null, probability: DEFAULT_STAY_PROBABILITY, defaulted: true };
  }
  return { state, bucket, probability, defaulted: false };
}

/**
 * Chance that an inactive agent re-enters, given the cumulative market index.
 * Cheaper markets attract more re-entry.
 *
 * @param marketIndex - Cumulative product of value multipliers since the start.
 * @returns 0.5 below 0.8, 0.35 below 1.0, otherwise 0.25.
 */
export function reentryChance(marketIndex: number): number {
  if (marketIndex < DEEP_DISCOUNT_INDEX) return DEEP_DISCOUNT_REENTRY_CHANCE;
  if (marketIndex < DISCOUNT_INDEX) return DISCOUNT_REENTRY_CHANCE;
  return BASE_REENTRY_CHANCE;
}
