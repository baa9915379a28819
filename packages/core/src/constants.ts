import type { MarketState, Personality, PersonalityProfiles, TransitionMatrix, ValueMultipliers } from './types.js';

/** Canonical state order. Weighted selection walks the cumulative distribution in this order. */
export const MARKET_STATES: readonly MarketState[] = Object.freeze(['up', 'down', 'flat', 'crash', 'boom']);

/** Every personality an agent can be generated with. */
export const PERSONALITIES: readonly Personality[] = Object.freeze(['risk_taker', 'cautious', 'greedy', 'average']);

/** Base Markov transitions, rows keyed by the current state. */
export const BASE_TRANSITIONS: TransitionMatrix = {
  up: { up: 0.4, down: 0.3, flat: 0.25, crash: 0.025, boom: 0.025 },
  down: { up: 0.3, down: 0.4, flat: 0.25, crash: 0.05, boom: 0.0 },
  flat: { up: 0.35, down: 0.3, flat: 0.3, crash: 0.025, boom: 0.025 },
  crash: { up: 0.4, down: 0.3, flat: 0.25, crash: 0.025, boom: 0.025 },
  boom: { up: 0.3, down: 0.25, flat: 0.4, crash: 0.025, boom: 0.025 },
};

/** Value change per period for an active agent: up +10%, down -10%, crash -40%, boom +30%. */
export const VALUE_MULTIPLIERS: ValueMultipliers = {
  up: 1.1,
  down: 0.9,
  flat: 1.0,
  crash: 0.6,
  boom: 1.3,
};

/** Stay-in probabilities per personality. No profile has a boom entry. */
export const PERSONALITY_PROFILES: PersonalityProfiles = {
  risk_taker: { up: 0.9, down: 0.75, flat: 0.8 },
  cautious: { up: 0.95, down: 0.4, flat: 0.6 },
  greedy: { up: 0.99, down: 0.65, flat: 0.7 },
  average: { up: 0.85, down: 0.5, flat: 0.65 },
};

/** Stay-in probability used when a personality has no entry for a market state (boom). */
export const DEFAULT_STAY_PROBABILITY = 0.6;

/** Participation below this ratio tilts every transition row towards "down". */
export const PARTICIPATION_THRESHOLD = 0.5;

/** Added to the "down" probability under low participation. */
export const LOW_PARTICIPATION_DOWN_BOOST = 0.05;

/** Removed from the "up" probability under low participation (floored at 0). */
export const LOW_PARTICIPATION_UP_PENALTY = 0.03;

/** Removed from the "boom" probability under low participation (floored at 0). */
export const LOW_PARTICIPATION_BOOM_PENALTY = 0.01;

/** Tolerance for row sums of a transition matrix. */
export const PROBABILITY_TOLERANCE = 1e-9;

/** Re-entry chance for an inactive agent when the market index is at or above 1.0. */
export const BASE_REENTRY_CHANCE = 0.25;

/** Re-entry chance when the market index is below DEEP_DISCOUNT_INDEX. */
export const DEEP_DISCOUNT_REENTRY_CHANCE = 0.5;

/** Re-entry chance when the market index is below 1.0 but not deeply discounted. */
export const DISCOUNT_REENTRY_CHANCE = 0.35;

/** Market index under which the market counts as deeply discounted. */
export const DEEP_DISCOUNT_INDEX = 0.8;

/** Market index under which the market counts as discounted. */
export const DISCOUNT_INDEX = 1.0;

/** Environment variable read by loadSeed(). */
export const SEED_ENV_VAR = 'SIM_SEED';
