export {
  MARKET_STATES,
  PERSONALITIES,
  BASE_TRANSITIONS,
  VALUE_MULTIPLIERS,
  PERSONALITY_PROFILES,
  DEFAULT_STAY_PROBABILITY,
  PARTICIPATION_THRESHOLD,
  PROBABILITY_TOLERANCE,
  BASE_REENTRY_CHANCE,
  DISCOUNT_REENTRY_CHANCE,
  DEEP_DISCOUNT_REENTRY_CHANCE,
  SEED_ENV_VAR,
} from './constants.js';
export {
  createDefaultTables,
  freezeMatrix,
  validateTransitionMatrix,
  validateValueMultipliers,
  validatePersonalityProfiles,
  isMarketState,
} from './tables.js';
export { SeededRandom, mathRandomSource, weightedChoice, uniformChoice } from './random.js';
export { MarketModel, adjustForParticipation, adjustRow } from './market-model.js';
export type { MarketModelOptions } from './market-model.js';
export { resolveStayProbability, reentryChance, stayBucketFor } from './behavior.js';
export { summarizeValues, computeMode, mean, median, roundCents } from './statistics.js';
export { loadSeed } from './config.js';
export type {
  MarketState,
  TransitionRow,
  TransitionMatrix,
  ValueMultipliers,
  Personality,
  StayBucket,
  StayProfile,
  PersonalityProfiles,
  MarketTables,
  RandomSource,
  StayLookup,
  ModeResult,
  ValueSummary,
} from './types.js';
