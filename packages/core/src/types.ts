/** Discrete market regimes. Closed set; see MARKET_STATES for the canonical order. */
export type MarketState = 'up' | 'down' | 'flat' | 'crash' | 'boom';

/** Outgoing probabilities from one market state, keyed by target state. */
export type TransitionRow = Readonly<Record<MarketState, number>>;

/** Markov transition table keyed by source state. Every row sums to 1. */
export type TransitionMatrix = Readonly<Record<MarketState, TransitionRow>>;

/** Per-state multiplier applied to an active agent's value for one period. */
export type ValueMultipliers = Readonly<Record<MarketState, number>>;

/** Behavioural profile of an agent. */
export type Personality = 'risk_taker' | 'cautious' | 'greedy' | 'average';

/** Market states that carry their own stay-in probability in a personality profile. */
export type StayBucket = 'up' | 'down' | 'flat';

/** Stay-in probabilities for one personality. Missing buckets fall back to DEFAULT_STAY_PROBABILITY. */
export type StayProfile = Readonly<Partial<Record<StayBucket, number>>>;

/** Stay-in profiles for every personality. */
export type PersonalityProfiles = Readonly<Record<Personality, StayProfile>>;

/** The immutable constant tables a simulation run is built from. */
export interface MarketTables {
  readonly transitions: TransitionMatrix;
  readonly multipliers: ValueMultipliers;
  readonly personalities: PersonalityProfiles;
}

/**
 * Source of uniform random numbers in [0, 1).
 * Every stochastic decision in the simulation draws from one of these,
 * so a seeded implementation makes a whole run reproducible.
 */
export interface RandomSource {
  /** Return the next uniform draw in [0, 1). */
  next(): number;
}

/**
 * Result of a stay-in probability lookup.
 * `bucket` is null when the personality has no entry for the state and the
 * named default was used instead.
 */
export interface StayLookup {
  readonly state: MarketState;
  readonly bucket: StayBucket | null;
  readonly probability: number;
  readonly defaulted: boolean;
}

/** Mode of a group of values, or an explicit marker when the maximum frequency is shared. */
export type ModeResult =
  | { readonly kind: 'mode'; readonly value: number }
  | { readonly kind: 'noUniqueMode' };

/** Descriptive statistics for a group of agent values. */
export type ValueSummary =
  | { readonly kind: 'noData' }
  | {
      readonly kind: 'summary';
      readonly count: number;
      readonly mean: number;
      readonly median: number;
      readonly min: number;
      readonly max: number;
      readonly mode: ModeResult;
    };
