import {
  BASE_TRANSITIONS,
  MARKET_STATES,
  PERSONALITIES,
  PERSONALITY_PROFILES,
  PROBABILITY_TOLERANCE,
  VALUE_MULTIPLIERS,
} from './constants.js';
import type {
  MarketState,
  MarketTables,
  PersonalityProfiles,
  StayBucket,
  TransitionMatrix,
  TransitionRow,
  ValueMultipliers,
} from './types.js';

const STAY_BUCKETS: readonly StayBucket[] = ['up', 'down', 'flat'];

function freezeRow(row: TransitionRow): TransitionRow {
  return Object.freeze({ up: row.up, down: row.down, flat: row.flat, crash: row.crash, boom: row.boom });
}

/**
 * Return a frozen copy of a transition matrix.
 *
 * @param matrix - Matrix to copy.
 * @returns Deep-frozen matrix with the same probabilities.
 */
export function freezeMatrix(matrix: TransitionMatrix): TransitionMatrix {
  return Object.freeze({
    up: freezeRow(matrix.up),
    down: freezeRow(matrix.down),
    flat: freezeRow(matrix.flat),
    crash: freezeRow(matrix.crash),
    boom: freezeRow(matrix.boom),
  });
}

/**
 * Check that every row of a transition matrix is a probability distribution.
 *
 * @param matrix - Matrix to check.
 * @throws RangeError naming the first row with a negative, non-finite or mis-summed entry.
 */
export function validateTransitionMatrix(matrix: TransitionMatrix): void {
  for (const from of MARKET_STATES) {
    const row = matrix[from];
    let total = 0;
    for (const to of MARKET_STATES) {
      const p = row[to];
      if (!Number.isFinite(p) || p < 0) {
        throw new RangeError(`Transition ${from} -> ${to} must be a finite, non-negative probability (got ${String(p)})`);
      }
      total += p;
    }
    if (Math.abs(total - 1) > PROBABILITY_TOLERANCE) {
      throw new RangeError(`Transition row "${from}" must sum to 1 (got ${String(total)})`);
    }
  }
}

/**
 * Check that every value multiplier is a finite, strictly positive number.
 *
 * @param multipliers - Table to check.
 * @throws RangeError naming the first invalid state.
 */
export function validateValueMultipliers(multipliers: ValueMultipliers): void {
  for (const state of MARKET_STATES) {
    const m = multipliers[state];
    if (!Number.isFinite(m) || m <= 0) {
      throw new RangeError(`Value multiplier for "${state}" must be a positive number (got ${String(m)})`);
    }
  }
}

/**
 * Check that every stay-in probability lies in [0, 1].
 *
 * @param profiles - Personality table to check.
 * @throws RangeError naming the first invalid personality/bucket pair.
 */
export function validatePersonalityProfiles(profiles: PersonalityProfiles): void {
  for (const personality of PERSONALITIES) {
    const profile = profiles[personality];
    for (const bucket of STAY_BUCKETS) {
      const p = profile[bucket];
      if (p !== undefined && (!Number.isFinite(p) || p < 0 || p > 1)) {
        throw new RangeError(`Stay-in probability for ${personality}.${bucket} must be within [0, 1] (got ${String(p)})`);
      }
    }
  }
}

/**
 * Build the default constant tables, deep-frozen.
 * Called once at start-up; the result is passed explicitly to MarketModel and Agent.
 *
 * @returns Validated, frozen MarketTables.
 */
export function createDefaultTables(): MarketTables {
  const multipliers: ValueMultipliers = Object.freeze({ ...VALUE_MULTIPLIERS });
  const personalities: PersonalityProfiles = Object.freeze({
    risk_taker: Object.freeze({ ...PERSONALITY_PROFILES.risk_taker }),
    cautious: Object.freeze({ ...PERSONALITY_PROFILES.cautious }),
    greedy: Object.freeze({ ...PERSONALITY_PROFILES.greedy }),
    average: Object.freeze({ ...PERSONALITY_PROFILES.average }),
  });
  const tables: MarketTables = Object.freeze({
    transitions: freezeMatrix(BASE_TRANSITIONS),
    multipliers,
    personalities,
  });

  validateTransitionMatrix(tables.transitions);
  validateValueMultipliers(tables.multipliers);
  validatePersonalityProfiles(tables.personalities);
  return tables;
}

/** Type guard for MarketState strings. */
export function isMarketState(value: unknown): value is MarketState {
  return typeof value === 'string' && (MARKET_STATES as readonly string[]).includes(value);
}
