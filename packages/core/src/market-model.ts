import {
  LOW_PARTICIPATION_BOOM_PENALTY,
  LOW_PARTICIPATION_DOWN_BOOST,
  LOW_PARTICIPATION_UP_PENALTY,
  MARKET_STATES,
  PARTICIPATION_THRESHOLD,
} from './constants.js';
import { mathRandomSource, weightedChoice } from './random.js';
import { freezeMatrix, validateTransitionMatrix, validateValueMultipliers } from './tables.js';
import type { MarketState, RandomSource, TransitionMatrix, TransitionRow, ValueMultipliers } from './types.js';

/**
 * Apply participation feedback to a single transition row.
 *
 * Below PARTICIPATION_THRESHOLD the row is tilted towards "down" and then
 * renormalized; otherwise the row is returned as-is.
 *
 * @param row - Base outgoing probabilities.
 * @param participationRatio - Fraction of agents active at the start of the period.
 * @returns The adjusted row (a new frozen object when adjusted).
 */
export function adjustRow(row: TransitionRow, participationRatio: number): TransitionRow {
  if (participationRatio >= PARTICIPATION_THRESHOLD) {
    return row;
  }

  const tilted: Record<MarketState, number> = {
    ...row,
    down: row.down + LOW_PARTICIPATION_DOWN_BOOST,
    up: Math.max(0, row.up - LOW_PARTICIPATION_UP_PENALTY),
    boom: Math.max(0, row.boom - LOW_PARTICIPATION_BOOM_PENALTY),
  };

  let total = 0;
  for (const state of MARKET_STATES) total += tilted[state];

  return Object.freeze({
    up: tilted.up / total,
    down: tilted.down / total,
    flat: tilted.flat / total,
    crash: tilted.crash / total,
    boom: tilted.boom / total,
  });
}

/**
 * Produce the participation-adjusted transition matrix.
 * Pure: the input matrix is never mutated. At or above the threshold the
 * base matrix itself is returned.
 *
 * @param matrix - Base transition matrix.
 * @param participationRatio - Fraction of agents active at the start of the period.
 * @returns Adjusted matrix whose rows each sum to 1.
 */
export function adjustForParticipation(matrix: TransitionMatrix, participationRatio: number): TransitionMatrix {
  if (participationRatio >= PARTICIPATION_THRESHOLD) {
    return matrix;
  }
  return Object.freeze({
    up: adjustRow(matrix.up, participationRatio),
    down: adjustRow(matrix.down, participationRatio),
    flat: adjustRow(matrix.flat, participationRatio),
    crash: adjustRow(matrix.crash, participationRatio),
    boom: adjustRow(matrix.boom, participationRatio),
  });
}

/** Options for constructing a MarketModel. */
export interface MarketModelOptions {
  readonly transitions: TransitionMatrix;
  readonly multipliers: ValueMultipliers;
  /** Source of transition draws. Defaults to Math.random. */
  readonly random?: RandomSource;
}

/**
 * Markov-chain market with participation-dependent transitions.
 * Owns immutable copies of the transition and multiplier tables; the only
 * non-determinism is the single weighted draw in transition().
 */
export class MarketModel {
  private readonly transitions: TransitionMatrix;
  private readonly multipliers: ValueMultipliers;
  private readonly random: RandomSource;

  constructor(options: MarketModelOptions) {
    validateTransitionMatrix(options.transitions);
    validateValueMultipliers(options.multipliers);
    this.transitions = freezeMatrix(options.transitions);
    this.multipliers = Object.freeze({ ...options.multipliers });
    this.random = options.random ?? mathRandomSource;
  }

  /** The base (unadjusted) transition matrix. */
  get baseTransitions(): TransitionMatrix {
    return this.transitions;
  }

  /**
   * Adjusted outgoing distribution for one state.
   *
   * @param state - Current market state.
   * @param participationRatio - Fraction of agents active at the start of the period.
   * @returns The row the next draw will be taken from.
   */
  distributionFor(state: MarketState, participationRatio: number): TransitionRow {
    return adjustRow(this.transitions[state], participationRatio);
  }

  /**
   * Sample the next market state.
   *
   * @param currentState - State of the period just finished.
   * @param participationRatio - Fraction of agents active at the start of the period.
   * @returns The next market state.
   */
  transition(currentState: MarketState, participationRatio: number): MarketState {
    const row = this.distributionFor(currentState, participationRatio);
    return weightedChoice(MARKET_STATES, MARKET_STATES.map((s) => row[s]), this.random);
  }

  /**
   * Multiplier applied to an active agent's value in the given state.
   *
   * @param state - Market state of the period.
   * @returns Strictly positive multiplier.
   */
  valueMultiplier(state: MarketState): number {
    return this.multipliers[state];
  }
}
