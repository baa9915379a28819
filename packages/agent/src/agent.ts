import { mathRandomSource, reentryChance, resolveStayProbability } from '@marketsim/core';
import type { MarketState, Personality, PersonalityProfiles, RandomSource, ValueMultipliers } from '@marketsim/core';
import { DEFAULT_INITIAL_VALUE } from './constants.js';
import type { AgentSnapshot, ParticipationDecision } from './types.js';

/** Options for constructing an Agent. */
export interface AgentOptions {
  readonly agentId: number;
  readonly personality: Personality;
  /** Stay-in table shared by the whole population. */
  readonly profiles: PersonalityProfiles;
  /** Value multipliers shared by the whole population. */
  readonly multipliers: ValueMultipliers;
  /** Source of decision draws. Defaults to Math.random. */
  readonly random?: RandomSource;
  /** Starting value. Defaults to 1000. */
  readonly initialValue?: number;
  /** Starting participation. Defaults to true. */
  readonly active?: boolean;
}

/**
 * A single market participant with a two-state (active/inactive) decision machine.
 *
 * Each period the engine calls decide() with the just-revealed market state,
 * then updateValue() with the same state. The agent reads and writes only its
 * own fields, so agents within a period are independent of each other.
 */
export class Agent {
  readonly agentId: number;
  readonly personality: Personality;
  private readonly profiles: PersonalityProfiles;
  private readonly multipliers: ValueMultipliers;
  private readonly random: RandomSource;
  private value: number;
  private active: boolean;

  constructor(options: AgentOptions) {
    const initialValue = options.initialValue ?? DEFAULT_INITIAL_VALUE;
    if (!Number.isFinite(initialValue) || initialValue <= 0) {
      throw new RangeError(`initialValue must be a positive number (got ${String(initialValue)})`);
    }
    this.agentId = options.agentId;
    this.personality = options.personality;
    this.profiles = options.profiles;
    this.multipliers = options.multipliers;
    this.random = options.random ?? mathRandomSource;
    this.value = initialValue;
    this.active = options.active ?? true;
  }

  /** Current monetary value. */
  get currentValue(): number {
    return this.value;
  }

  /** Whether the agent is invested this period. */
  get isActive(): boolean {
    return this.active;
  }

  /**
   * React to the newly revealed market state. Uses exactly one draw.
   *
   * Inactive: re-enter when the draw is below the re-entry chance for the
   * market index. Active: exit when the draw exceeds the stay-in probability.
   *
   * @param newState - Market state of this period.
   * @param marketIndex - Cumulative market index including this period.
   * @returns What was evaluated and whether the status changed.
   */
  decide(newState: MarketState, marketIndex: number): ParticipationDecision {
    const stay = resolveStayProbability(this.profiles, this.personality, newState);
    const draw = this.random.next();

    if (!this.active) {
      const threshold = reentryChance(marketIndex);
      if (draw < threshold) {
        this.active = true;
      }
      return {
        agentId: this.agentId,
        evaluated: 'reentry',
        from: 'inactive',
        to: this.active ? 'active' : 'inactive',
        draw,
        threshold,
        defaulted: stay.defaulted,
      };
    }

    if (draw > stay.probability) {
      this.active = false;
    }
    return {
      agentId: this.agentId,
      evaluated: 'exit',
      from: 'active',
      to: this.active ? 'active' : 'inactive',
      draw,
      threshold: stay.probability,
      defaulted: stay.defaulted,
    };
  }

  /**
   * Apply the period's multiplier if active; inactive value is left untouched.
   * Must run after decide() for the same period.
   *
   * @param state - Market state of this period.
   */
  updateValue(state: MarketState): void {
    if (this.active) {
      this.value *= this.multipliers[state];
    }
  }

  /**
   * Return a frozen snapshot of the agent.
   *
   * @returns Frozen AgentSnapshot.
   */
  getSnapshot(): AgentSnapshot {
    return Object.freeze({
      agentId: this.agentId,
      personality: this.personality,
      value: this.value,
      active: this.active,
    });
  }
}
