import type { MarketState, Personality, ValueSummary } from '@marketsim/core';

/** Participation status of an agent. */
export type ParticipationStatus = 'active' | 'inactive';

/** Frozen view of one agent, safe to hand to reporters and plotters. */
export interface AgentSnapshot {
  readonly agentId: number;
  readonly personality: Personality;
  readonly value: number;
  readonly active: boolean;
}

/**
 * Outcome of one Agent.decide() call.
 * An inactive agent evaluates re-entry, an active agent evaluates exit; never both.
 */
export interface ParticipationDecision {
  readonly agentId: number;
  /** Which rule was evaluated, based on the status at the start of the call. */
  readonly evaluated: 'reentry' | 'exit';
  readonly from: ParticipationStatus;
  readonly to: ParticipationStatus;
  /** The uniform draw compared against the threshold. */
  readonly draw: number;
  /** Re-entry chance (reentry) or stay-in probability (exit). */
  readonly threshold: number;
  /** True when the stay-in probability came from the named default rather than the profile. */
  readonly defaulted: boolean;
}

/** One simulated period in the history. */
export interface PeriodRecord {
  /** 1-based period number. */
  readonly period: number;
  readonly state: MarketState;
  /** Cumulative market index after this period's multiplier. */
  readonly marketIndex: number;
  /** Participation ratio snapshotted at the start of the period. */
  readonly participationRatio: number;
  /** Active agents after this period's decisions. */
  readonly activeCount: number;
  /** Sum of value over active agents after this period's update. */
  readonly aggregateValue: number;
  /** Agents that re-entered this period. */
  readonly entered: number;
  /** Agents that exited this period. */
  readonly exited: number;
}

/** Values and summaries of the active and inactive groups at one point in time. */
export interface GroupReport {
  readonly activeValues: readonly number[];
  readonly inactiveValues: readonly number[];
  readonly active: ValueSummary;
  readonly inactive: ValueSummary;
}

/** Emitted after each scheduled interval. */
export interface IntervalReport extends GroupReport {
  /** 1-based number of the first period in the interval. */
  readonly startPeriod: number;
  /** 1-based number of the last period in the interval. */
  readonly endPeriod: number;
  readonly requestedPeriods: number;
  readonly simulatedPeriods: number;
  /** True when the request overshot the horizon and was clamped. */
  readonly adjusted: boolean;
  /** Market states traversed in this interval, in order. */
  readonly states: readonly MarketState[];
}

/** Final output of a run. */
export interface SimulationResult extends GroupReport {
  readonly horizon: number;
  readonly history: readonly PeriodRecord[];
  /** Aggregate active value per period, one point per history entry. */
  readonly valueSeries: readonly number[];
  readonly finalState: MarketState;
  readonly finalMarketIndex: number;
}

/** Run parameters supplied by the configuration layer. */
export interface RunConfig {
  /** Number of agents (positive integer). */
  readonly agentCount: number;
  /** Number of periods to simulate. Defaults to 20. */
  readonly horizon?: number;
  /** Interval sizes, each within [1, remaining], summing to the horizon. */
  readonly stepSchedule?: readonly number[];
  /** Market state before the first period. Defaults to 'flat'. */
  readonly startState?: MarketState;
  /** Starting value of every agent. Defaults to 1000. */
  readonly initialValue?: number;
  /** Seed for a reproducible run. */
  readonly seed?: number | string;
}

/** RunConfig with every default applied. */
export interface ResolvedRunConfig extends RunConfig {
  readonly horizon: number;
  readonly startState: MarketState;
  readonly initialValue: number;
}

/** Raw JSON file shape, identical to RunConfig. */
export type RunConfigFile = RunConfig;

/** Event names emitted by SimulationEngine with their payloads. */
export interface SimulationEvents {
  period: PeriodRecord;
  interval: IntervalReport;
  complete: SimulationResult;
}
