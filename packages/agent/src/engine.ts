import { EventEmitter } from 'node:events';
import { summarizeValues } from '@marketsim/core';
import type { MarketModel, MarketState } from '@marketsim/core';
import type { Agent } from './agent.js';
import { DEFAULT_HORIZON, DEFAULT_START_STATE, INITIAL_MARKET_INDEX } from './constants.js';
import type { AgentSnapshot, GroupReport, IntervalReport, PeriodRecord, SimulationEvents, SimulationResult } from './types.js';

/** Options for constructing a SimulationEngine. */
export interface SimulationEngineOptions {
  readonly agents: readonly Agent[];
  readonly market: MarketModel;
  /** Number of periods to simulate. Defaults to 20. */
  readonly horizon?: number;
  /** Market state before the first period. Defaults to 'flat'. */
  readonly startState?: MarketState;
}

/**
 * Drives the period loop that couples the market to the agent population.
 *
 * Per period: snapshot participation, draw the next market state, advance the
 * market index, let every agent decide and update, then record the period.
 * Emits `period`, `interval` and `complete` events for reporters and plotters.
 *
 * @param options - Agents, market model, horizon and starting state.
 */
export class SimulationEngine extends EventEmitter {
  private readonly agents: readonly Agent[];
  private readonly market: MarketModel;
  private readonly totalPeriods: number;
  private readonly history: PeriodRecord[] = [];
  private state: MarketState;
  private index = INITIAL_MARKET_INDEX;
  private completed: SimulationResult | null = null;

  constructor(options: SimulationEngineOptions) {
    super();
    const horizon = options.horizon ?? DEFAULT_HORIZON;
    if (options.agents.length === 0) {
      throw new RangeError('SimulationEngine needs at least one agent');
    }
    if (!Number.isInteger(horizon) || horizon < 1) {
      throw new RangeError(`horizon must be a positive integer (got ${String(horizon)})`);
    }
    this.agents = [...options.agents];
    this.market = options.market;
    this.totalPeriods = horizon;
    this.state = options.startState ?? DEFAULT_START_STATE;
  }

  /** Number of periods simulated so far. */
  get period(): number {
    return this.history.length;
  }

  /** Configured number of periods. */
  get horizon(): number {
    return this.totalPeriods;
  }

  /** Periods left before the horizon. */
  get remainingPeriods(): number {
    return this.totalPeriods - this.history.length;
  }

  /** True once every period up to the horizon has been recorded. */
  get isComplete(): boolean {
    return this.history.length >= this.totalPeriods;
  }

  /** Market state of the latest period (the start state before the first). */
  get currentState(): MarketState {
    return this.state;
  }

  /** Cumulative product of value multipliers so far. */
  get marketIndex(): number {
    return this.index;
  }

  /**
   * Fraction of agents currently active.
   *
   * @returns Active count divided by population size.
   */
  participationRatio(): number {
    let active = 0;
    for (const agent of this.agents) {
      if (agent.isActive) active++;
    }
    return active / this.agents.length;
  }

  /**
   * Simulate one period.
   *
   * @returns The recorded period.
   * @throws Error if the horizon has already been reached.
   */
  step(): PeriodRecord {
    if (this.isComplete) {
      throw new Error(`Simulation horizon reached (${String(this.totalPeriods)} periods)`);
    }

    // Snapshot before any agent moves; decisions below must not feed back into this period's draw.
    const participationRatio = this.participationRatio();
    const nextState = this.market.transition(this.state, participationRatio);
    this.state = nextState;
    this.index *= this.market.valueMultiplier(nextState);

    let entered = 0;
    let exited = 0;
    let activeCount = 0;
    let aggregateValue = 0;
    for (const agent of this.agents) {
      const decision = agent.decide(nextState, this.index);
      agent.updateValue(nextState);
      if (decision.from !== decision.to) {
        if (decision.to === 'active') entered++;
        else exited++;
      }
      if (agent.isActive) {
        activeCount++;
        aggregateValue += agent.currentValue;
      }
    }

    const record: PeriodRecord = Object.freeze({
      period: this.history.length + 1,
      state: nextState,
      marketIndex: this.index,
      participationRatio,
      activeCount,
      aggregateValue,
      entered,
      exited,
    });
    this.history.push(record);
    this.emitEvent('period', record);
    return record;
  }

  /**
   * Simulate up to `requested` periods, clamped to the remaining horizon.
   *
   * @param requested - Interval size asked for by the caller.
   * @returns Report with the states traversed, both agent groups and whether the interval was clamped.
   * @throws RangeError if `requested` is not a positive integer.
   * @throws Error if the horizon has already been reached.
   */
  runInterval(requested: number): IntervalReport {
    if (!Number.isInteger(requested) || requested < 1) {
      throw new RangeError(`Interval must be a positive integer (got ${String(requested)})`);
    }
    if (this.isComplete) {
      throw new Error(`Simulation horizon reached (${String(this.totalPeriods)} periods)`);
    }

    const simulatedPeriods = Math.min(requested, this.remainingPeriods);
    const startPeriod = this.period + 1;
    const states: MarketState[] = [];
    for (let i = 0; i < simulatedPeriods; i++) {
      states.push(this.step().state);
    }

    const report: IntervalReport = Object.freeze({
      startPeriod,
      endPeriod: this.period,
      requestedPeriods: requested,
      simulatedPeriods,
      adjusted: simulatedPeriods !== requested,
      states: Object.freeze(states),
      ...this.groupReport(),
    });
    this.emitEvent('interval', report);
    return report;
  }

  /**
   * Run a whole schedule of intervals, then finish.
   * Entries past the horizon are ignored; periods the schedule leaves over run as one final interval.
   *
   * @param schedule - Interval sizes. Without one, the remaining horizon runs as a single interval.
   * @returns The final result.
   */
  runSchedule(schedule?: readonly number[]): SimulationResult {
    for (const size of schedule ?? []) {
      if (this.isComplete) break;
      this.runInterval(size);
    }
    if (!this.isComplete) {
      this.runInterval(this.remainingPeriods);
    }
    return this.finish();
  }

  /**
   * Build the final result and emit `complete`. Calling again returns the same result.
   *
   * @returns Final groups, history and value series.
   * @throws Error if periods remain before the horizon.
   */
  finish(): SimulationResult {
    if (this.completed !== null) {
      return this.completed;
    }
    if (!this.isComplete) {
      throw new Error(`Cannot finish: ${String(this.remainingPeriods)} period(s) remain before the horizon`);
    }

    const result: SimulationResult = Object.freeze({
      horizon: this.totalPeriods,
      history: this.getHistory(),
      valueSeries: this.getValueSeries(),
      finalState: this.state,
      finalMarketIndex: this.index,
      ...this.groupReport(),
    });
    this.completed = result;
    this.emitEvent('complete', result);
    return result;
  }

  /**
   * Return the recorded periods.
   *
   * @returns Frozen copy of the history.
   */
  getHistory(): readonly PeriodRecord[] {
    return Object.freeze([...this.history]);
  }

  /**
   * Aggregate active value per period, for plotting.
   *
   * @returns One point per recorded period.
   */
  getValueSeries(): readonly number[] {
    return Object.freeze(this.history.map((record) => record.aggregateValue));
  }

  /**
   * Return snapshots of every agent.
   *
   * @returns Frozen AgentSnapshot list in population order.
   */
  getAgents(): readonly AgentSnapshot[] {
    return Object.freeze(this.agents.map((agent) => agent.getSnapshot()));
  }

  private groupReport(): GroupReport {
    const activeValues: number[] = [];
    const inactiveValues: number[] = [];
    for (const agent of this.agents) {
      (agent.isActive ? activeValues : inactiveValues).push(agent.currentValue);
    }
    return {
      activeValues: Object.freeze(activeValues),
      inactiveValues: Object.freeze(inactiveValues),
      active: summarizeValues(activeValues),
      inactive: summarizeValues(inactiveValues),
    };
  }

  private emitEvent<K extends keyof SimulationEvents>(event: K, payload: SimulationEvents[K]): void {
    this.emit(event, payload);
  }
}
