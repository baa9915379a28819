import { MarketModel, SeededRandom, createDefaultTables, mathRandomSource } from '@marketsim/core';
import type { MarketTables, RandomSource } from '@marketsim/core';
import { SimulationEngine } from './engine.js';
import { generateAgents } from './population.js';
import type { ResolvedRunConfig } from './types.js';

/** Optional collaborators for createSimulation. */
export interface CreateSimulationOptions {
  /** Constant tables. Defaults to createDefaultTables(). */
  readonly tables?: MarketTables;
  /** Overrides the seed in the config. */
  readonly random?: RandomSource;
}

/**
 * Wire a complete run from a resolved config: tables, one shared random
 * source, the market model, a generated population and the engine.
 *
 * @param config - Resolved run config.
 * @param options - Optional tables and random source.
 * @returns A SimulationEngine ready to step.
 *
 * @example
 * ```typescript
 * const config = resolveRunConfig({ agentCount: 100, seed: 7 });
 * const result = createSimulation(config).runSchedule(config.stepSchedule);
 * ```
 */
export function createSimulation(config: ResolvedRunConfig, options: CreateSimulationOptions = {}): SimulationEngine {
  const tables = options.tables ?? createDefaultTables();
  const random = options.random ?? (config.seed === undefined ? mathRandomSource : new SeededRandom(config.seed));

  const market = new MarketModel({
    transitions: tables.transitions,
    multipliers: tables.multipliers,
    random,
  });
  const agents = generateAgents({
    count: config.agentCount,
    tables,
    random,
    initialValue: config.initialValue,
  });

  return new SimulationEngine({
    agents,
    market,
    horizon: config.horizon,
    startState: config.startState,
  });
}
