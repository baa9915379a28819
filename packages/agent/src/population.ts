import { PERSONALITIES, mathRandomSource, uniformChoice } from '@marketsim/core';
import type { MarketTables, RandomSource } from '@marketsim/core';
import { Agent } from './agent.js';
import { DEFAULT_INITIAL_VALUE } from './constants.js';

/** Options for generating a population. */
export interface PopulationOptions {
  readonly count: number;
  readonly tables: MarketTables;
  /** Shared by personality assignment and every agent's decisions. */
  readonly random?: RandomSource;
  readonly initialValue?: number;
}

/**
 * Create `count` agents with uniformly random personalities, ids 1..count,
 * all active and holding the same starting value.
 *
 * @param options - Population size, tables and random source.
 * @returns New agents in id order.
 * @throws RangeError if count is not a positive integer.
 */
export function generateAgents(options: PopulationOptions): Agent[] {
  const { count, tables } = options;
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Agent count must be a positive integer (got ${String(count)})`);
  }
  const random = options.random ?? mathRandomSource;
  const initialValue = options.initialValue ?? DEFAULT_INITIAL_VALUE;

  const agents: Agent[] = [];
  for (let i = 1; i <= count; i++) {
    agents.push(new Agent({
      agentId: i,
      personality: uniformChoice(PERSONALITIES, random),
      profiles: tables.personalities,
      multipliers: tables.multipliers,
      random,
      initialValue,
    }));
  }
  return agents;
}
