import type { MarketState } from '@marketsim/core';

/** Number of periods (years) in the reference run. */
export const DEFAULT_HORIZON = 20;

/** Every agent starts with this value. */
export const DEFAULT_INITIAL_VALUE = 1000;

/** Market state before the first period. */
export const DEFAULT_START_STATE: MarketState = 'flat';

/** Market index at the start of a run. */
export const INITIAL_MARKET_INDEX = 1.0;

/** Upper bound on agents accepted from a config file. */
export const MAX_AGENT_COUNT = 1_000_000;

/** Upper bound on the horizon accepted from a config file. */
export const MAX_HORIZON = 10_000;
