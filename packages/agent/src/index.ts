export { validateRunConfig, validateStepSchedule, formatValidationErrors } from './schema.js';
export { loadRunConfig, resolveRunConfig, applyDefaults } from './config-loader.js';
export { Agent } from './agent.js';
export type { AgentOptions } from './agent.js';
export { generateAgents } from './population.js';
export type { PopulationOptions } from './population.js';
export { SimulationEngine } from './engine.js';
export type { SimulationEngineOptions } from './engine.js';
export { createSimulation } from './simulation.js';
export type { CreateSimulationOptions } from './simulation.js';
export type {
  AgentSnapshot,
  ParticipationStatus,
  ParticipationDecision,
  PeriodRecord,
  GroupReport,
  IntervalReport,
  SimulationResult,
  SimulationEvents,
  RunConfig,
  RunConfigFile,
  ResolvedRunConfig,
} from './types.js';
export { DEFAULT_HORIZON, DEFAULT_INITIAL_VALUE, DEFAULT_START_STATE, INITIAL_MARKET_INDEX } from './constants.js';
