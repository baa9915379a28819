export { createServer, engineStatus, readStepPeriods } from './server.js';
export type { CreateServerOptions, ServerInstance, EngineStatus } from './server.js';
export { SseManager, SHUTDOWN_EVENT, formatSseEvent } from './sse.js';
export type { SseClient } from './sse.js';
export {
  attachReporter,
  formatGroupReport,
  formatMarketUpdate,
  formatAdjustment,
  formatIntervalReport,
  formatFinalSummary,
} from './report.js';
export type { LineWriter } from './report.js';
export { renderValueChart } from './plot.js';
export type { ChartOptions } from './plot.js';
export {
  createReadlinePrompter,
  parsePositiveInteger,
  askPositiveInteger,
  askAgentCount,
  askInterval,
} from './prompts.js';
export type { Prompter } from './prompts.js';
export { resolveConfig, runInTerminal, startDashboard } from './run.js';
export type { ConfigSource, TerminalRunOptions, DashboardOptions, DashboardHandle } from './run.js';
export { DEFAULT_PORT, SSE_HEARTBEAT_INTERVAL_MS, SSE_RETRY_MS, CHART_HEIGHT, DEFAULT_STEP_PERIODS } from './constants.js';
export { parseCliArgs } from './args.js';
export type { CliArgs } from './args.js';
