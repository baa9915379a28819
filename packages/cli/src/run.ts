import type { Server } from 'node:http';
import { loadSeed } from '@marketsim/core';
import { createSimulation, loadRunConfig, resolveRunConfig } from '@marketsim/agent';
import type { ResolvedRunConfig, SimulationEngine, SimulationResult } from '@marketsim/agent';
import { createServer } from './server.js';
import { attachReporter } from './report.js';
import type { LineWriter } from './report.js';
import { askAgentCount, askInterval } from './prompts.js';
import type { Prompter } from './prompts.js';

/** Where the run configuration comes from. */
export interface ConfigSource {
  /** JSON run config file. Takes precedence over agentCount. */
  readonly configPath?: string;
  /** Population size when no file is given. */
  readonly agentCount?: number;
  /** Used when neither a file nor agentCount is given. */
  readonly prompter?: Prompter;
  /** Environment read for SIM_SEED. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv;
  readonly write?: LineWriter;
}

/** Options for a terminal run. */
export interface TerminalRunOptions {
  /** Run the configured schedule without prompting for intervals. */
  readonly batch?: boolean;
  /** Required unless batch is set or the config has a step schedule. */
  readonly prompter?: Prompter;
  readonly write?: LineWriter;
}

/** Options for starting the dashboard. */
export interface DashboardOptions {
  readonly port?: number;
  readonly write?: LineWriter;
}

/**
 * Build the run configuration from a file, a flag or a prompt. A seed from
 * SIM_SEED applies when the file does not set one.
 *
 * @param source - File path, agent count or prompter.
 * @returns Resolved run config.
 * @throws Error if no source is given or the config is invalid.
 */
export async function resolveConfig(source: ConfigSource): Promise<ResolvedRunConfig> {
  const envSeed = loadSeed(source.env);

  if (source.configPath !== undefined) {
    const config = await loadRunConfig(source.configPath);
    return { ...config, seed: config.seed ?? envSeed };
  }

  let agentCount = source.agentCount;
  if (agentCount === undefined) {
    if (source.prompter === undefined) {
      throw new Error('No agent count given. To fix: pass --agents <n> or --config <file>');
    }
    agentCount = await askAgentCount(source.prompter, source.write);
  }

  return resolveRunConfig(envSeed === undefined ? { agentCount } : { agentCount, seed: envSeed });
}

/**
 * Run a simulation to completion in the terminal, printing a report after
 * each interval and a final summary with the value chart.
 *
 * @param engine - Fresh engine.
 * @param config - Config the engine was built from.
 * @param options - Batch flag, prompter and line sink.
 * @returns The final result.
 */
export async function runInTerminal(
  engine: SimulationEngine,
  config: ResolvedRunConfig,
  options: TerminalRunOptions = {},
): Promise<SimulationResult> {
  const write = options.write ?? console.log;
  const detach = attachReporter(engine, write);

  try {
    const prompter = options.prompter;
    if (options.batch === true || config.stepSchedule !== undefined || prompter === undefined) {
      return engine.runSchedule(config.stepSchedule);
    }

    while (!engine.isComplete) {
      write('');
      write(`Year ${String(engine.period)} - ${String(engine.period + 1)} Simulation`);
      const interval = await askInterval(prompter, engine.horizon, write);
      engine.runInterval(interval);
    }
    return engine.finish();
  } finally {
    detach();
  }
}

/** A listening dashboard and the means to stop it. */
export interface DashboardHandle {
  readonly server: Server;
  readonly port: number;
  /** End SSE streams, drop open sockets and resolve once the server has closed. */
  close(): Promise<void>;
}

/**
 * Serve the dashboard for an engine and resolve once it is listening.
 * Intervals are driven from the browser through POST /api/step.
 *
 * @param engine - Engine to expose.
 * @param options - Port and line sink.
 * @returns The listening server with its bound port and a close helper.
 */
export async function startDashboard(engine: SimulationEngine, options: DashboardOptions = {}): Promise<DashboardHandle> {
  const write = options.write ?? console.log;
  const { app, sseManager, port } = createServer({ engine, port: options.port });

  const server = await new Promise<Server>((resolve, reject) => {
    const srv = app.listen(port, (err?: Error) => {
      if (err) reject(err);
      else resolve(srv);
    });
  });

  const address = server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  write(`📊 Dashboard running at http://localhost:${String(boundPort)}`);
  write('   Press Ctrl+C to stop');

  server.on('close', () => sseManager.closeAll());

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      sseManager.closeAll();
      server.closeAllConnections();
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    return closing;
  };

  return { server, port: boundPort, close };
}
