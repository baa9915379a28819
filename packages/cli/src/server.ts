import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { MarketState } from '@marketsim/core';
import type { IntervalReport, PeriodRecord, SimulationEngine, SimulationResult } from '@marketsim/agent';
import { SseManager } from './sse.js';
import { DEFAULT_PORT, DEFAULT_STEP_PERIODS, SSE_RETRY_MS } from './constants.js';

/** Options for creating the dashboard server. */
export interface CreateServerOptions {
  /** The engine whose events are streamed and which POST /api/step advances. */
  readonly engine: SimulationEngine;
  /** Port to listen on. Defaults to PORT env var or 3000. */
  readonly port?: number;
}

/** Return value from createServer containing the Express app and SSE manager. */
export interface ServerInstance {
  /** The configured Express application. */
  readonly app: ReturnType<typeof express>;
  /** The SSE connection manager. */
  readonly sseManager: SseManager;
  /** The resolved port number. */
  readonly port: number;
}

/** Body of GET /api/status. */
export interface EngineStatus {
  readonly period: number;
  readonly horizon: number;
  readonly remainingPeriods: number;
  readonly isComplete: boolean;
  readonly currentState: MarketState;
  readonly marketIndex: number;
  readonly participationRatio: number;
}

/**
 * Read the engine's position for the status endpoint.
 *
 * @param engine - Engine to inspect.
 * @returns Plain status object.
 */
export function engineStatus(engine: SimulationEngine): EngineStatus {
  return {
    period: engine.period,
    horizon: engine.horizon,
    remainingPeriods: engine.remainingPeriods,
    isComplete: engine.isComplete,
    currentState: engine.currentState,
    marketIndex: engine.marketIndex,
    participationRatio: engine.participationRatio(),
  };
}

/**
 * Read `periods` from a POST /api/step body. A missing body or field means one period.
 *
 * @param body - Parsed JSON body, if any.
 * @returns Requested period count.
 * @throws RangeError when `periods` is present but not a number.
 */
export function readStepPeriods(body: unknown): number {
  if (typeof body !== 'object' || body === null || !('periods' in body) || body.periods === undefined) {
    return DEFAULT_STEP_PERIODS;
  }
  if (typeof body.periods !== 'number') {
    throw new RangeError('periods must be a positive integer');
  }
  return body.periods;
}

function statusCodeOf(err: Error): number {
  if (err instanceof RangeError) return 400;
  // body-parser attaches the HTTP status to malformed-request errors
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

/**
 * Create an Express 5 server wired to a SimulationEngine for SSE broadcasting.
 *
 * @param options - Server configuration with engine and optional port.
 * @returns The Express app, SSE manager, and resolved port.
 */
export function createServer(options: CreateServerOptions): ServerInstance {
  const { engine, port = Number(process.env['PORT']) || DEFAULT_PORT } = options;

  const app = express();
  const sseManager = new SseManager();

  app.use(express.json());

  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  app.use(express.static(path.join(__dirname, '..', 'public')));

  app.get('/events', (_req: Request, res: Response) => {
    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    res.write(`retry: ${SSE_RETRY_MS}\n\n`);

    sseManager.addClient(res);
  });

  // --- Engine event → SSE broadcast wiring ---

  engine.on('period', (record: PeriodRecord) => {
    sseManager.broadcast('period', { type: 'period', timestamp: Date.now(), ...record });
  });

  engine.on('interval', (report: IntervalReport) => {
    sseManager.broadcast('interval', { type: 'interval', timestamp: Date.now(), ...report });
  });

  engine.on('complete', (result: SimulationResult) => {
    sseManager.broadcast('complete', {
      type: 'complete',
      timestamp: Date.now(),
      horizon: result.horizon,
      finalState: result.finalState,
      finalMarketIndex: result.finalMarketIndex,
      active: result.active,
      inactive: result.inactive,
    });
  });

  // --- REST endpoints ---

  app.get('/api/status', (_req: Request, res: Response) => {
    res.status(200).json(engineStatus(engine));
  });

  app.get('/api/history', (_req: Request, res: Response) => {
    res.status(200).json({ history: engine.getHistory(), series: engine.getValueSeries() });
  });

  app.post('/api/step', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const periods = readStepPeriods(body);
    if (engine.isComplete) {
      res.status(409).json({ error: `Simulation horizon reached (${String(engine.horizon)} periods)` });
      return;
    }
    const report = engine.runInterval(periods);
    if (engine.isComplete) {
      engine.finish();
    }
    res.status(200).json({ report, status: engineStatus(engine), clients: sseManager.getClientCount() });
  });

  // Express 5 recognises an error handler by its four parameters
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    res.status(statusCodeOf(err)).json({ error: err.message });
  });

  return { app, sseManager, port };
}
