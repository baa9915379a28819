import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import http from 'node:http';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createSimulation, resolveRunConfig } from '@marketsim/agent';
import { resolveConfig, runInTerminal, startDashboard } from '../src/run.js';
import type { Prompter } from '../src/prompts.js';

/** Prompter that answers from a fixed script and records the questions asked. */
class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: string[]) {}

  ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    return answer === undefined ? Promise.reject(new Error('No scripted answer left')) : Promise.resolve(answer);
  }

  close(): void {}
}

let tmpDir: string;

beforeEach(async () => {
  tmpDir = join(tmpdir(), `marketsim-run-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await mkdir(tmpDir, { recursive: true });
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('resolveConfig', () => {
  it('loads a file and takes the seed from SIM_SEED when the file has none', async () => {
    const configPath = join(tmpDir, 'run.json');
    await writeFile(configPath, JSON.stringify({ agentCount: 5, horizon: 4, stepSchedule: [2, 2] }), 'utf-8');

    const config = await resolveConfig({ configPath, env: { SIM_SEED: '9' } });

    expect(config).toMatchObject({ agentCount: 5, horizon: 4, stepSchedule: [2, 2], seed: 9 });
  });

  it('keeps the seed written in the file', async () => {
    const configPath = join(tmpDir, 'seeded.json');
    await writeFile(configPath, JSON.stringify({ agentCount: 5, seed: 'file-seed' }), 'utf-8');

    const config = await resolveConfig({ configPath, env: { SIM_SEED: '9' } });

    expect(config.seed).toBe('file-seed');
  });

  it('builds a config from an agent count', async () => {
    await expect(resolveConfig({ agentCount: 3, env: {} })).resolves.toEqual({
      agentCount: 3,
      horizon: 20,
      startState: 'flat',
      initialValue: 1000,
    });
  });

  it('prompts for the agent count when none is given', async () => {
    const prompter = new ScriptedPrompter(['lots', '4']);
    const lines: string[] = [];

    const config = await resolveConfig({ prompter, env: {}, write: (line) => lines.push(line) });

    expect(config.agentCount).toBe(4);
    expect(lines).toEqual(['"lots" is not a whole number of at least 1. Please try again.']);
  });

  it('fails without any source', async () => {
    await expect(resolveConfig({ env: {} })).rejects.toThrow('No agent count given');
  });
});

describe('runInTerminal', () => {
  it('runs the configured schedule in batch mode', async () => {
    const config = resolveRunConfig({ agentCount: 8, horizon: 4, stepSchedule: [2, 2], seed: 'batch' });
    const engine = createSimulation(config);
    const lines: string[] = [];

    const result = await runInTerminal(engine, config, { batch: true, write: (line) => lines.push(line) });

    expect(result.history).toHaveLength(4);
    expect(lines.filter((l) => l === 'Market update for this interval:')).toHaveLength(2);
    expect(lines.filter((l) => l === '==== FINAL SUMMARY ====')).toHaveLength(1);
  });

  it('asks for each interval and reports the clamp', async () => {
    const config = resolveRunConfig({ agentCount: 8, horizon: 5, seed: 'interactive' });
    const engine = createSimulation(config);
    const prompter = new ScriptedPrompter(['2', 'abc', '9']);
    const lines: string[] = [];

    const result = await runInTerminal(engine, config, { prompter, write: (line) => lines.push(line) });

    expect(result.history).toHaveLength(5);
    expect(prompter.questions).toEqual([
      'Enter number of years to simulate before update (1-5): ',
      'Enter number of years to simulate before update (1-5): ',
      'Enter number of years to simulate before update (1-5): ',
    ]);
    expect(lines).toContain('Year 0 - 1 Simulation');
    expect(lines).toContain('Year 2 - 3 Simulation');
    expect(lines).toContain('"abc" is not a whole number of at least 1. Please try again.');
    expect(lines).toContain('Adjusting to 3 year(s) to stay within 5-year limit.');
  });

  it('ignores the prompter when the config has a schedule', async () => {
    const config = resolveRunConfig({ agentCount: 2, horizon: 3, stepSchedule: [3], seed: 1 });
    const prompter = new ScriptedPrompter([]);

    await runInTerminal(createSimulation(config), config, { prompter, write: () => {} });

    expect(prompter.questions).toEqual([]);
  });

  it('detaches the reporter afterwards', async () => {
    const config = resolveRunConfig({ agentCount: 2, horizon: 2, seed: 2 });
    const engine = createSimulation(config);

    await runInTerminal(engine, config, { batch: true, write: () => {} });

    expect(engine.listenerCount('interval')).toBe(0);
    expect(engine.listenerCount('complete')).toBe(0);
  });
});

describe('startDashboard', () => {
  it('listens and prints the URL', async () => {
    const engine = createSimulation(resolveRunConfig({ agentCount: 2, seed: 3 }));
    const lines: string[] = [];

    const dashboard = await startDashboard(engine, { port: 0, write: (line) => lines.push(line) });
    await dashboard.close();

    expect(dashboard.port).toBeGreaterThan(0);
    expect(lines).toEqual([`📊 Dashboard running at http://localhost:${String(dashboard.port)}`, '   Press Ctrl+C to stop']);
    expect(dashboard.server.listening).toBe(false);
  });

  it('closes while an event stream is connected', async () => {
    const engine = createSimulation(resolveRunConfig({ agentCount: 2, seed: 4 }));
    const dashboard = await startDashboard(engine, { port: 0, write: () => {} });

    const chunks: string[] = [];
    const streamClosed = new Promise<void>((resolve) => {
      const req = http.get({ hostname: '127.0.0.1', port: dashboard.port, path: '/events' }, (res) => {
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => chunks.push(chunk));
        // the socket is dropped right after the stream ends, which may surface as a reset
        res.on('error', () => resolve());
        res.on('close', () => resolve());
      });
      req.on('error', () => resolve());
    });
    await new Promise<void>((resolve) => {
      const wait = (): void => {
        if (chunks.join('').includes('retry:')) resolve();
        else setTimeout(wait, 10);
      };
      wait();
    });

    await dashboard.close();
    await streamClosed;

    expect(dashboard.server.listening).toBe(false);
  });

  it('returns the same promise when closed twice', async () => {
    const engine = createSimulation(resolveRunConfig({ agentCount: 2, seed: 5 }));
    const dashboard = await startDashboard(engine, { port: 0, write: () => {} });

    const first = dashboard.close();
    expect(dashboard.close()).toBe(first);
    await first;
  });
});
