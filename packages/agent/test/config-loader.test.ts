import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { loadRunConfig, resolveRunConfig, applyDefaults } from '../src/config-loader.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = join(tmpdir(), `marketsim-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await mkdir(tmpDir, { recursive: true });
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

/** Write a JSON config to a temp file and return the path. */
async function writeConfig(filename: string, data: unknown): Promise<string> {
  const filePath = join(tmpDir, filename);
  await writeFile(filePath, JSON.stringify(data), 'utf-8');
  return filePath;
}

describe('loadRunConfig', () => {
  it('loads a valid file and applies defaults', async () => {
    const filePath = await writeConfig('valid.json', { agentCount: 10, seed: 'test-seed' });
    const config = await loadRunConfig(filePath);
    expect(config).toEqual({
      agentCount: 10,
      horizon: 20,
      startState: 'flat',
      initialValue: 1000,
      seed: 'test-seed',
      stepSchedule: undefined,
    });
  });

  it('loads the bundled reference run', async () => {
    const filePath = fileURLToPath(new URL('../../../examples/config/reference-run.json', import.meta.url));
    const config = await loadRunConfig(filePath);
    expect(config).toEqual({
      agentCount: 100,
      horizon: 20,
      stepSchedule: [5, 5, 10],
      startState: 'flat',
      initialValue: 1000,
      seed: 42,
    });
  });

  it('keeps an explicit step schedule', async () => {
    const filePath = await writeConfig('schedule.json', { agentCount: 10, horizon: 6, stepSchedule: [1, 2, 3] });
    const config = await loadRunConfig(filePath);
    expect(config.horizon).toBe(6);
    expect(config.stepSchedule).toEqual([1, 2, 3]);
  });

  it('throws when the file does not exist', async () => {
    await expect(loadRunConfig(join(tmpDir, 'missing.json'))).rejects.toThrow('Cannot read config file');
  });

  it('throws a SyntaxError for malformed JSON', async () => {
    const filePath = join(tmpDir, 'broken.json');
    await writeFile(filePath, '{ "agentCount": ', 'utf-8');
    await expect(loadRunConfig(filePath)).rejects.toThrow(SyntaxError);
    await expect(loadRunConfig(filePath)).rejects.toThrow(`Invalid JSON in config file ${filePath}`);
  });

  it('lists every validation error with the file path', async () => {
    const filePath = await writeConfig('invalid.json', { agentCount: 0, startState: 'sideways' });
    await expect(loadRunConfig(filePath)).rejects.toThrow(
      `Invalid run config in ${filePath}:\n  - agentCount must be >= 1\n  - startState must be one of: up, down, flat, crash, boom`,
    );
  });
});

describe('resolveRunConfig', () => {
  it('resolves an in-memory config', () => {
    expect(resolveRunConfig({ agentCount: 4, horizon: 8 })).toMatchObject({ agentCount: 4, horizon: 8, startState: 'flat' });
  });

  it('throws with a bulleted error list', () => {
    expect(() => resolveRunConfig({ agentCount: 4, stepSchedule: [5] })).toThrow(
      'Invalid run config:\n  - stepSchedule must sum to horizon (20), got 5',
    );
  });
});

describe('applyDefaults', () => {
  it('copies the step schedule', () => {
    const schedule = [10, 10];
    const resolved = applyDefaults({ agentCount: 1, stepSchedule: schedule });
    schedule.push(1);
    expect(resolved.stepSchedule).toEqual([10, 10]);
  });

  it('keeps explicit values', () => {
    expect(applyDefaults({ agentCount: 1, horizon: 3, startState: 'boom', initialValue: 5 })).toMatchObject({
      horizon: 3,
      startState: 'boom',
      initialValue: 5,
    });
  });
});
