import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../src/args.js';

describe('parseCliArgs', () => {
  it('defaults to an interactive terminal run', () => {
    expect(parseCliArgs([])).toEqual({ batch: false, serve: false });
  });

  it('reads every flag', () => {
    expect(parseCliArgs(['--config', 'run.json', '--agents', '50', '--batch', '--serve', '--port', '8080'])).toEqual({
      configPath: 'run.json',
      agentCount: 50,
      batch: true,
      serve: true,
      port: 8080,
    });
  });

  it('accepts short flags', () => {
    expect(parseCliArgs(['-n', '3', '-c', 'a.json', '-p', '9000'])).toMatchObject({ agentCount: 3, configPath: 'a.json', port: 9000 });
  });

  it('rejects a non-numeric agent count', () => {
    expect(() => parseCliArgs(['--agents', 'many'])).toThrow('--agents must be a whole number of at least 1 (got "many")');
  });

  it('rejects a zero port', () => {
    expect(() => parseCliArgs(['--port', '0'])).toThrow(RangeError);
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(TypeError);
  });
});
