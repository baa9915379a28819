import { readFile } from 'node:fs/promises';
import { validateRunConfig } from './schema.js';
import { DEFAULT_HORIZON, DEFAULT_INITIAL_VALUE, DEFAULT_START_STATE } from './constants.js';
import type { ResolvedRunConfig, RunConfig } from './types.js';

/**
 * Apply defaults to a validated run config.
 *
 * @param config - Validated RunConfig (may have optional fields unset)
 * @returns A new config with horizon, startState and initialValue filled in
 */
export function applyDefaults(config: RunConfig): ResolvedRunConfig {
  return {
    ...config,
    horizon: config.horizon ?? DEFAULT_HORIZON,
    startState: config.startState ?? DEFAULT_START_STATE,
    initialValue: config.initialValue ?? DEFAULT_INITIAL_VALUE,
    stepSchedule: config.stepSchedule === undefined ? undefined : [...config.stepSchedule],
  };
}

/**
 * Validate an in-memory run config and apply defaults.
 *
 * @param data - Candidate config, e.g. assembled from CLI flags or prompts
 * @returns Resolved config
 * @throws Error listing every validation failure
 */
export function resolveRunConfig(data: unknown): ResolvedRunConfig {
  const result = validateRunConfig(data);
  if (!result.valid) {
    throw new Error(`Invalid run config:\n  - ${result.errors.join('\n  - ')}`);
  }
  return applyDefaults(result.config);
}

/**
 * Load a run configuration from a JSON file on disk.
 *
 * Reads the file, parses JSON, validates against the run config schema,
 * checks the step schedule and applies defaults for optional fields.
 *
 * @param filePath - Absolute or relative path to the JSON config file
 * @returns Parsed and validated config with defaults applied
 * @throws Error if the file cannot be read, contains invalid JSON, or fails validation
 */
export async function loadRunConfig(filePath: string): Promise<ResolvedRunConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read config file ${filePath}: ${message}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new SyntaxError(`Invalid JSON in config file ${filePath}: ${detail}`, { cause: err });
  }

  const result = validateRunConfig(data);

  if (!result.valid) {
    const errorList = result.errors.join('\n  - ');
    throw new Error(`Invalid run config in ${filePath}:\n  - ${errorList}`);
  }

  return applyDefaults(result.config);
}
