import { parseArgs } from 'node:util';
import { parsePositiveInteger } from './prompts.js';

/** Parsed command-line flags. */
export interface CliArgs {
  readonly configPath?: string;
  readonly agentCount?: number;
  readonly batch: boolean;
  readonly serve: boolean;
  readonly port?: number;
}

function positiveFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = parsePositiveInteger(raw);
  if (value === null) {
    throw new RangeError(`--${name} must be a whole number of at least 1 (got "${raw}")`);
  }
  return value;
}

/**
 * Parse command-line flags.
 *
 * @param argv - Arguments after the script name.
 * @returns Parsed flags.
 * @throws RangeError for a non-numeric --agents or --port, TypeError for unknown flags.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      config: { type: 'string', short: 'c' },
      agents: { type: 'string', short: 'n' },
      batch: { type: 'boolean', default: false },
      serve: { type: 'boolean', default: false },
      port: { type: 'string', short: 'p' },
    },
    strict: true,
  });

  return {
    configPath: values.config,
    agentCount: positiveFlag('agents', values.agents),
    batch: values.batch === true,
    serve: values.serve === true,
    port: positiveFlag('port', values.port),
  };
}
