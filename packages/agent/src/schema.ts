import { Ajv } from 'ajv';
import type { ErrorObject } from 'ajv';
import { MARKET_STATES } from '@marketsim/core';
import { DEFAULT_HORIZON, DEFAULT_INITIAL_VALUE, DEFAULT_START_STATE, MAX_AGENT_COUNT, MAX_HORIZON } from './constants.js';
import type { RunConfig } from './types.js';

/** JSON Schema for run configuration files. */
const runConfigSchema = {
  type: 'object',
  required: ['agentCount'],
  additionalProperties: false,
  properties: {
    agentCount: { type: 'integer', minimum: 1, maximum: MAX_AGENT_COUNT },
    horizon: { type: 'integer', minimum: 1, maximum: MAX_HORIZON, default: DEFAULT_HORIZON },
    stepSchedule: {
      type: 'array',
      minItems: 1,
      items: { type: 'integer', minimum: 1 },
    },
    startState: { type: 'string', enum: [...MARKET_STATES], default: DEFAULT_START_STATE },
    initialValue: { type: 'number', exclusiveMinimum: 0, default: DEFAULT_INITIAL_VALUE },
    seed: { oneOf: [{ type: 'integer' }, { type: 'string', minLength: 1 }] },
  },
};

const ajv = new Ajv({ allErrors: true, useDefaults: true });
const validate = ajv.compile<RunConfig>(runConfigSchema);

/**
 * Transform an ajv instance path from JSON pointer to dot-notation.
 *
 * @param instancePath - JSON pointer string, e.g. `/stepSchedule/2`
 * @returns Dot-notation string, e.g. `stepSchedule[2]`
 */
function formatPath(instancePath: string): string {
  return instancePath
    .replace(/^\//, '')
    .replace(/\/(\d+)\//g, '[$1].')
    .replace(/\/(\d+)$/g, '[$1]')
    .replace(/\//g, '.');
}

/**
 * Transform ajv error objects into human-readable messages with instance paths.
 *
 * @param errors - Array of ajv ErrorObject entries
 * @returns Human-readable error strings pointing to the exact failing field
 */
export function formatValidationErrors(errors: ErrorObject[]): string[] {
  const messages = errors
    // oneOf reports one error per failed branch; the oneOf entry itself is enough.
    .filter((err) => !err.schemaPath.includes('/oneOf/'))
    .map((err) => {
      const path = formatPath(err.instancePath);

      switch (err.keyword) {
        case 'required': {
          const prefix = path ? `${path}.` : '';
          return `Missing required property: ${prefix}${String(err.params.missingProperty)}`;
        }
        case 'enum': {
          const allowed: unknown = err.params.allowedValues;
          return `${path} must be one of: ${Array.isArray(allowed) ? allowed.join(', ') : String(allowed)}`;
        }
        case 'minItems':
          return `${path} must have at least ${String(err.params.limit)} item(s)`;
        case 'minLength':
          return `${path} must not be empty`;
        case 'minimum':
          return `${path} must be >= ${String(err.params.limit)}`;
        case 'exclusiveMinimum':
          return `${path} must be > ${String(err.params.limit)}`;
        case 'maximum':
          return `${path} must be <= ${String(err.params.limit)}`;
        case 'type':
          return `${path} must be of type ${String(err.params.type)}`;
        case 'additionalProperties':
          return `${path ? `${path} ` : ''}has unknown property: ${String(err.params.additionalProperty)}`;
        case 'oneOf':
          return `${path} must be an integer or a non-empty string`;
        default:
          return `${path} ${err.message ?? 'is invalid'}`;
      }
    });
  return messages;
}

/**
 * Check that a step schedule walks the horizon exactly: every interval within
 * [1, remaining periods] and the total equal to the horizon.
 *
 * @param schedule - Interval sizes in order.
 * @param horizon - Number of periods in the run.
 * @returns Error messages; empty when the schedule is valid.
 */
export function validateStepSchedule(schedule: readonly number[], horizon: number): string[] {
  const errors: string[] = [];
  let consumed = 0;
  schedule.forEach((size, i) => {
    const remaining = horizon - consumed;
    if (!Number.isInteger(size) || size < 1 || size > remaining) {
      errors.push(`stepSchedule[${String(i)}] must be between 1 and ${String(remaining)} (periods remaining), got ${String(size)}`);
    }
    consumed += size;
  });
  if (consumed !== horizon) {
    errors.push(`stepSchedule must sum to horizon (${String(horizon)}), got ${String(consumed)}`);
  }
  return errors;
}

/**
 * Validate raw data against the run config JSON Schema, then check the step schedule.
 * Schema defaults (horizon, startState, initialValue) are written into `data`.
 *
 * @param data - Unknown data to validate (typically parsed JSON)
 * @returns Discriminated union: `{ valid: true, config }` or `{ valid: false, errors }`
 */
export function validateRunConfig(
  data: unknown,
): { valid: true; config: RunConfig } | { valid: false; errors: string[] } {
  if (!validate(data)) {
    return { valid: false, errors: formatValidationErrors(validate.errors ?? []) };
  }

  if (data.stepSchedule !== undefined) {
    const errors = validateStepSchedule(data.stepSchedule, data.horizon ?? DEFAULT_HORIZON);
    if (errors.length > 0) {
      return { valid: false, errors };
    }
  }

  return { valid: true, config: data };
}
