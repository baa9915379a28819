import { createInterface } from 'node:readline/promises';
import type { LineWriter } from './report.js';

/** Asks the user a question and resolves with the raw answer. */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompter backed by node:readline on the given streams.
 * A question still pending when the input closes rejects.
 *
 * @param input - Defaults to stdin.
 * @param output - Defaults to stdout.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  const controller = new AbortController();
  rl.on('close', () => controller.abort());

  return {
    ask: (question) => rl.question(question, { signal: controller.signal }),
    close: () => rl.close(),
  };
}

/**
 * Parse a whole number of at least 1, ignoring surrounding whitespace.
 *
 * @param raw - Text typed by the user.
 * @returns The number, or null when the text is not a positive integer.
 */
export function parsePositiveInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value >= 1 ? value : null;
}

/**
 * Ask until the answer is a positive integer.
 *
 * @param prompter - Question source.
 * @param question - Prompt text.
 * @param write - Where to print the retry notice.
 * @returns The first valid answer.
 */
export async function askPositiveInteger(prompter: Prompter, question: string, write: LineWriter = console.log): Promise<number> {
  for (;;) {
    const answer = await prompter.ask(question);
    const value = parsePositiveInteger(answer);
    if (value !== null) return value;
    write(`"${answer.trim()}" is not a whole number of at least 1. Please try again.`);
  }
}

/**
 * Ask for the population size.
 *
 * @param prompter - Question source.
 * @param write - Where to print the retry notice.
 */
export function askAgentCount(prompter: Prompter, write: LineWriter = console.log): Promise<number> {
  return askPositiveInteger(prompter, 'Enter number of people in the simulation: ', write);
}

/**
 * Ask how many periods to run before the next report. Answers past the
 * horizon are accepted; the engine clamps them and the reporter says so.
 *
 * @param prompter - Question source.
 * @param horizon - Total periods in the run.
 * @param write - Where to print the retry notice.
 */
export function askInterval(prompter: Prompter, horizon: number, write: LineWriter = console.log): Promise<number> {
  return askPositiveInteger(prompter, `Enter number of years to simulate before update (1-${String(horizon)}): `, write);
}
