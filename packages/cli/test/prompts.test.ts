import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import {
  askAgentCount,
  askInterval,
  askPositiveInteger,
  createReadlinePrompter,
  parsePositiveInteger,
} from '../src/prompts.js';
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

describe('parsePositiveInteger', () => {
  it.each([
    ['7', 7],
    [' 12 ', 12],
    ['0', null],
    ['-3', null],
    ['2.5', null],
    ['', null],
    ['ten', null],
    ['99999999999999999999', null],
  ])('parses %j as %j', (raw, expected) => {
    expect(parsePositiveInteger(raw)).toBe(expected);
  });
});

describe('askPositiveInteger', () => {
  it('re-asks until the answer is valid', async () => {
    const prompter = new ScriptedPrompter(['abc', '0', ' 7 ']);
    const write = vi.fn();

    const value = await askPositiveInteger(prompter, 'How many? ', write);

    expect(value).toBe(7);
    expect(prompter.questions).toEqual(['How many? ', 'How many? ', 'How many? ']);
    expect(write.mock.calls).toEqual([
      ['"abc" is not a whole number of at least 1. Please try again.'],
      ['"0" is not a whole number of at least 1. Please try again.'],
    ]);
  });

  it('propagates a failing prompter', async () => {
    await expect(askPositiveInteger(new ScriptedPrompter([]), 'Q? ', vi.fn())).rejects.toThrow('No scripted answer left');
  });
});

describe('askAgentCount / askInterval', () => {
  it('asks for the number of people', async () => {
    const prompter = new ScriptedPrompter(['100']);
    await expect(askAgentCount(prompter, vi.fn())).resolves.toBe(100);
    expect(prompter.questions).toEqual(['Enter number of people in the simulation: ']);
  });

  it('names the horizon in the interval question and accepts overshoots', async () => {
    const prompter = new ScriptedPrompter(['30']);
    await expect(askInterval(prompter, 20, vi.fn())).resolves.toBe(30);
    expect(prompter.questions).toEqual(['Enter number of years to simulate before update (1-20): ']);
  });
});

describe('createReadlinePrompter', () => {
  it('resolves with the typed line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createReadlinePrompter(input, output);

    const answer = prompter.ask('Count? ');
    input.write('12\n');

    await expect(answer).resolves.toBe('12');
    prompter.close();
  });

  it('rejects a pending question when the input ends', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createReadlinePrompter(input, output);

    const answer = prompter.ask('Count? ');
    input.end();

    await expect(answer).rejects.toThrow();
  });
});
