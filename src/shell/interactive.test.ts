/**
 * Tests for the interactive control loop, driven by scripted operator choices.
 */

import { describe, expect, it } from 'vitest';

import { createFakeProcess } from '../test-utils/process.js';
import { createFakeRunner } from '../test-utils/runner.js';
import {
  CHOICE_PROMPT,
  createInteractiveSession,
  executeInteractive,
  HELP_TEXT,
  INPUT_PROMPT,
  type InteractiveIO,
  parseChoice,
  RUNNING_NOTICE,
} from './interactive.js';

function createScriptedIO(answers: string[]) {
  const remaining = [...answers];
  const prompts: string[] = [];
  const printed: string[] = [];
  const io: InteractiveIO = {
    prompt(question) {
      prompts.push(question);
      const answer = remaining.shift();
      if (answer === undefined) {
        return Promise.reject(new Error(`No scripted answer for "${question}"`));
      }
      return Promise.resolve(answer);
    },
    print(text) {
      printed.push(text);
    },
  };
  return { io, prompts, printed };
}

describe('parseChoice', () => {
  it('should accept every alias', () => {
    expect(parseChoice('INP')).toBe('input');
    expect(parseChoice(' p ')).toBe('output');
    expect(parseChoice('ter')).toBe('terminate');
    expect(parseChoice('kil')).toBe('kill');
  });

  it('should return null for anything else', () => {
    expect(parseChoice('help')).toBeNull();
    expect(parseChoice('')).toBeNull();
    expect(parseChoice('quit')).toBeNull();
  });
});

describe('createInteractiveSession', () => {
  it('should print the output of a process that already exited', async () => {
    const proc = createFakeProcess({ exited: true, output: 'done\n', exitCode: 0 });
    const { io, prompts, printed } = createScriptedIO([]);
    const session = createInteractiveSession(proc, io, { settleMs: 0 });

    expect(await session.run()).toBe(0);
    expect(printed).toEqual(['done']);
    expect(prompts).toEqual([]);
    expect(session.history).toEqual(['idle', 'exited']);
  });

  it('should walk through feeding, reading, help and termination', async () => {
    const proc = createFakeProcess({ available: ['echo: hello\n'] });
    const { io, prompts, printed } = createScriptedIO([
      'i',
      'hello',
      'out',
      'bogus',
      'terminate',
    ]);
    const session = createInteractiveSession(proc, io, { settleMs: 0 });

    expect(await session.run()).toBe(143);

    expect(session.history).toEqual([
      'idle',
      'awaitingChoice',
      'feeding',
      'idle',
      'awaitingChoice',
      'reading',
      'idle',
      'awaitingChoice',
      'idle',
      'awaitingChoice',
      'terminating',
      'exited',
    ]);
    expect(session.state).toBe('exited');
    expect(prompts).toEqual([
      CHOICE_PROMPT,
      INPUT_PROMPT,
      CHOICE_PROMPT,
      CHOICE_PROMPT,
      CHOICE_PROMPT,
    ]);
    expect(printed).toEqual([
      RUNNING_NOTICE,
      RUNNING_NOTICE,
      'echo: hello\n',
      RUNNING_NOTICE,
      HELP_TEXT,
      RUNNING_NOTICE,
    ]);
    expect(proc.written).toEqual(['hello\n']);
    expect(proc.signals).toEqual(['terminate']);
  });

  it('should keep prompting until a kill ends a stubborn process', async () => {
    const proc = createFakeProcess({ exitAfterTerminate: 2 });
    const { io } = createScriptedIO(['t', 'k']);
    const session = createInteractiveSession(proc, io, { settleMs: 0 });

    expect(await session.run()).toBe(137);
    expect(proc.signals).toEqual(['terminate', 'kill']);
    expect(session.history).toEqual([
      'idle',
      'awaitingChoice',
      'terminating',
      'idle',
      'awaitingChoice',
      'killing',
      'exited',
    ]);
  });
});

describe('executeInteractive', () => {
  it('should launch through the runner and print a quick result', async () => {
    const { runner, calls } = createFakeRunner(() => ({ output: 'hi\n', exitCode: 0 }));
    const { io, printed } = createScriptedIO([]);

    expect(await executeInteractive(runner, 'echo hi', io, { settleMs: 0 })).toBe(0);
    expect(calls).toEqual([{ command: 'echo hi' }]);
    expect(printed).toEqual(['hi']);
  });
});
