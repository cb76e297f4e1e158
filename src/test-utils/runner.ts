/**
 * Scripted CommandRunner for tests of the submission layer.
 */

import type { CommandInput, CommandRunner } from '../shell/command-runner.js';
import { createFakeProcess } from './process.js';

/** One recorded command. */
export interface FakeCall {
  command: string;
  input?: string;
}

/** Reply of the fake runner to one command. */
export interface FakeReply {
  exitCode?: number;
  output?: string;
}

/** Handler deciding the reply for each command. */
export type FakeHandler = (command: string, input?: string) => FakeReply;

function inputText(input?: CommandInput): string | undefined {
  if (input === undefined) return undefined;
  return typeof input === 'string' ? input : Buffer.from(input).toString('utf8');
}

/** Create a runner that answers through `handler` and records every call. */
export function createFakeRunner(
  handler: FakeHandler,
  options: { local?: boolean } = {},
) {
  const calls: FakeCall[] = [];

  const reply = (command: string, input?: CommandInput) => {
    const text = inputText(input);
    calls.push(text === undefined ? { command } : { command, input: text });
    const result = handler(command, text);
    return { exitCode: result.exitCode ?? 0, output: result.output ?? '' };
  };

  const runner: CommandRunner = {
    local: options.local ?? true,
    buildCommand: (command) => Promise.resolve(command),
    execute(command, input) {
      const { exitCode, output } = reply(command, input);
      return Promise.resolve({ exitCode, output: output.trim() });
    },
    executeBytes(command, input) {
      const { exitCode, output } = reply(command, input);
      return Promise.resolve({ exitCode, output: Buffer.from(output, 'utf8') });
    },
    launch(command) {
      const { exitCode, output } = reply(command);
      return Promise.resolve(
        createFakeProcess({ command, output, exitCode, exited: true }),
      );
    },
    toString: () => '<Shell: fake>',
  };

  return { runner, calls };
}
