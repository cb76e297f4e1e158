/**
 * Operator-driven control loop for a running command. The loop is a small state machine over a ProcessHandle; console I/O sits behind InteractiveIO so scripted choices can drive it.
 *
 * @module
 */

import { createInterface } from 'node:readline/promises';

import type { Logger } from 'pino';

import { defaultLogger } from '../lib/logger.js';
import type { ProcessHandle } from '../process/child-process.js';
import type { CommandRunner } from './command-runner.js';

/** States of an interactive session. */
export type InteractiveState =
  | 'idle'
  | 'awaitingChoice'
  | 'feeding'
  | 'reading'
  | 'terminating'
  | 'killing'
  | 'exited';

/** Actions the operator can pick while the process runs. */
export type InteractiveChoice = 'input' | 'output' | 'terminate' | 'kill';

const CHOICES: readonly InteractiveChoice[] = [
  'input',
  'output',
  'terminate',
  'kill',
];

const CHOICE_ALIASES: Record<InteractiveChoice, readonly string[]> = {
  input: ['input', 'i', 'in', 'inp'],
  output: ['output', 'o', 'out', 'print', 'p'],
  terminate: ['terminate', 'term', 't', 'te', 'ter'],
  kill: ['kill', 'k', 'ki', 'kil'],
};

export const CHOICE_PROMPT = 'input, output, terminate, kill, help: ';
export const RUNNING_NOTICE = 'Process running.  What do you want to do?';
export const INPUT_PROMPT = 'stdin: ';

export const HELP_TEXT = `The process has not finished yet.  It is either taking a while or it
is waiting for your input.  To interact with it, choose from one of the
following options:
  input: Give the program a line of keyboard input.
  output: Show whatever the program has said since the last check.
  terminate: Ask the process to finish what it is doing and end nicely.
  kill: Immediately end the process.  Do this if the process is misbehaving.
  help: This text.`;

/** Map operator input to a choice; null means "show help". */
export function parseChoice(raw: string): InteractiveChoice | null {
  const normalized = raw.trim().toLowerCase();
  return (
    CHOICES.find((choice) => CHOICE_ALIASES[choice].includes(normalized)) ??
    null
  );
}

/** Operator-facing I/O. */
export interface InteractiveIO {
  /** Ask a question and resolve with the answer. */
  prompt(question: string): Promise<string>;
  /** Show text to the operator. */
  print(text: string): void;
}

/** Options for an interactive session. */
export interface InteractiveOptions {
  /** How long to let the process settle after each action, in ms. */
  settleMs?: number;
  logger?: Logger;
}

/** A running interactive session. */
export interface InteractiveSession {
  /** Current state. */
  readonly state: InteractiveState;
  /** Every state entered so far, in order. */
  readonly history: readonly InteractiveState[];
  /** Drive the loop until the process exits; resolves with its exit status. */
  run(): Promise<number>;
}

/** Create an interactive session over an already launched process. */
export function createInteractiveSession(
  proc: ProcessHandle,
  io: InteractiveIO,
  options: InteractiveOptions = {},
): InteractiveSession {
  const settleMs = options.settleMs ?? 100;
  const logger = options.logger ?? defaultLogger;
  const history: InteractiveState[] = [];

  function enter(state: InteractiveState): void {
    history.push(state);
    logger.debug({ pid: proc.pid, state }, 'Interactive session state');
  }

  async function act(choice: InteractiveChoice | null): Promise<void> {
    switch (choice) {
      case 'input': {
        enter('feeding');
        const line = await io.prompt(INPUT_PROMPT);
        proc.write(`${line}\n`);
        break;
      }
      case 'output':
        enter('reading');
        io.print(proc.readAvailable());
        break;
      case 'terminate':
        enter('terminating');
        proc.terminate();
        break;
      case 'kill':
        enter('killing');
        proc.kill();
        break;
      default:
        io.print(HELP_TEXT);
        return;
    }
    await proc.waitForExit(settleMs);
  }

  return {
    get state() {
      return history.at(-1) ?? 'idle';
    },

    history,

    async run(): Promise<number> {
      enter('idle');

      while (proc.running) {
        enter('awaitingChoice');
        io.print(RUNNING_NOTICE);
        await act(parseChoice(await io.prompt(CHOICE_PROMPT)));
        if (proc.running) enter('idle');
      }

      const rest = await proc.drain();
      if (rest) io.print(rest);
      enter('exited');
      return proc.exitCode ?? 1;
    },
  };
}

/** InteractiveIO over the process's own stdin and stdout. */
export function createConsoleIO(): InteractiveIO & { close(): void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    prompt: (question) => rl.question(question),
    print: (text) => {
      console.log(text);
    },
    close: () => {
      rl.close();
    },
  };
}

/**
 * Run `command` through `runner` under operator control. If it finishes before the first prompt, its output is printed and the call returns.
 */
export async function executeInteractive(
  runner: CommandRunner,
  command: string,
  io?: InteractiveIO,
  options: InteractiveOptions = {},
): Promise<number> {
  const proc = await runner.launch(command);
  await proc.waitForExit(options.settleMs ?? 100);

  if (io) return createInteractiveSession(proc, io, options).run();

  const consoleIO = createConsoleIO();
  try {
    return await createInteractiveSession(proc, consoleIO, options).run();
  } finally {
    consoleIO.close();
  }
}
