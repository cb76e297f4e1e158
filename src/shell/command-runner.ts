/**
 * Location-transparent command execution. A runner executes command strings on this host, or on a remote host by prefixing a non-interactive login.
 *
 * @module
 */

import type { Logger } from 'pino';

import { defaultLogger } from '../lib/logger.js';
import {
  type LaunchOptions,
  launchProcess,
  type ProcessHandle,
} from '../process/child-process.js';
import { createIdentityResolver, type IdentityResolver } from './identity.js';
import { shellQuote } from './quote.js';

/** Exit status and output of one command. */
export interface CommandResult<T = string> {
  /** Process exit status. */
  exitCode: number;
  /** Combined stdout and stderr. Text output is trimmed. */
  output: T;
}

/** Data accepted as process input. */
export type CommandInput = string | Uint8Array;

/** Capability for running commands on one target host. */
export interface CommandRunner {
  /** True when commands run on this host. */
  readonly local: boolean;
  /** Full command line that will be launched for `command`. */
  buildCommand(command: string): Promise<string>;
  /** Run `command` to completion, feeding it `input` when given. */
  execute(command: string, input?: CommandInput): Promise<CommandResult>;
  /** Like execute, returning raw output bytes. */
  executeBytes(
    command: string,
    input?: CommandInput,
  ): Promise<CommandResult<Buffer>>;
  /** Launch `command` and hand back the live process. */
  launch(command: string): Promise<ProcessHandle>;
  /** Human-readable target, e.g. `<Shell: local machine>`. */
  toString(): string;
}

/** Login command used for remote targets. */
export interface LoginOptions {
  /** Login program. */
  command: string;
  /** Arguments placed before the target; they must keep the login non-interactive. */
  options: string[];
}

/** Default login: ssh in batch mode, which fails instead of prompting. */
export const DEFAULT_LOGIN: LoginOptions = {
  command: 'ssh',
  options: ['-o', 'BatchMode=yes'],
};

/** Process launcher, replaceable for tests. */
export type Launcher = (
  command: string,
  options: LaunchOptions,
) => ProcessHandle;

/** Options for createShell. */
export interface ShellOptions {
  /** Target host. Absent or `localhost` means this host. */
  host?: string;
  /** Remote account. Defaults to the local identity. */
  user?: string;
  /** Source of the local identity when `user` is absent. */
  identity?: IdentityResolver;
  /** Login command for remote targets. */
  login?: LoginOptions;
  /** Process launcher. */
  launcher?: Launcher;
  /** Logger for dispatch and process warnings. */
  logger?: Logger;
}

/** True when `host` designates this machine. */
export function isLocalHost(host: string | undefined): boolean {
  return host === undefined || host === '' || host.toLowerCase() === 'localhost';
}

/** Shared execute/executeBytes plumbing over a command builder. */
function createRunner(params: {
  local: boolean;
  buildCommand: (command: string) => Promise<string>;
  describe: () => string;
  launcher: Launcher;
  logger: Logger;
}): CommandRunner {
  const { local, buildCommand, describe, launcher, logger } = params;

  async function launch(command: string): Promise<ProcessHandle> {
    const full = await buildCommand(command);
    logger.debug({ command: full }, 'Launching command');
    return launcher(full, { logger });
  }

  async function start(
    command: string,
    input?: CommandInput,
  ): Promise<ProcessHandle> {
    const proc = await launch(command);
    if (input !== undefined) proc.write(input);
    return proc;
  }

  return {
    local,
    buildCommand,

    launch,

    async execute(command, input) {
      const proc = await start(command, input);
      const output = await proc.drain();
      return { exitCode: proc.exitCode ?? 1, output };
    },

    async executeBytes(command, input) {
      const proc = await start(command, input);
      const output = await proc.drainBytes();
      return { exitCode: proc.exitCode ?? 1, output };
    },

    toString: describe,
  };
}

/** Runner for this host: commands are launched as given. */
export function createLocalShell(
  options: Pick<ShellOptions, 'launcher' | 'logger'> = {},
): CommandRunner {
  return createRunner({
    local: true,
    buildCommand: (command) => Promise.resolve(command),
    describe: () => '<Shell: local machine>',
    launcher: options.launcher ?? launchProcess,
    logger: options.logger ?? defaultLogger,
  });
}

/**
 * Runner for a remote host: every command is quoted as one word after `<login> [user@]host`, so the remote shell sees it exactly as given.
 */
export function createRemoteShell(
  options: ShellOptions & { host: string },
): CommandRunner {
  const { host } = options;
  const login = options.login ?? DEFAULT_LOGIN;
  const identity = options.identity ?? createIdentityResolver();
  let user: string | undefined = options.user;

  async function resolveUser(): Promise<string> {
    user ??= await identity();
    return user;
  }

  return createRunner({
    local: false,
    async buildCommand(command) {
      const account = await resolveUser();
      const target = account ? `${account}@${host}` : host;
      return [login.command, ...login.options, target, shellQuote(command)].join(
        ' ',
      );
    },
    describe: () => `<Shell: ${user ? `${user}@` : ''}${host}>`,
    launcher: options.launcher ?? launchProcess,
    logger: options.logger ?? defaultLogger,
  });
}

/** Pick the local or remote runner for `options.host`. */
export function createShell(options: ShellOptions = {}): CommandRunner {
  const { host } = options;
  if (host === undefined || isLocalHost(host)) {
    return createLocalShell(options);
  }
  return createRemoteShell({ ...options, host });
}
