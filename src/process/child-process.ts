/**
 * Child process primitive. Runs one command under `/bin/sh -c` with stdin piped and stderr merged into stdout, and hands its output back in drains.
 */

import {
  type ChildProcessWithoutNullStreams,
  spawn,
} from 'node:child_process';
import { constants } from 'node:os';

import type { Logger } from 'pino';

import { ProcessDeadError } from '../lib/errors.js';
import { defaultLogger } from '../lib/logger.js';

/** Options for launching a process. */
export interface LaunchOptions {
  /** Shell used to interpret the command line. */
  shell?: string;
  /** Working directory of the process. */
  cwd?: string;
  /** Environment of the process. Defaults to the current environment. */
  env?: NodeJS.ProcessEnv;
  /** Logger for warnings about dead processes. */
  logger?: Logger;
}

/** Handle on a launched process. */
export interface ProcessHandle {
  /** The command line the process was launched with. */
  readonly command: string;
  /** OS process id, if the launch got that far. */
  readonly pid: number | undefined;
  /** Exit status, or null while the process is running. Signal deaths report 128 + signal number. */
  readonly exitCode: number | null;
  /** True until the process exits or fails to launch. */
  readonly running: boolean;
  /** Send bytes to stdin. Throws ProcessDeadError once stdin is closed. */
  write(data: string | Uint8Array): void;
  /** Close stdin, wait for exit, and return saved output followed by the new output, trimmed. */
  drain(): Promise<string>;
  /** Like drain, but untrimmed raw bytes. */
  drainBytes(): Promise<Buffer>;
  /** Drain silently, keeping the output for the next drain or read. */
  finish(): Promise<void>;
  /** Return output produced since the last read without closing stdin or waiting. */
  readAvailable(): string;
  /** Resolve true once the process exits, or false when `timeoutMs` passes first. */
  waitForExit(timeoutMs?: number): Promise<boolean>;
  /** Ask the process to stop (SIGTERM). Returns false if it had already exited. */
  terminate(): boolean;
  /** Stop the process immediately (SIGKILL). Returns false if it had already exited. */
  kill(): boolean;
}

/** Translate a close event into a single exit status. */
function toExitStatus(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) return code;
  if (signal) {
    const signum = Object.entries(constants.signals).find(
      ([name]) => name === signal,
    )?.[1];
    if (signum !== undefined) return 128 + signum;
  }
  return 1;
}

class ShellProcess implements ProcessHandle {
  readonly command: string;
  private readonly child: ChildProcessWithoutNullStreams;
  private readonly logger: Logger;
  private readonly closed: Promise<void>;
  private chunks: Buffer[] = [];
  private saved: Buffer = Buffer.alloc(0);
  private status: number | null = null;
  private launchError: Error | null = null;
  private drained = false;

  constructor(command: string, options: LaunchOptions) {
    this.command = command;
    this.logger = options.logger ?? defaultLogger;
    // stderr joins stdout inside the shell, so both share one pipe and keep their order
    this.child = spawn(options.shell ?? '/bin/sh', ['-c', `exec 2>&1\n${command}`], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    this.child.stdout.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
    });
    this.child.stderr.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
    });
    // EPIPE when the process exits without reading its input
    this.child.stdin.on('error', (err) => {
      this.logger.debug({ pid: this.pid, err }, 'stdin closed by process');
    });

    this.closed = new Promise((resolve) => {
      this.child.on('error', (err) => {
        this.launchError = err;
        resolve();
      });
      this.child.on('close', (code, signal) => {
        this.status = toExitStatus(code, signal);
        resolve();
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exitCode(): number | null {
    return this.status;
  }

  get running(): boolean {
    return this.status === null && this.launchError === null;
  }

  write(data: string | Uint8Array): void {
    const { stdin } = this.child;
    if (stdin.writableEnded || stdin.destroyed) {
      throw new ProcessDeadError(this.pid);
    }
    stdin.write(data);
  }

  async drain(): Promise<string> {
    const fresh = await this.collect();
    const text = this.saved.toString('utf8') + fresh.toString('utf8').trim();
    this.saved = Buffer.alloc(0);
    return text;
  }

  async drainBytes(): Promise<Buffer> {
    const fresh = await this.collect();
    const bytes = Buffer.concat([this.saved, fresh]);
    this.saved = Buffer.alloc(0);
    return bytes;
  }

  async finish(): Promise<void> {
    this.saved = Buffer.from(await this.drain(), 'utf8');
  }

  readAvailable(): string {
    const bytes = Buffer.concat([this.saved, this.take()]);
    this.saved = Buffer.alloc(0);
    return bytes.toString('utf8');
  }

  async waitForExit(timeoutMs?: number): Promise<boolean> {
    if (!this.running) return true;
    if (timeoutMs === undefined) {
      await this.closed;
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => {
        resolve(false);
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.closed.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  terminate(): boolean {
    return this.signal('SIGTERM', 'terminate');
  }

  kill(): boolean {
    return this.signal('SIGKILL', 'kill');
  }

  toString(): string {
    const state =
      this.status === null ? 'Running' : `Exit=${String(this.status)}`;
    return `<Process (${state}): ${this.command}>`;
  }

  private signal(signal: NodeJS.Signals, action: string): boolean {
    if (!this.running) {
      this.logger.warn(
        { pid: this.pid, exitCode: this.status },
        `${action}: process is already dead`,
      );
      return false;
    }
    return this.child.kill(signal);
  }

  private async collect(): Promise<Buffer> {
    if (this.drained) {
      this.logger.debug(
        { pid: this.pid, exitCode: this.status },
        'drain: end of output, process already finished',
      );
    }
    if (!this.child.stdin.writableEnded) this.child.stdin.end();
    await this.closed;
    this.drained = true;
    if (this.launchError) throw this.launchError;
    return this.take();
  }

  private take(): Buffer {
    const bytes = Buffer.concat(this.chunks);
    this.chunks = [];
    return bytes;
  }
}

/**
 * Launch `command` under a shell. Launch failures surface from the first drain.
 */
export function launchProcess(
  command: string,
  options: LaunchOptions = {},
): ProcessHandle {
  return new ShellProcess(command, options);
}
