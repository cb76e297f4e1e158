/**
 * In-memory ProcessHandle for tests that must not spawn processes.
 */

import { ProcessDeadError } from '../lib/errors.js';
import type { ProcessHandle } from '../process/child-process.js';

/** Scripted behaviour of a fake process. */
export interface FakeProcessScript {
  /** Command line reported by the handle. */
  command?: string;
  /** Output returned by the final drain. */
  output?: string;
  /** Exit status set when the process finishes. */
  exitCode?: number;
  /** Output pieces handed out by successive readAvailable calls. */
  available?: string[];
  /** Finish as soon as the handle is created. */
  exited?: boolean;
  /** Finish after this many terminate calls (default 1). */
  exitAfterTerminate?: number;
}

/** Fake process plus what was done to it. */
export interface FakeProcess extends ProcessHandle {
  /** Everything written to stdin. */
  readonly written: string[];
  /** Signals received, in order. */
  readonly signals: Array<'terminate' | 'kill'>;
}

/** Create a fake process following `script`. */
export function createFakeProcess(script: FakeProcessScript = {}): FakeProcess {
  const written: string[] = [];
  const signals: Array<'terminate' | 'kill'> = [];
  const available = [...(script.available ?? [])];
  const finalStatus = script.exitCode ?? 0;
  let status: number | null = script.exited ? finalStatus : null;
  let stdinClosed = false;
  let pending = script.output ?? '';
  let terminateCalls = 0;

  const drainText = (): string => {
    stdinClosed = true;
    status ??= finalStatus;
    const out = pending;
    pending = '';
    return out.trim();
  };

  return {
    command: script.command ?? 'fake',
    pid: 4242,
    written,
    signals,
    get exitCode() {
      return status;
    },
    get running() {
      return status === null;
    },
    write(data) {
      if (stdinClosed) throw new ProcessDeadError(4242);
      written.push(typeof data === 'string' ? data : Buffer.from(data).toString('utf8'));
    },
    drain() {
      return Promise.resolve(drainText());
    },
    drainBytes() {
      return Promise.resolve(Buffer.from(drainText(), 'utf8'));
    },
    async finish() {
      pending = drainText();
      await Promise.resolve();
    },
    readAvailable() {
      return available.shift() ?? '';
    },
    waitForExit() {
      return Promise.resolve(status !== null);
    },
    terminate() {
      if (status !== null) return false;
      signals.push('terminate');
      terminateCalls += 1;
      if (terminateCalls >= (script.exitAfterTerminate ?? 1)) status = 143;
      return true;
    },
    kill() {
      if (status !== null) return false;
      signals.push('kill');
      status = 137;
      return true;
    },
  };
}
