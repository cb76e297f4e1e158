/**
 * Stand-in for a remote login: a script that drops the target and runs the remaining arguments, joined with spaces, through `sh -c` on this host, the way ssh hands them to the remote shell.
 */

import { chmodSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { LoginOptions } from '../shell/command-runner.js';

/** Temporary directory holding the login script and any helper scripts. */
export interface FakeLogin {
  login: LoginOptions;
  /** Write an executable `#!/bin/sh` script and return its path. */
  script(name: string, body: string): string;
  cleanup(): void;
}

/** Create a fake login in a fresh temporary directory. */
export function createFakeLogin(): FakeLogin {
  const dir = mkdtempSync(join(tmpdir(), 'condor-jobs-login-'));

  const script = (name: string, body: string): string => {
    const path = join(dir, name);
    writeFileSync(path, `#!/bin/sh\n${body}\n`);
    chmodSync(path, 0o755);
    return path;
  };

  const command = script('fake-login', 'shift\nexec /bin/sh -c "$*"');

  return {
    login: { command, options: [] },
    script,
    cleanup: () => {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
