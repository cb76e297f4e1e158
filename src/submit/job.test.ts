/**
 * Tests for job building, submission and queue observation.
 */

import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  AlreadySubmittedError,
  BadFormatError,
  BadQuotes,
  InvalidSettingError,
  SubmissionError,
} from '../lib/errors.js';
import { condorConfigSchema } from '../schemas/config.js';
import type { Launcher } from '../shell/command-runner.js';
import { createRemoteShell } from '../shell/command-runner.js';
import { fixedIdentity } from '../shell/identity.js';
import { shellQuote } from '../shell/quote.js';
import { createFakeLogin } from '../test-utils/login.js';
import { createTestLogger } from '../test-utils/logger.js';
import { createFakeProcess } from '../test-utils/process.js';
import {
  createFakeRunner,
  type FakeHandler,
  type FakeReply,
} from '../test-utils/runner.js';
import { countClusterProcesses, createJob, Job, type JobParams } from './job.js';

const QUEUE_QUERY =
  'condor_q 42 -format "%d." ClusterId -format "%d\\n" ProcId';

const DEFAULT_STANZA =
  'Universe = vanilla\nrequest_cpus = 1\nrequest_memory = 1024\nrequest_disk = 32\n';

/** Submit host where `hostname` and `echo` live in /bin and nothing else exists. */
function scheduler(replies: Record<string, FakeReply> = {}): FakeHandler {
  return (command) => {
    const reply = replies[command];
    if (reply) return reply;
    if (command.startsWith('ls ')) return { exitCode: 2, output: 'ls: not found' };
    if (command === "which 'hostname'") return { output: '/bin/hostname\n' };
    if (command === "which 'echo'") return { output: '/bin/echo\n' };
    return { exitCode: 1 };
  };
}

function buildJob(
  handler: FakeHandler = scheduler(),
  params: Partial<JobParams> = {},
) {
  const { runner, calls } = createFakeRunner(handler);
  const log = createTestLogger();
  const job = new Job({
    runner,
    server: 'central',
    username: 'alice',
    logger: log.logger,
    ...params,
  });
  return { job, calls, log };
}

describe('Job', () => {
  describe('enqueue', () => {
    it('should write the default stanza with the resolved executable', async () => {
      const { job } = buildJob();
      await job.enqueue('hostname');

      expect(job.preview()).toBe(
        DEFAULT_STANZA +
          'transfer_executable = false\nExecutable = /bin/hostname\nQueue\n',
      );
    });

    it('should quote the arguments', async () => {
      const { job } = buildJob();
      await job.enqueue("  echo 'hello  world' -n  ");

      expect(job.preview()).toBe(
        DEFAULT_STANZA +
          `transfer_executable = false\nExecutable = /bin/echo\nArguments = "'hello  world' -n"\nQueue\n`,
      );
    });

    it('should accept escaped double quotes', async () => {
      const { job } = buildJob();
      await job.enqueue(`echo 'a\\"b'`);

      expect(job.settings.submitText).toContain(`Arguments = "'a""b'"\nQueue\n`);
    });

    it('should keep arguments separated by tabs', async () => {
      const { job } = buildJob();
      await job.enqueue('echo\thi');

      expect(job.settings.submitText).toContain(
        'Executable = /bin/echo\nArguments = "hi"\nQueue\n',
      );
    });

    it('should reject unescaped double quotes', async () => {
      const { job } = buildJob();

      await expect(job.enqueue('echo "a"')).rejects.toThrow(BadQuotes);
      expect(job.settings.submitText).toBe('');
    });

    it('should reject a repeat count below one', async () => {
      const { job } = buildJob();

      await expect(job.enqueue('hostname', 0)).rejects.toThrow(
        InvalidSettingError,
      );
      await expect(job.enqueue('hostname', 1.5)).rejects.toThrow(
        'Invalid value for Queue: 1.5 is not a positive integer',
      );
    });

    it('should start each stanza from an empty attribute set', async () => {
      const { job, log } = buildJob(
        scheduler({ "ls './run.sh'": { output: './run.sh' } }),
      );
      await job.enqueue('hostname');
      await job.enqueue('./run.sh -n 2', 3);

      expect(job.preview()).toBe(
        DEFAULT_STANZA +
          'transfer_executable = false\nExecutable = /bin/hostname\nQueue\n' +
          'transfer_executable = false\nExecutable = ./run.sh\nArguments = "-n 2"\nQueue 3\n',
      );
      expect(log.warn).toHaveBeenCalledWith(
        { first: '/bin/hostname', executable: './run.sh' },
        'Only one executable should be used per submission',
      );
    });

    it('should use an executable found nowhere as given', async () => {
      const { job, calls, log } = buildJob();
      await job.enqueue('myprog');

      expect(calls).toEqual([
        { command: "ls 'myprog'" },
        { command: "which 'myprog'" },
      ]);
      expect(job.settings.submitText).toBe(
        DEFAULT_STANZA + 'Executable = myprog\nQueue\n',
      );
      expect(log.warn).toHaveBeenCalledWith(
        { executable: 'myprog' },
        'Could not find executable',
      );
    });

    it('should keep a local executable relative to the working directory', async () => {
      const { job } = buildJob(scheduler({ "ls 'analyze'": { output: 'analyze' } }));
      await job.setExecutable('analyze');

      expect(job.settings.getExecutable()).toBe('analyze');
      expect(job.settings.has('transferExecutable')).toBe(false);
    });
  });

  describe('submit', () => {
    it('should send the description and return the cluster id', async () => {
      const { job, calls } = buildJob(
        scheduler({
          'condor_submit -remote central': {
            output: 'Submitting job(s).\n1 job(s) submitted to cluster 42.\n',
          },
        }),
      );
      await job.enqueue('hostname');

      expect(await job.submit()).toBe(42);
      expect(job.clusterId).toBe(42);
      expect(calls.at(-1)).toEqual({
        command: 'condor_submit -remote central',
        input:
          DEFAULT_STANZA +
          'transfer_executable = false\nExecutable = /bin/hostname\nQueue\n',
      });
    });

    it('should refuse a second submission', async () => {
      const { job } = buildJob(
        scheduler({ 'condor_submit -remote central': { output: 'cluster 42' } }),
      );
      await job.enqueue('hostname');
      await job.submit();

      await expect(job.submit()).rejects.toThrow(AlreadySubmittedError);
    });

    it('should return null when the submit command fails', async () => {
      const { job, log } = buildJob(
        scheduler({
          'condor_submit -remote central': {
            exitCode: 1,
            output: 'ERROR: Failed to connect',
          },
        }),
      );
      await job.enqueue('hostname');

      expect(await job.submit()).toBeNull();
      expect(job.clusterId).toBeNull();
      expect(log.error).toHaveBeenCalledTimes(1);
    });

    it('should reject a reply without a cluster number', async () => {
      const { job } = buildJob(
        scheduler({
          'condor_submit -remote central': { output: 'Submitting job(s).' },
        }),
      );
      await job.enqueue('hostname');

      await expect(job.submit()).rejects.toThrow(
        "Unable to parse invalid output from process 'condor_submit'.",
      );
      expect(job.clusterId).toBeNull();
    });

    it('should use the configured submit binary', async () => {
      const { job, calls } = buildJob(
        scheduler({ 'my_submit -remote central': { output: 'cluster 9' } }),
        { binaries: { submit: 'my_submit', queue: 'my_q' } },
      );

      expect(await job.submit()).toBe(9);
      expect(calls).toEqual([
        { command: 'my_submit -remote central', input: DEFAULT_STANZA },
      ]);
    });
  });

  describe('poll', () => {
    it('should require a submitted job', async () => {
      const { job } = buildJob();

      await expect(job.poll()).rejects.toThrow(SubmissionError);
      await expect(job.poll()).rejects.toThrow(
        "Cannot call 'poll()' because the job has not been submitted yet.",
      );
    });

    it('should count the processes of the cluster', async () => {
      const { job, calls } = buildJob(
        scheduler({ [QUEUE_QUERY]: { output: '42.0\n42.1\n142.0\n42.2\n' } }),
        { clusterId: 42 },
      );

      expect(await job.poll()).toBe(3);
      expect(calls).toEqual([{ command: QUEUE_QUERY }]);
    });

    it('should fail when the query fails', async () => {
      const { job } = buildJob(scheduler(), { clusterId: 42 });

      await expect(job.poll()).rejects.toThrow(BadFormatError);
    });

    it('should send the format directives intact through a remote login', async () => {
      const fake = createFakeLogin();
      try {
        // prints one line per process, using the formats it was given
        const queue = fake.script(
          'fake-condor-q',
          'printf "$3" "$1"; printf "$6" 0; printf "$3" "$1"; printf "$6" 1',
        );
        const runner = createRemoteShell({
          host: 'central',
          user: 'alice',
          login: fake.login,
        });
        const job = new Job({
          runner,
          server: 'central',
          username: 'alice',
          binaries: { submit: 'condor_submit', queue },
          clusterId: 42,
          logger: createTestLogger().logger,
        });

        expect(await job.poll()).toBe(2);
        expect(
          await runner.execute(
            `${queue} 42 -format "%d." ClusterId -format "%d\\n" ProcId`,
          ),
        ).toEqual({ exitCode: 0, output: '42.0\n42.1' });
      } finally {
        fake.cleanup();
      }
    });
  });

  describe('wait', () => {
    function queueSequence(replies: string[]): FakeHandler {
      return (command) => {
        if (command !== QUEUE_QUERY) return { exitCode: 1 };
        return { output: replies.shift() ?? '' };
      };
    }

    it('should poll with a growing interval until the cluster is gone', async () => {
      const sleep = vi.fn(() => Promise.resolve());
      const { job } = buildJob(
        queueSequence(['42.0\n42.1\n', '42.1\n', '42.1\n', '']),
        { clusterId: 42, sleep },
      );

      expect(await job.wait()).toBe(4);
      expect(sleep.mock.calls).toEqual([[1000], [1500], [2000]]);
    });

    it('should cap the interval', async () => {
      const sleep = vi.fn(() => Promise.resolve());
      const { job } = buildJob(
        queueSequence(['42.0\n', '42.0\n', '42.0\n', '']),
        { clusterId: 42, sleep, maxPollIntervalMs: 1200 },
      );

      await job.wait();
      expect(sleep.mock.calls).toEqual([[1000], [1200], [1200]]);
    });

    it('should return at once when the cluster is already gone', async () => {
      const sleep = vi.fn(() => Promise.resolve());
      const { job } = buildJob(queueSequence(['']), { clusterId: 42, sleep });

      expect(await job.wait()).toBe(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should require a submitted job', async () => {
      const { job } = buildJob();

      await expect(job.wait()).rejects.toThrow(
        "Cannot call 'wait()' because the job has not been submitted yet.",
      );
    });

    it('should fail when a query fails', async () => {
      const sleep = vi.fn(() => Promise.resolve());
      const { job } = buildJob(
        (command) =>
          command === QUEUE_QUERY ? { exitCode: 1, output: 'timeout' } : {},
        { clusterId: 42, sleep },
      );

      await expect(job.wait()).rejects.toThrow(
        "Unable to parse invalid output from process 'condor_q'.",
      );
    });
  });

  describe('status', () => {
    const table = '-- Schedd: central\n 42.0   alice   R  hostname';

    it('should pass the table to the formatter', async () => {
      const { job, calls } = buildJob(
        scheduler({ 'condor_q 42': { output: table } }),
        { clusterId: 42 },
      );

      expect(await job.status((reply) => reply.split('\n').length)).toBe(2);
      expect(calls).toEqual([{ command: 'condor_q 42' }]);
    });

    it('should print the table by default', async () => {
      const print = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const { job } = buildJob(
        scheduler({ 'condor_q 42': { output: table } }),
        { clusterId: 42 },
      );

      await job.status();
      expect(print).toHaveBeenCalledWith(table);
      print.mockRestore();
    });

    it('should require a submitted job', async () => {
      const { job } = buildJob();

      await expect(job.status(String)).rejects.toThrow(SubmissionError);
    });

    it('should fail when the query fails', async () => {
      const { job } = buildJob(scheduler(), { clusterId: 42 });

      await expect(job.status(String)).rejects.toThrow(BadFormatError);
    });
  });

  describe('resolveEmail', () => {
    const mapCommand = "cat '/etc/maps/mail.json'";
    const map = '{"alice": "alice@example.org", "*": "ops@example.org"}';

    it('should use the identity entry', async () => {
      const { job, log } = buildJob(scheduler({ [mapCommand]: { output: map } }));

      expect(
        await job.resolveEmail({ mailMapPath: '/etc/maps/mail.json' }),
      ).toBe('alice@example.org');
      expect(job.settings.getNotifyUser()).toBe('alice@example.org');
      expect(log.warn).not.toHaveBeenCalled();
    });

    it('should fall back to the default entry with a warning', async () => {
      const { job, log } = buildJob(scheduler({ [mapCommand]: { output: map } }), {
        username: 'bob',
      });

      expect(
        await job.resolveEmail({
          mailMapPath: '/etc/maps/mail.json',
          fallbackAddress: 'fallback@example.org',
        }),
      ).toBe('ops@example.org');
      expect(log.warn).toHaveBeenCalledWith(
        { username: 'bob' },
        'Username not in notification address map; using a default address',
      );
    });

    it('should use the fallback address when the map is unavailable', async () => {
      const { job } = buildJob();

      expect(
        await job.resolveEmail({
          mailMapPath: '/etc/maps/mail.json',
          fallbackAddress: 'fallback@example.org',
        }),
      ).toBe('fallback@example.org');
    });

    it('should leave the address unset when nothing matches', async () => {
      const { job } = buildJob();

      expect(
        await job.resolveEmail({ mailMapPath: '/etc/maps/mail.json' }),
      ).toBeNull();
      expect(job.settings.has('notifyUser')).toBe(false);
    });
  });

  describe('saveSubmitFile', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'condor-jobs-job-'));
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should write the preview without consuming it', async () => {
      const { job } = buildJob();
      await job.enqueue('hostname');
      job.settings.setOutput('out.txt');
      const path = join(testDir, 'job.sub');

      await job.saveSubmitFile(path);
      expect(readFileSync(path, 'utf-8')).toBe(
        DEFAULT_STANZA +
          'transfer_executable = false\nExecutable = /bin/hostname\nQueue\nOutput = out.txt\n',
      );
      expect(job.settings.getOutput()).toBe('out.txt');
    });
  });

  it('should describe itself', () => {
    const { job } = buildJob();

    expect(job.toString()).toBe(
      '<Job: alice@central\nUniverse = vanilla\nrequest_cpus = 1\nrequest_memory = 1024\nrequest_disk = 32>',
    );
  });

  it('should apply configured universe and resources', () => {
    const { job } = buildJob(scheduler(), {
      universe: 'java',
      resources: { cpus: 4, memoryMb: 8192, diskMb: 100 },
    });

    expect(job.preview()).toBe(
      'Universe = java\nrequest_cpus = 4\nrequest_memory = 8192\nrequest_disk = 100\n',
    );
  });
});

describe('countClusterProcesses', () => {
  it('should count only lines of the cluster', () => {
    expect(countClusterProcesses('7.0\n17.0\n 7.1 \n70.2\n', 7)).toBe(2);
    expect(countClusterProcesses('42.0 42.1', 42)).toBe(2);
    expect(countClusterProcesses('42.0n42.1n142.0n', 42)).toBe(2);
    expect(countClusterProcesses('', 7)).toBe(0);
  });
});

describe('createJob', () => {
  const mapCommand = "cat '/etc/condor-jobs/mail-map.json'";

  function createLauncher(replies: Record<string, FakeReply>) {
    const launched: string[] = [];
    const launcher: Launcher = (command) => {
      launched.push(command);
      const reply = replies[command] ?? { exitCode: 1 };
      return createFakeProcess({
        command,
        output: reply.output,
        exitCode: reply.exitCode ?? 0,
        exited: true,
      });
    };
    return { launcher, launched };
  }

  it('should submit locally when the binary is here and the identity matches', async () => {
    const { launcher, launched } = createLauncher({
      "which 'condor_submit'": { output: '/usr/bin/condor_submit' },
      [mapCommand]: { output: '{"alice": "alice@example.org"}' },
    });
    const job = await createJob(condorConfigSchema.parse({ server: 'central' }), {
      identity: fixedIdentity('alice'),
      launcher,
      logger: createTestLogger().logger,
    });

    expect(job.runner.local).toBe(true);
    expect(job.username).toBe('alice');
    expect(job.settings.getNotifyUser()).toBe('alice@example.org');
    expect(launched).toEqual(["which 'condor_submit'", mapCommand]);
  });

  it('should log in to the server when the binary is missing', async () => {
    const { launcher, launched } = createLauncher({});
    const job = await createJob(condorConfigSchema.parse({ server: 'central' }), {
      identity: fixedIdentity('alice'),
      launcher,
      logger: createTestLogger().logger,
    });

    expect(job.runner.local).toBe(false);
    expect(launched).toEqual([
      "which 'condor_submit'",
      `ssh -o BatchMode=yes alice@central ${shellQuote(mapCommand)}`,
    ]);
  });

  it('should log in as another submission identity', async () => {
    const { launcher, launched } = createLauncher({
      "which 'condor_submit'": { output: '/usr/bin/condor_submit' },
    });
    const job = await createJob(
      condorConfigSchema.parse({
        server: 'central',
        username: 'bob',
        notifications: { fallbackAddress: 'ops@example.org' },
      }),
      {
        identity: fixedIdentity('alice'),
        launcher,
        logger: createTestLogger().logger,
      },
    );

    expect(job.runner.local).toBe(false);
    expect(job.username).toBe('bob');
    expect(job.settings.getNotifyUser()).toBe('ops@example.org');
    expect(launched.at(-1)).toBe(
      `ssh -o BatchMode=yes bob@central ${shellQuote(mapCommand)}`,
    );
  });

  it('should skip the address map for an explicit address or an existing cluster', async () => {
    const { launcher, launched } = createLauncher({
      "which 'condor_submit'": { output: '/usr/bin/condor_submit' },
    });
    const config = condorConfigSchema.parse({});
    const logger = createTestLogger().logger;

    const explicit = await createJob(config, {
      email: 'me@example.org',
      identity: fixedIdentity('alice'),
      launcher,
      logger,
    });
    const observer = await createJob(config, {
      clusterId: 7,
      identity: fixedIdentity('alice'),
      launcher,
      logger,
    });

    expect(explicit.settings.getNotifyUser()).toBe('me@example.org');
    expect(observer.clusterId).toBe(7);
    expect(observer.settings.has('notifyUser')).toBe(false);
    expect(launched).toEqual(["which 'condor_submit'", "which 'condor_submit'"]);
  });
});
