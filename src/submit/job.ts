/**
 * A Condor job: stanzas are enqueued into one submission description, submitted as a cluster, then observed through the queue-status command.
 *
 * @module
 */

import { writeFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from 'pino';

import {
  AlreadySubmittedError,
  BadFormatError,
  BadQuotes,
  InvalidSettingError,
  SubmissionError,
} from '../lib/errors.js';
import { defaultLogger } from '../lib/logger.js';
import { loadMailMap, lookupAddress } from '../notify/mail-map.js';
import type { CondorConfig } from '../schemas/config.js';
import {
  type CommandRunner,
  createLocalShell,
  createRemoteShell,
  type Launcher,
} from '../shell/command-runner.js';
import {
  createIdentityResolver,
  type IdentityResolver,
} from '../shell/identity.js';
import { shellQuote } from '../shell/quote.js';
import { hasUnescapedQuote, splitCommandLine } from './command-line.js';
import { SubmissionSettings } from './settings.js';

/** First wait() interval. */
const INITIAL_POLL_INTERVAL_MS = 1000;

/** Growth of the wait() interval per round. */
const POLL_INTERVAL_STEP_MS = 500;

/** Default resource requests of every new job. */
export interface JobResources {
  cpus: number;
  memoryMb: number;
  diskMb: number;
}

/** Scheduler binaries. */
export interface JobBinaries {
  submit: string;
  queue: string;
}

/** Where the notification address comes from. */
export interface NotificationOptions {
  mailMapPath: string;
  fallbackAddress?: string;
}

export interface JobParams {
  /** Runner on the submit host. */
  runner: CommandRunner;
  /** Scheduler host given to `-remote`. */
  server: string;
  /** Submission identity. */
  username: string;
  universe?: string;
  resources?: JobResources;
  binaries?: JobBinaries;
  /** Upper bound of the wait() interval. */
  maxPollIntervalMs?: number;
  /** Cluster submitted earlier, for a job that only observes. */
  clusterId?: number;
  /** Pause between wait() polls. */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** Occurrences of `<cluster>.` in a compact queue reply; `142.` does not count for cluster 42. */
export function countClusterProcesses(reply: string, clusterId: number): number {
  const pattern = new RegExp(`(?<!\\d)${String(clusterId)}\\.`, 'g');
  return reply.match(pattern)?.length ?? 0;
}

export class Job {
  /** Attributes of the stanza being built, and the description flushed so far. */
  readonly settings = new SubmissionSettings();
  readonly runner: CommandRunner;
  readonly server: string;
  readonly username: string;

  private cluster: number | null;
  private executablePath: string | null = null;
  private readonly binaries: JobBinaries;
  private readonly maxPollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(params: JobParams) {
    this.runner = params.runner;
    this.server = params.server;
    this.username = params.username;
    this.cluster = params.clusterId ?? null;
    this.binaries = params.binaries ?? {
      submit: 'condor_submit',
      queue: 'condor_q',
    };
    this.maxPollIntervalMs = params.maxPollIntervalMs ?? 30000;
    this.sleep = params.sleep ?? ((ms) => delay(ms));
    this.logger = params.logger ?? defaultLogger;

    const resources = params.resources ?? { cpus: 1, memoryMb: 1024, diskMb: 32 };
    this.settings.setUniverse(params.universe ?? 'vanilla');
    this.settings.setCpus(resources.cpus);
    this.settings.setMemory(resources.memoryMb);
    this.settings.setDisk(resources.diskMb);
  }

  /** Cluster id assigned by submit(), or given at construction. */
  get clusterId(): number | null {
    return this.cluster;
  }

  /**
   * Locate `name` on the submit host: as given when it exists relative to the working directory, else through `which`. An executable found nowhere is used unresolved.
   */
  async resolveExecutable(name: string): Promise<string> {
    const quoted = shellQuote(name);
    const listed = await this.runner.execute(`ls ${quoted}`);
    if (listed.exitCode === 0) return name;

    const found = await this.runner.execute(`which ${quoted}`);
    if (found.exitCode === 0 && found.output) return found.output.trim();

    this.logger.warn({ executable: name }, 'Could not find executable');
    return name;
  }

  /** Resolve and set the executable of the current stanza. */
  async setExecutable(name: string): Promise<void> {
    const path = await this.resolveExecutable(name);
    if (path.replace(/\\\//g, '').includes('/')) {
      this.settings.setTransferExecutable(false);
    }

    if (this.executablePath !== null && this.executablePath !== path) {
      this.logger.warn(
        { first: this.executablePath, executable: path },
        'Only one executable should be used per submission',
      );
    }
    this.executablePath ??= path;
    this.settings.setExecutable(path);
  }

  /**
   * Close the current stanza with `commandLine` and queue it `times` times.
   *
   * Double quotes must be written as `""` or `\"`; quote arguments with single quotes instead.
   */
  async enqueue(commandLine: string, times = 1): Promise<void> {
    if (!Number.isInteger(times) || times < 1) {
      throw new InvalidSettingError(
        'Queue',
        `${String(times)} is not a positive integer`,
      );
    }

    const line = commandLine.trim();
    if (hasUnescapedQuote(line)) throw new BadQuotes('"');

    const { executable, arguments: args } = splitCommandLine(line);
    await this.setExecutable(executable);
    if (args) this.settings.setArguments(args);

    this.settings.flush();
    this.settings.appendDirective(times === 1 ? 'Queue' : `Queue ${String(times)}`);
  }

  /**
   * Send the description to the scheduler.
   *
   * @returns The cluster id, or null when the submit command failed. A failed submission may still have registered on the scheduler; this job cannot observe it.
   */
  async submit(): Promise<number | null> {
    if (this.cluster !== null) throw new AlreadySubmittedError(this.cluster);

    const description = this.settings.flush();
    const { exitCode, output } = await this.runner.execute(
      `${this.binaries.submit} -remote ${this.server}`,
      description,
    );

    if (exitCode !== 0) {
      this.logger.error(
        { exitCode, output, server: this.server },
        `${this.binaries.submit} returned an error; the job was probably not submitted`,
      );
      return null;
    }

    const id = /cluster (\d+)/.exec(output)?.[1];
    if (id === undefined) throw new BadFormatError(this.binaries.submit);

    this.cluster = Number(id);
    this.logger.info({ cluster: this.cluster, output }, 'Job submitted');
    return this.cluster;
  }

  /** Number of processes of the cluster still in the queue. */
  async poll(): Promise<number> {
    const id = this.requireCluster('poll()');
    return countClusterProcesses(await this.queryQueue(id), id);
  }

  /**
   * Poll until the cluster has left the queue. The pause between polls starts at one second and grows by half a second per round, up to the configured maximum.
   *
   * @returns The number of polls issued.
   */
  async wait(): Promise<number> {
    const id = this.requireCluster('wait()');
    let interval = INITIAL_POLL_INTERVAL_MS;
    let polls = 1;
    let remaining = countClusterProcesses(await this.queryQueue(id), id);

    while (remaining > 0) {
      this.logger.debug({ cluster: id, remaining }, 'Waiting for cluster');
      await this.sleep(Math.min(interval, this.maxPollIntervalMs));
      interval += POLL_INTERVAL_STEP_MS;
      remaining = countClusterProcesses(await this.queryQueue(id), id);
      polls += 1;
    }

    this.logger.info({ cluster: id, polls }, 'Cluster finished');
    return polls;
  }

  /** Print the queue-status table of the cluster. */
  status(): Promise<void>;
  /** Pass the queue-status table of the cluster through `formatter`. */
  status<T>(formatter: (reply: string) => T): Promise<T>;
  async status<T>(formatter?: (reply: string) => T): Promise<T | void> {
    const id = this.requireCluster('status()');
    const { exitCode, output } = await this.runner.execute(
      `${this.binaries.queue} ${String(id)}`,
    );
    if (exitCode !== 0) {
      this.logger.error({ exitCode, output }, 'Queue status query failed');
      throw new BadFormatError(this.binaries.queue);
    }

    if (formatter) return formatter(output);
    console.log(output);
  }

  /**
   * Fill in the notification address from the address map on the submit host, falling back to `fallbackAddress`.
   *
   * @returns The address set, or null when none was found.
   */
  async resolveEmail(options: NotificationOptions): Promise<string | null> {
    let address = options.fallbackAddress ?? null;
    const map = await loadMailMap(this.runner, options.mailMapPath);

    if (map === null) {
      this.logger.debug(
        { path: options.mailMapPath },
        'Notification address map unavailable',
      );
    } else {
      const match = lookupAddress(map, this.username);
      if (match?.source !== 'user') {
        this.logger.warn(
          { username: this.username },
          'Username not in notification address map; using a default address',
        );
      }
      if (match) address = match.address;
    }

    if (address !== null) this.settings.setNotifyUser(address);
    return address;
  }

  /** Description as it would be submitted now. Changes nothing. */
  preview(): string {
    return this.settings.flush(false);
  }

  /** Write the preview to `path` for manual submission. */
  async saveSubmitFile(path: string): Promise<void> {
    await writeFile(path, this.preview());
  }

  toString(): string {
    return `<Job: ${this.username}@${this.server}\n${this.preview().trim()}>`;
  }

  private requireCluster(operation: string): number {
    if (this.cluster === null) throw new SubmissionError(operation);
    return this.cluster;
  }

  /** Compact `<cluster>.<proc>` listing of the cluster. */
  private async queryQueue(id: number): Promise<string> {
    const { exitCode, output } = await this.runner.execute(
      `${this.binaries.queue} ${String(id)} -format "%d." ClusterId -format "%d\\n" ProcId`,
    );
    if (exitCode !== 0) {
      this.logger.error({ exitCode, output }, 'Queue query failed');
      throw new BadFormatError(this.binaries.queue);
    }
    return output;
  }
}

/** Overrides for createJob. */
export interface JobOverrides {
  /** Notification address; skips the address map. */
  email?: string;
  /** Observe a cluster submitted earlier. */
  clusterId?: number;
  identity?: IdentityResolver;
  launcher?: Launcher;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Build a job from configuration. Submission runs on this host when the submit binary is installed here and the submission identity is the local one; otherwise it runs on the server through a remote login as that identity.
 */
export async function createJob(
  config: CondorConfig,
  overrides: JobOverrides = {},
): Promise<Job> {
  const logger = overrides.logger ?? defaultLogger;
  const identity = overrides.identity ?? createIdentityResolver();
  const localUser = await identity();
  const username = config.username ?? localUser;

  const localShell = createLocalShell({ launcher: overrides.launcher, logger });
  const check = await localShell.execute(
    `which ${shellQuote(config.binaries.submit)}`,
  );
  const runner =
    check.exitCode === 0 && username === localUser
      ? localShell
      : createRemoteShell({
          host: config.server,
          user: username,
          login: config.ssh,
          launcher: overrides.launcher,
          logger,
        });
  logger.debug({ runner: runner.toString() }, 'Submission runner selected');

  const job = new Job({
    runner,
    server: config.server,
    username,
    universe: config.universe,
    resources: config.resources,
    binaries: config.binaries,
    maxPollIntervalMs: config.maxPollIntervalMs,
    clusterId: overrides.clusterId,
    sleep: overrides.sleep,
    logger,
  });

  if (overrides.email) {
    job.settings.setNotifyUser(overrides.email);
  } else if (overrides.clusterId === undefined) {
    await job.resolveEmail(config.notifications);
  }
  return job;
}
