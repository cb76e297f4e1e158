/**
 * @module commands/jobs
 *
 * CLI commands: submit, poll, wait, status.
 */

import { resolve } from 'node:path';

import { type Command, InvalidArgumentError } from 'commander';

import { loadConfig } from '../../../lib/config.js';
import { createLogger } from '../../../lib/logger.js';
import type { Launcher } from '../../../shell/command-runner.js';
import type { IdentityResolver } from '../../../shell/identity.js';
import { enqueueBatch, readBatchFile } from '../../../submit/batch.js';
import { createJob } from '../../../submit/job.js';

/** Collaborators of the job commands; tests replace them. */
export interface JobCommandDeps {
  identity?: IdentityResolver;
  launcher?: Launcher;
  sleep?: (ms: number) => Promise<void>;
}

/** Options shared by commands that accept --config. */
interface ConfigOptions {
  config?: string;
}

/** Options for the submit command. */
interface SubmitOptions extends ConfigOptions {
  dryRun?: boolean;
  save?: string;
  wait?: boolean;
  email?: string;
}

/** Parse a cluster id argument. */
export function parseClusterId(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Cluster id must be a non-negative integer.');
  }
  return Number(value);
}

/** Register job commands on the CLI. */
export function registerJobCommands(
  cli: Command,
  deps: JobCommandDeps = {},
): void {
  /** Build a job for an existing cluster. */
  const observe = (cluster: number, options: ConfigOptions) => {
    const config = loadConfig(options.config);
    return createJob(config, {
      ...deps,
      clusterId: cluster,
      logger: createLogger(config.log),
    });
  };

  cli
    .command('submit')
    .description('Enqueue every entry of a batch file and submit them as one cluster')
    .argument('<batch-file>', 'Path to a JSON batch description')
    .option('-c, --config <path>', 'Path to config file')
    .option('--dry-run', 'Print the submission description instead of submitting')
    .option('--save <path>', 'Also write the submission description to a file')
    .option('--wait', 'Wait for the cluster to leave the queue')
    .option('--email <address>', 'Notification address (skips the address map)')
    .action(async (batchFile: string, options: SubmitOptions) => {
      const config = loadConfig(options.config);
      const logger = createLogger(config.log);
      const batch = await readBatchFile(resolve(batchFile));
      const job = await createJob(config, {
        ...deps,
        email: options.email,
        logger,
      });
      const stanzas = await enqueueBatch(job, batch);

      if (options.save) {
        const savePath = resolve(options.save);
        await job.saveSubmitFile(savePath);
        console.log(`✅ Wrote ${savePath}`);
      }

      if (options.dryRun) {
        process.stdout.write(job.preview());
        return;
      }

      const cluster = await job.submit();
      if (cluster === null) {
        console.error('❌ Submission failed; the job was probably not submitted');
        process.exitCode = 1;
        return;
      }
      console.log(
        `✅ Submitted ${String(stanzas)} stanza(s) as cluster ${String(cluster)}`,
      );

      if (options.wait) {
        const polls = await job.wait();
        console.log(
          `Cluster ${String(cluster)} finished after ${String(polls)} poll(s)`,
        );
      }
    });

  cli
    .command('poll')
    .description('Show how many processes of a cluster are still queued')
    .argument('<cluster>', 'Cluster id', parseClusterId)
    .option('-c, --config <path>', 'Path to config file')
    .action(async (cluster: number, options: ConfigOptions) => {
      const job = await observe(cluster, options);
      console.log(String(await job.poll()));
    });

  cli
    .command('wait')
    .description('Wait until a cluster has left the queue')
    .argument('<cluster>', 'Cluster id', parseClusterId)
    .option('-c, --config <path>', 'Path to config file')
    .action(async (cluster: number, options: ConfigOptions) => {
      const job = await observe(cluster, options);
      const polls = await job.wait();
      console.log(
        `Cluster ${String(cluster)} finished after ${String(polls)} poll(s)`,
      );
    });

  cli
    .command('status')
    .description('Print the queue-status table of a cluster')
    .argument('<cluster>', 'Cluster id', parseClusterId)
    .option('-c, --config <path>', 'Path to config file')
    .action(async (cluster: number, options: ConfigOptions) => {
      const job = await observe(cluster, options);
      await job.status();
    });
}
