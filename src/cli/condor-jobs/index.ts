#!/usr/bin/env node
/**
 * CLI entry point for condor-jobs.
 *
 * @module
 */

import { Command } from 'commander';

import { loadConfig } from '../../lib/config.js';
import { createLogger } from '../../lib/logger.js';
import { createShell } from '../../shell/command-runner.js';
import { executeInteractive } from '../../shell/interactive.js';
import { registerConfigCommands } from './commands/config.js';
import { registerJobCommands } from './commands/jobs.js';
import { registerMailMapCommands } from './commands/mail-map.js';

/** Options for the exec command. */
interface ExecOptions {
  config?: string;
  host?: string;
  user?: string;
  interactive?: boolean;
}

const program = new Command();

program
  .name('condor-jobs')
  .description('Build, submit and watch Condor batch jobs')
  .version('0.1.0');

registerJobCommands(program);

program
  .command('exec')
  .description('Run a command on this host or through a remote login')
  .argument('<command>', 'Command line, interpreted by the target shell')
  .option('--host <host>', 'Remote host (default: this host)')
  .option('--user <user>', 'Remote account (default: the local account)')
  .option('-i, --interactive', 'Drive the running process from a menu')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (command: string, options: ExecOptions) => {
    const config = loadConfig(options.config);
    const logger = createLogger(config.log);
    const runner = createShell({
      host: options.host,
      user: options.user,
      login: config.ssh,
      logger,
    });

    if (options.interactive) {
      process.exitCode = await executeInteractive(runner, command, undefined, {
        logger,
      });
      return;
    }

    const { exitCode, output } = await runner.execute(command);
    if (output) console.log(output);
    process.exitCode = exitCode;
  });

registerMailMapCommands(program);
registerConfigCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
