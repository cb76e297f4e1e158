/**
 * @module commands/config
 *
 * CLI commands: validate, init, config-show.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Command } from 'commander';

import { condorConfigSchema } from '../../../schemas/config.js';

/** Minimal starter config template. */
const INIT_CONFIG_TEMPLATE = {
  server: 'localhost',
  universe: 'vanilla',
  maxPollIntervalMs: 30000,
  resources: {
    cpus: 1,
    memoryMb: 1024,
    diskMb: 32,
  },
  notifications: {
    mailMapPath: '/etc/condor-jobs/mail-map.json',
  },
  log: {
    level: 'info',
  },
};

function readConfigFile(path: string) {
  const raw = readFileSync(resolve(path), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return condorConfigSchema.parse(parsed);
}

function reportInvalid(error: unknown): void {
  if (error instanceof SyntaxError) {
    console.error(`❌ Invalid JSON: ${error.message}`);
  } else {
    console.error('❌ Config invalid:', error);
  }
  process.exitCode = 1;
}

/** Register config-related commands on the CLI. */
export function registerConfigCommands(cli: Command): void {
  cli
    .command('validate')
    .description('Validate a configuration file against the schema')
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) => {
      try {
        const config = readConfigFile(options.config);

        console.log('✅ Config valid');
        console.log(`  Server: ${config.server}`);
        console.log(`  Username: ${config.username ?? '(local account)'}`);
        console.log(`  Universe: ${config.universe}`);
        console.log(
          `  Resources: ${String(config.resources.cpus)} CPU, ${String(config.resources.memoryMb)} MB memory, ${String(config.resources.diskMb)} MB disk`,
        );
        console.log(`  Max poll interval: ${String(config.maxPollIntervalMs)} ms`);
        console.log(`  Log level: ${config.log.level}`);
        if (config.log.file) {
          console.log(`  Log file: ${config.log.file}`);
        }
      } catch (error) {
        reportInvalid(error);
      }
    });

  cli
    .command('init')
    .description('Generate a starter configuration file')
    .option(
      '-o, --output <path>',
      'Output config file path',
      'condor-jobs.config.json',
    )
    .action((options: { output: string }) => {
      const outputPath = resolve(options.output);

      if (existsSync(outputPath)) {
        console.error(`❌ File already exists: ${outputPath}`);
        console.error('   Remove it first or choose a different path with -o');
        process.exitCode = 1;
        return;
      }

      writeFileSync(
        outputPath,
        JSON.stringify(INIT_CONFIG_TEMPLATE, null, 2) + '\n',
      );
      console.log(`✅ Wrote ${outputPath}`);
      console.log();
      console.log('Next steps:');
      console.log('  1. Set the scheduler host and your submission identity');
      console.log('  2. Validate: condor-jobs validate -c ' + options.output);
      console.log(
        '  3. Submit: condor-jobs submit batch.json -c ' + options.output,
      );
    });

  cli
    .command('config-show')
    .description('Show the resolved configuration (defaults applied)')
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) => {
      try {
        console.log(JSON.stringify(readConfigFile(options.config), null, 2));
      } catch (error) {
        reportInvalid(error);
      }
    });
}
