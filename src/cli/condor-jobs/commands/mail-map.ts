/**
 * @module commands/mail-map
 *
 * CLI commands for editing the notification-address map file.
 */

import { resolve } from 'node:path';

import type { Command } from 'commander';

import { loadConfig } from '../../../lib/config.js';
import {
  DEFAULT_MAIL_KEY,
  readMailMapFile,
  writeMailMapFile,
} from '../../../notify/mail-map.js';

/** Options shared by the mail-map commands. */
interface MapOptions {
  config?: string;
  file?: string;
}

function mapPath(options: MapOptions): string {
  return resolve(
    options.file ?? loadConfig(options.config).notifications.mailMapPath,
  );
}

/** Register mail-map commands on the CLI. */
export function registerMailMapCommands(cli: Command): void {
  const mailMap = cli
    .command('mail-map')
    .description(
      `Edit the notification-address map (${DEFAULT_MAIL_KEY} is the default entry)`,
    );

  mailMap
    .command('show')
    .description('List every entry')
    .option('-f, --file <path>', 'Map file (defaults to the configured path)')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: MapOptions) => {
      const map = await readMailMapFile(mapPath(options));
      const names = Object.keys(map).sort((a, b) => a.localeCompare(b));
      if (names.length === 0) {
        console.log('No entries');
        return;
      }
      for (const name of names) {
        console.log(`${name}\t${map[name] ?? ''}`);
      }
    });

  mailMap
    .command('set')
    .description('Add or replace the address of a username')
    .argument('<username>', `Username, or ${DEFAULT_MAIL_KEY} for the default`)
    .argument('<address>', 'Notification address')
    .option('-f, --file <path>', 'Map file (defaults to the configured path)')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (username: string, address: string, options: MapOptions) => {
      const path = mapPath(options);
      const map = await readMailMapFile(path);
      map[username] = address;
      await writeMailMapFile(path, map);
      console.log(`✅ ${username} -> ${address}`);
    });

  mailMap
    .command('remove')
    .description('Remove the entry of a username')
    .argument('<username>', 'Username')
    .option('-f, --file <path>', 'Map file (defaults to the configured path)')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (username: string, options: MapOptions) => {
      const path = mapPath(options);
      const map = await readMailMapFile(path);
      if (!Object.hasOwn(map, username)) {
        console.error(`❌ No entry for ${username}`);
        process.exitCode = 1;
        return;
      }
      const remaining = Object.fromEntries(
        Object.entries(map).filter(([name]) => name !== username),
      );
      await writeMailMapFile(path, remaining);
      console.log(`✅ Removed ${username}`);
    });
}
