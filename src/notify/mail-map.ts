/**
 * Notification-address map: a JSON object from submission identity to e-mail address, with `*` as the default entry.
 */

import { readFile, writeFile } from 'node:fs/promises';

import { z } from 'zod';

import type { CommandRunner } from '../shell/command-runner.js';
import { shellQuote } from '../shell/quote.js';

/** Key of the entry used for identities without their own address. */
export const DEFAULT_MAIL_KEY = '*';

/** Map schema: identity to address. */
export const mailMapSchema = z.record(z.string(), z.string().min(1));

export type MailMap = z.infer<typeof mailMapSchema>;

/** Result of an address lookup. */
export interface AddressMatch {
  address: string;
  /** Whether the identity had its own entry or fell back to the default. */
  source: 'user' | 'default';
}

/** Parse and validate map text. */
export function parseMailMap(text: string): MailMap {
  return mailMapSchema.parse(JSON.parse(text));
}

/**
 * Read the map through `runner`, so a remote submit host's map is read there. Returns null when the map cannot be read.
 */
export async function loadMailMap(
  runner: CommandRunner,
  path: string,
): Promise<MailMap | null> {
  const { exitCode, output } = await runner.executeBytes(
    `cat ${shellQuote(path)}`,
  );
  if (exitCode !== 0) return null;
  return parseMailMap(output.toString('utf8'));
}

/** Address for `username`: its own entry, else the default entry, else null. */
export function lookupAddress(
  map: MailMap,
  username: string,
): AddressMatch | null {
  const own = Object.hasOwn(map, username) ? map[username] : undefined;
  if (own !== undefined) return { address: own, source: 'user' };
  const fallback = map[DEFAULT_MAIL_KEY];
  if (fallback !== undefined) return { address: fallback, source: 'default' };
  return null;
}

/** Read a local map file. A missing file is an empty map. */
export async function readMailMapFile(path: string): Promise<MailMap> {
  try {
    return parseMailMap(await readFile(path, 'utf-8'));
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'ENOENT'
    ) {
      return {};
    }
    throw error;
  }
}

/** Write a local map file with keys in sorted order. */
export async function writeMailMapFile(
  path: string,
  map: MailMap,
): Promise<void> {
  const sorted = Object.fromEntries(
    Object.entries(map).sort(([a], [b]) => a.localeCompare(b)),
  );
  await writeFile(path, JSON.stringify(sorted, null, 2) + '\n');
}
