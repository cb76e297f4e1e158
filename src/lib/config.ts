/**
 * Configuration file loading.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { type CondorConfig, condorConfigSchema } from '../schemas/config.js';

/** Load and validate config from a JSON file path, or return defaults. */
export function loadConfig(configPath?: string): CondorConfig {
  if (configPath) {
    const raw = readFileSync(resolve(configPath), 'utf-8');
    return condorConfigSchema.parse(JSON.parse(raw));
  }
  return condorConfigSchema.parse({});
}
