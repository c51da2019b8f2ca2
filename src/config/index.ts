import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import {
  ConfigMissingError,
  ConfigParseError,
  ConfigInvalidError,
  formatIssues,
} from '../errors/index.js';

export type { Config } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

/**
 * Load and validate the service configuration.
 *
 * The path can be overridden with LEDGER_CONFIG; an explicit argument wins
 * over both.
 */
export function loadConfig(
  configPath: string = process.env.LEDGER_CONFIG ?? DEFAULT_CONFIG_PATH
): Config {
  // Check file exists
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  // Read and parse JSON
  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  // Validate with Zod
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigInvalidError(formatIssues(result.error));
  }

  return result.data;
}
