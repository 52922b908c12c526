import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError, describeCause } from '../../domain/index.js';
import { parseDispatchConfig } from '../../application/config-schema.js';
import type { DispatchConfig } from '../../application/config-schema.js';

export const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'hookbus.json');

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Loads the dispatch configuration from a JSON file.
 *
 * A missing file yields the defaults. Unreadable JSON or values the
 * schema rejects raise ConfigError; keys absent from the file get their
 * default values.
 */
export function loadConfigFile(configPath?: string): DispatchConfig {
  const filePath = configPath ?? DEFAULT_CONFIG_PATH;

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) return parseDispatchConfig({});
    throw new ConfigError(`Cannot read ${filePath}: ${describeCause(err)}`, [], err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigError(`${filePath} is not valid JSON: ${describeCause(err)}`, [], err);
  }

  return parseDispatchConfig(raw);
}
