import { readdirSync } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { PluginDiscoveryProvider } from '../../application/plugin-manager.js';

export interface DirectoryProviderOptions {
  /** File extensions treated as plugin modules. Defaults to `.js` and `.mjs`. */
  readonly extensions?: readonly string[] | undefined;
}

/**
 * Discovers plugins as module files in a directory.
 *
 * The plugin name is the file name without its extension. Files starting
 * with `_` and declaration files are skipped. The directory is read again
 * on every `listKeys()`; a missing directory offers no plugins.
 */
export class DirectoryPluginProvider implements PluginDiscoveryProvider {
  readonly directory: string;
  private readonly extensions: readonly string[];

  constructor(directory: string, options: DirectoryProviderOptions = {}) {
    this.directory = resolve(directory);
    this.extensions = options.extensions ?? ['.js', '.mjs'];
  }

  listKeys(): Iterable<string> {
    return [...this.scan().keys()];
  }

  async resolve(key: string): Promise<unknown> {
    const file = this.scan().get(key);
    if (file === undefined) {
      throw new Error(`No plugin named "${key}" in ${this.directory}`);
    }
    return import(pathToFileURL(join(this.directory, file)).href);
  }

  private scan(): Map<string, string> {
    const files = new Map<string, string>();
    let entries: string[];
    try {
      entries = readdirSync(this.directory).sort();
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return files;
      throw err;
    }

    for (const file of entries) {
      if (file.startsWith('_') || file.endsWith('.d.ts')) continue;
      const extension = extname(file);
      if (!this.extensions.includes(extension)) continue;
      const name = basename(file, extension);
      if (!files.has(name)) files.set(name, file);
    }
    return files;
  }
}
