import type { PluginDiscoveryProvider } from '../../application/plugin-manager.js';

/** A module value, or a loader such as `() => import('./plugins/github.js')`. */
export type PluginEntry = unknown;

function isLoader(entry: PluginEntry): entry is () => unknown {
  return typeof entry === 'function';
}

/**
 * Compiled-in plugin table.
 *
 * A function entry is a lazy loader and is called on resolve; anything
 * else is the module itself.
 */
export class StaticPluginProvider implements PluginDiscoveryProvider {
  private readonly entries: ReadonlyMap<string, PluginEntry>;

  constructor(entries: Readonly<Record<string, PluginEntry>>) {
    this.entries = new Map(Object.entries(entries));
  }

  listKeys(): Iterable<string> {
    return this.entries.keys();
  }

  resolve(key: string): unknown {
    if (!this.entries.has(key)) {
      throw new Error(`No plugin named "${key}" in the static table`);
    }
    const entry = this.entries.get(key);
    return isLoader(entry) ? entry() : entry;
  }
}
