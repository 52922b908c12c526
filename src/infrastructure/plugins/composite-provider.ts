import type { PluginDiscoveryProvider } from '../../application/plugin-manager.js';

/** Chains providers. A key is owned by the first provider listing it. */
export class CompositePluginProvider implements PluginDiscoveryProvider {
  private readonly providers: readonly PluginDiscoveryProvider[];

  constructor(providers: readonly PluginDiscoveryProvider[]) {
    this.providers = providers;
  }

  listKeys(): Iterable<string> {
    const keys = new Set<string>();
    for (const provider of this.providers) {
      for (const key of provider.listKeys()) keys.add(key);
    }
    return keys;
  }

  resolve(key: string): unknown {
    for (const provider of this.providers) {
      if ([...provider.listKeys()].includes(key)) return provider.resolve(key);
    }
    throw new Error(`No provider offers a plugin named "${key}"`);
  }
}
