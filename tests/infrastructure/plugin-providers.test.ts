import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  CompositePluginProvider,
  DirectoryPluginProvider,
  StaticPluginProvider,
} from '../../src/infrastructure/plugins/index.js';
import { isEventDefinition } from '../../src/domain/index.js';
import { EventBus } from '../../src/application/event-bus.js';
import { PatternRegistry } from '../../src/application/pattern-registry.js';
import { PluginManager } from '../../src/application/plugin-manager.js';
import { fakeLogger, testConfig } from '../helpers.js';

const FIXTURES = fileURLToPath(new URL('../fixtures/plugins/', import.meta.url));
const TMP_DIR = join(process.cwd(), '.tmp-test-plugins');

function writeTmpFiles(names: readonly string[]): string {
  mkdirSync(TMP_DIR, { recursive: true });
  for (const name of names) {
    writeFileSync(join(TMP_DIR, name), 'export {};\n', 'utf-8');
  }
  return TMP_DIR;
}

describe('StaticPluginProvider', () => {
  it('lists its table keys and resolves plain modules', () => {
    const module = { version: '1.0.0' };
    const provider = new StaticPluginProvider({ alpha: module, beta: {} });

    expect([...provider.listKeys()]).toEqual(['alpha', 'beta']);
    expect(provider.resolve('alpha')).toBe(module);
  });

  it('calls lazy loaders on resolve', async () => {
    const module = { version: '2.0.0' };
    const provider = new StaticPluginProvider({ lazy: () => Promise.resolve(module) });

    await expect(provider.resolve('lazy')).resolves.toBe(module);
  });

  it('throws for unknown keys', () => {
    const provider = new StaticPluginProvider({});
    expect(() => provider.resolve('nope')).toThrow('No plugin named "nope" in the static table');
  });
});

describe('DirectoryPluginProvider', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('lists module files, skipping private files, declarations and other extensions', () => {
    const dir = writeTmpFiles(['beta.mjs', 'alpha.js', 'alpha.mjs', '_private.js', 'types.d.ts', 'notes.txt']);
    const provider = new DirectoryPluginProvider(dir, { extensions: ['.js', '.mjs', '.ts'] });

    expect([...provider.listKeys()]).toEqual(['alpha', 'beta']);
  });

  it('lists the checked-in TypeScript plugins', () => {
    const provider = new DirectoryPluginProvider(FIXTURES, { extensions: ['.ts'] });
    expect([...provider.listKeys()]).toEqual(['audit', 'deploy']);
  });

  it('defaults to JavaScript extensions', () => {
    const provider = new DirectoryPluginProvider(FIXTURES);
    expect([...provider.listKeys()]).toEqual([]);
  });

  it('imports a plugin module by name', async () => {
    const provider = new DirectoryPluginProvider(FIXTURES, { extensions: ['.ts'] });

    const module: unknown = await provider.resolve('audit');

    expect(module).toHaveProperty('version', '0.1.0');
    expect(module).toHaveProperty('AuditEntry');
    if (typeof module !== 'object' || module === null || !('AuditEntry' in module)) return;
    expect(isEventDefinition(module.AuditEntry)).toBe(true);
  });

  it('refuses to resolve a skipped file', async () => {
    const dir = writeTmpFiles(['_private.js']);
    const provider = new DirectoryPluginProvider(dir);

    await expect(provider.resolve('_private')).rejects.toThrow(`No plugin named "_private" in ${dir}`);
  });

  it('offers nothing for a missing directory', () => {
    const provider = new DirectoryPluginProvider(join(FIXTURES, 'does-not-exist'));
    expect([...provider.listKeys()]).toEqual([]);
  });
});

describe('CompositePluginProvider', () => {
  it('merges keys and lets the first provider owning a key resolve it', () => {
    const first = { name: 'first' };
    const second = { name: 'second' };
    const provider = new CompositePluginProvider([
      new StaticPluginProvider({ shared: first, one: {} }),
      new StaticPluginProvider({ shared: second, two: {} }),
    ]);

    expect([...provider.listKeys()]).toEqual(['shared', 'one', 'two']);
    expect(provider.resolve('shared')).toBe(first);
  });

  it('throws when no provider offers the key', () => {
    const provider = new CompositePluginProvider([new StaticPluginProvider({})]);
    expect(() => provider.resolve('ghost')).toThrow('No provider offers a plugin named "ghost"');
  });
});

describe('directory plugins through the manager', () => {
  it('loads named and default-export plugin modules from disk', async () => {
    const log = fakeLogger();
    const registry = new PatternRegistry(log);
    const bus = new EventBus(registry, { config: testConfig(), log });
    const plugins = new PluginManager(bus, new DirectoryPluginProvider(FIXTURES, { extensions: ['.ts'] }), log);

    const outcomes = await plugins.loadAll();

    expect(outcomes.map((o) => [o.name, o.ok])).toEqual([['audit', true], ['deploy', true]]);
    expect(registry.names()).toEqual(['AuditEntry', 'Deployment']);
    expect(bus.handlers().map((h) => h.name)).toEqual(['recordAudit', 'announceDeployment']);
    expect(plugins.getPluginInfo('audit')?.version).toBe('0.1.0');
    expect(plugins.getPluginInfo('deploy')?.description).toBe('Deployment hooks');

    await plugins.unloadAll();
    expect(registry.size).toBe(0);
  });
});
