import type { Logger } from 'pino';
import {
  PluginLoadError,
  PluginNotLoadedError,
  describeCause,
  isEventDefinition,
  isHandlerDeclaration,
} from '../domain/index.js';
import type {
  EventDefinition,
  HandlerDeclaration,
  HandlerRegistration,
} from '../domain/index.js';
import type { AppliedChanges, EventBus } from './event-bus.js';

/**
 * Source of plugin modules.
 *
 * `listKeys()` names the plugins on offer; `resolve()` returns the module
 * for one of them, synchronously or as a promise.
 */
export interface PluginDiscoveryProvider {
  listKeys(): Iterable<string>;
  resolve(key: string): unknown;
}

/** Passed to a plugin's `init` and `cleanup` hooks. */
export interface PluginContext {
  readonly name: string;
  readonly log: Logger;
}

export type PluginHook = (context: PluginContext) => unknown;

interface PluginContents {
  readonly definitions: readonly EventDefinition[];
  readonly handlers: readonly HandlerDeclaration[];
  readonly init: PluginHook | undefined;
  readonly cleanup: PluginHook | undefined;
  readonly version: string | null;
  readonly description: string | null;
}

/** Bookkeeping for one loaded plugin: exactly what it added, and where. */
export interface PluginRecord {
  readonly name: string;
  readonly module: Readonly<Record<string, unknown>>;
  readonly loaded: true;
  readonly init: PluginHook | undefined;
  readonly cleanup: PluginHook | undefined;
  readonly definitions: readonly string[];
  readonly handlers: readonly HandlerRegistration[];
  readonly version: string | null;
  readonly description: string | null;
  readonly applied: AppliedChanges;
  /** Handler copies placed on other buses through `registerWithBus()`. */
  readonly mirrors: Map<EventBus, readonly HandlerRegistration[]>;
}

export interface PluginInfo {
  readonly name: string;
  readonly loaded: boolean;
  readonly version: string | null;
  readonly description: string | null;
  readonly definitions: readonly string[];
  readonly handlers: readonly string[];
  readonly load_error: string | null;
}

export type PluginLoadOutcome =
  | { readonly name: string; readonly ok: true; readonly info: PluginInfo }
  | { readonly name: string; readonly ok: false; readonly error: PluginLoadError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHook(value: unknown): value is PluginHook {
  return typeof value === 'function';
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Collects definitions and handler declarations from a module's exports,
 * including arrays of them and an object default export.
 */
function scanModule(module: Readonly<Record<string, unknown>>): PluginContents {
  const definitions = new Set<EventDefinition>();
  const handlers = new Set<HandlerDeclaration>();

  const visit = (value: unknown): void => {
    if (isEventDefinition(value)) definitions.add(value);
    else if (isHandlerDeclaration(value)) handlers.add(value);
  };

  const scan = (exports: Readonly<Record<string, unknown>>): void => {
    for (const value of Object.values(exports)) {
      if (Array.isArray(value)) value.forEach(visit);
      else visit(value);
    }
  };

  scan(module);

  const fallback = module['default'];
  const fromDefault = isRecord(fallback) && !isEventDefinition(fallback) && !isHandlerDeclaration(fallback)
    ? fallback
    : undefined;
  if (fromDefault !== undefined) scan(fromDefault);

  const pick = (key: string): unknown => module[key] ?? fromDefault?.[key];
  const init = pick('init');
  const cleanup = pick('cleanup');

  return {
    definitions: [...definitions],
    handlers: [...handlers],
    init: isHook(init) ? init : undefined,
    cleanup: isHook(cleanup) ? cleanup : undefined,
    version: optionalString(pick('version')),
    description: optionalString(pick('description')),
  };
}

/**
 * Loads and unloads plugin modules into one EventBus and its registry.
 *
 * Every load, unload and reload runs through a single promise queue, so
 * lifecycle operations never interleave with each other. Each mutation of
 * the bus is one synchronous `applyChanges()` / `revertChanges()` call, so
 * in-flight dispatches see a plugin either fully present or fully absent.
 */
export class PluginManager {
  private readonly bus: EventBus;
  private readonly provider: PluginDiscoveryProvider;
  private readonly log: Logger;
  private readonly records = new Map<string, PluginRecord>();
  private readonly loadErrors = new Map<string, string>();
  private queue: Promise<void> = Promise.resolve();

  constructor(bus: EventBus, provider: PluginDiscoveryProvider, log: Logger) {
    this.bus = bus;
    this.provider = provider;
    this.log = log.child({ component: 'plugin-manager' });
  }

  /** Plugin names on offer. Each iteration asks the provider again. */
  discoverPlugins(): Iterable<string> {
    const provider = this.provider;
    return {
      [Symbol.iterator]: () => provider.listKeys()[Symbol.iterator](),
    };
  }

  /** Loads a plugin. Already loaded plugins are left as they are. */
  loadPlugin(name: string): Promise<PluginInfo> {
    return this.serialize(() => this.load(name));
  }

  /**
   * Runs the plugin's cleanup hook and removes everything it added.
   * A failing cleanup is logged; the removal still happens.
   */
  unloadPlugin(name: string): Promise<void> {
    return this.serialize(() => this.unload(name));
  }

  reloadPlugin(name: string): Promise<PluginInfo> {
    return this.serialize(async () => {
      if (this.records.has(name)) await this.unload(name);
      return this.load(name);
    });
  }

  /** Loads every discovered plugin. One failure does not stop the rest. */
  loadAll(): Promise<PluginLoadOutcome[]> {
    return this.serialize(async () => {
      const outcomes: PluginLoadOutcome[] = [];
      for (const name of this.discoverPlugins()) {
        try {
          outcomes.push({ name, ok: true, info: await this.load(name) });
        } catch (err: unknown) {
          if (!(err instanceof PluginLoadError)) throw err;
          outcomes.push({ name, ok: false, error: err });
        }
      }

      const loaded = outcomes.filter((o) => o.ok).length;
      this.log.info({ discovered: outcomes.length, loaded }, 'Plugin discovery complete');
      return outcomes;
    });
  }

  /** Unloads every loaded plugin, most recently loaded first. */
  unloadAll(): Promise<void> {
    return this.serialize(async () => {
      for (const name of [...this.records.keys()].reverse()) {
        await this.unload(name);
      }
    });
  }

  /**
   * Registers every loaded plugin's handlers on another bus and returns
   * the new registrations. Definitions are not copied; the other bus'
   * registry belongs to its owner. The copies are removed again when the
   * plugin unloads. Does nothing for the bus this manager owns.
   */
  registerWithBus(bus: EventBus): HandlerRegistration[] {
    if (bus === this.bus) return [];

    const added: HandlerRegistration[] = [];
    for (const record of this.records.values()) {
      const declarations = scanModule(record.module).handlers;
      const { handlers } = bus.applyChanges({ handlers: declarations });
      record.mirrors.set(bus, [...(record.mirrors.get(bus) ?? []), ...handlers]);
      added.push(...handlers);
      this.log.debug({ plugin: record.name, handlers: handlers.length }, 'Plugin handlers registered on additional bus');
    }
    return added;
  }

  getPluginInfo(name: string): PluginInfo | undefined {
    const record = this.records.get(name);
    if (record !== undefined) return toInfo(record);

    const error = this.loadErrors.get(name);
    if (error === undefined) return undefined;
    return {
      name,
      loaded: false,
      version: null,
      description: null,
      definitions: [],
      handlers: [],
      load_error: error,
    };
  }

  /** Every discovered plugin, loaded or not, plus any loaded outside discovery. */
  listPlugins(): PluginInfo[] {
    const names = new Set([...this.discoverPlugins(), ...this.records.keys()]);
    return [...names].map((name) => this.getPluginInfo(name) ?? {
      name,
      loaded: false,
      version: null,
      description: null,
      definitions: [],
      handlers: [],
      load_error: null,
    });
  }

  loadedPlugins(): string[] {
    return [...this.records.keys()];
  }

  isLoaded(name: string): boolean {
    return this.records.has(name);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller observes the rejection through `run`; the queue only orders.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(name: string): Promise<PluginInfo> {
    const existing = this.records.get(name);
    if (existing !== undefined) {
      this.log.debug({ plugin: name }, 'Plugin already loaded');
      return toInfo(existing);
    }

    let module: unknown;
    try {
      module = await this.provider.resolve(name);
    } catch (err: unknown) {
      throw this.failed(new PluginLoadError(name, describeCause(err), err));
    }
    if (!isRecord(module)) {
      throw this.failed(new PluginLoadError(name, 'module did not resolve to an object'));
    }

    const contents = scanModule(module);
    const context: PluginContext = { name, log: this.log.child({ plugin: name }) };

    if (contents.init !== undefined) {
      try {
        await contents.init(context);
      } catch (err: unknown) {
        throw this.failed(new PluginLoadError(name, `init failed: ${describeCause(err)}`, err));
      }
    }

    for (const declaration of contents.handlers) {
      if (declaration.implicit) {
        this.log.warn(
          { plugin: name, handler: declaration.name },
          'Handler declares no pattern, activity or group; it will run for every event',
        );
      }
    }

    let applied: AppliedChanges;
    try {
      applied = this.bus.applyChanges({ definitions: contents.definitions, handlers: contents.handlers });
    } catch (err: unknown) {
      await this.runCleanup(name, contents.cleanup, context);
      throw this.failed(new PluginLoadError(name, describeCause(err), err));
    }

    const record: PluginRecord = {
      name,
      module,
      loaded: true,
      init: contents.init,
      cleanup: contents.cleanup,
      definitions: applied.definitions,
      handlers: applied.handlers,
      version: contents.version,
      description: contents.description,
      applied,
      mirrors: new Map(),
    };
    this.records.set(name, record);
    this.loadErrors.delete(name);

    this.log.info(
      { plugin: name, definitions: record.definitions, handlers: record.handlers.length, version: record.version },
      'Plugin loaded',
    );
    return toInfo(record);
  }

  private async unload(name: string): Promise<void> {
    const record = this.records.get(name);
    if (record === undefined) throw new PluginNotLoadedError(name);

    await this.runCleanup(name, record.cleanup, { name, log: this.log.child({ plugin: name }) });

    this.bus.revertChanges(record.applied);
    for (const [bus, handlers] of record.mirrors) {
      bus.revertChanges({ definitions: [], handlers });
    }
    this.records.delete(name);

    this.log.info({ plugin: name, definitions: record.definitions }, 'Plugin unloaded');
  }

  private async runCleanup(name: string, cleanup: PluginHook | undefined, context: PluginContext): Promise<void> {
    if (cleanup === undefined) return;
    try {
      await cleanup(context);
    } catch (err: unknown) {
      this.log.warn({ err, plugin: name }, 'Plugin cleanup failed');
    }
  }

  private failed(error: PluginLoadError): PluginLoadError {
    this.loadErrors.set(error.plugin, error.message);
    this.log.error({ err: error.cause ?? error, plugin: error.plugin }, 'Plugin load failed');
    return error;
  }
}

function toInfo(record: PluginRecord): PluginInfo {
  return {
    name: record.name,
    loaded: true,
    version: record.version,
    description: record.description,
    definitions: record.definitions,
    handlers: record.handlers.map((h) => h.name),
    load_error: null,
  };
}
