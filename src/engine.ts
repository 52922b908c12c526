import type { Logger } from 'pino';
import {
  EventBus,
  MetricsCollector,
  PatternRegistry,
  PluginManager,
  checkRuntimeWarnings,
  parseDispatchConfig,
} from './application/index.js';
import type {
  DispatchConfig,
  DispatchConfigInput,
  PluginDiscoveryProvider,
  PluginLoadOutcome,
} from './application/index.js';
import {
  CompositePluginProvider,
  DirectoryPluginProvider,
  createLogger,
} from './infrastructure/index.js';

export interface DispatchEngineOptions {
  /** Raw configuration; validated and defaulted here. */
  readonly config?: DispatchConfigInput | undefined;
  /** Root logger. Defaults to a pino logger at the configured level. */
  readonly log?: Logger | undefined;
  /** Plugin source consulted before the configured plugin directories. */
  readonly provider?: PluginDiscoveryProvider | undefined;
}

export interface DispatchEngine {
  readonly config: DispatchConfig;
  readonly log: Logger;
  readonly registry: PatternRegistry;
  readonly metrics: MetricsCollector;
  readonly bus: EventBus;
  readonly plugins: PluginManager;
  /** Loads every discovered plugin, unless plugins are disabled. */
  start(): Promise<PluginLoadOutcome[]>;
  /** Unloads every loaded plugin. */
  stop(): Promise<void>;
}

/**
 * Builds one registry, bus, metrics collector and plugin manager that
 * belong together. Nothing is shared between engines.
 */
export function createDispatchEngine(options: DispatchEngineOptions = {}): DispatchEngine {
  const config = parseDispatchConfig(options.config ?? {});
  const log = options.log ?? createLogger(config.log_level);

  for (const warning of checkRuntimeWarnings(config)) {
    log.warn({ warning }, 'Configuration warning');
  }

  const registry = new PatternRegistry(log);
  const metrics = new MetricsCollector();
  const bus = new EventBus(registry, { config, log, metrics });

  const providers: PluginDiscoveryProvider[] = [
    ...(options.provider !== undefined ? [options.provider] : []),
    ...config.plugins.directories.map((directory) => new DirectoryPluginProvider(directory)),
  ];
  const plugins = new PluginManager(bus, new CompositePluginProvider(providers), log);

  log.debug(
    {
      timeout_seconds: config.timeout_seconds,
      max_concurrent_handlers: config.max_concurrent_handlers,
      swallow_exceptions: config.swallow_exceptions,
      plugin_directories: config.plugins.directories,
    },
    'Dispatch engine created',
  );

  return {
    config,
    log,
    registry,
    metrics,
    bus,
    plugins,
    async start() {
      if (!config.plugins.enabled) {
        log.info('Plugin loading disabled');
        return [];
      }
      return plugins.loadAll();
    },
    async stop() {
      await plugins.unloadAll();
      log.info('Dispatch engine stopped');
    },
  };
}
