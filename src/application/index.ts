export { PatternRegistry, DISCRIMINATOR_FIELDS, readField, validateFields, defaultActivity } from './pattern-registry.js';
export type { DefinitionStats, DefinitionSchema, FieldSchema, ValidationReport } from './pattern-registry.js';
export { EventBus } from './event-bus.js';
export type { EventBusConfig, EventBusOptions, DispatchOptions, ChangeSet, AppliedChanges } from './event-bus.js';
export { AdmissionGate } from './admission-gate.js';
export type { Release } from './admission-gate.js';
export { ConcurrencyController } from './concurrency-controller.js';
export type { Invocation, ExecuteOptions } from './concurrency-controller.js';
export { PluginManager } from './plugin-manager.js';
export type {
  PluginDiscoveryProvider,
  PluginContext,
  PluginHook,
  PluginRecord,
  PluginInfo,
  PluginLoadOutcome,
} from './plugin-manager.js';
export { MetricsCollector } from './metrics-collector.js';
export type { MetricsSnapshot } from './metrics-collector.js';
export {
  dispatchConfigSchema,
  timeoutSecondsSchema,
  MAX_TIMEOUT_SECONDS,
  parseDispatchConfig,
  presetConfig,
  checkRuntimeWarnings,
  CONFIG_PRESETS,
  DEFAULT_ACTIVITY_GROUPS,
  LOG_LEVELS,
} from './config-schema.js';
export type { DispatchConfig, DispatchConfigInput, ConfigPreset, LogLevel } from './config-schema.js';
