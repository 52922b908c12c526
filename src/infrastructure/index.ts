export { StaticPluginProvider, DirectoryPluginProvider, CompositePluginProvider } from './plugins/index.js';
export type { PluginEntry, DirectoryProviderOptions } from './plugins/index.js';
export { loadConfigFile, DEFAULT_CONFIG_PATH } from './config/load-config.js';
export { createLogger } from './logging/logger.js';
