export { StaticPluginProvider } from './static-provider.js';
export type { PluginEntry } from './static-provider.js';
export { DirectoryPluginProvider } from './directory-provider.js';
export type { DirectoryProviderOptions } from './directory-provider.js';
export { CompositePluginProvider } from './composite-provider.js';
