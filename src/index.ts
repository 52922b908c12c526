export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { createDispatchEngine } from './engine.js';
export type { DispatchEngine, DispatchEngineOptions } from './engine.js';
