export * from './types.js';
export { HookEngine, mergeImplementations, type HookEngineOptions } from './engine.js';
export { HookRegistry } from './registry.js';
export { discoverScripts, hookNamesInDirectory, scriptSortKey, type DiscoveredScript } from './discovery.js';
