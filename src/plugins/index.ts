/**
 * Plugins module exports
 *
 *   - types    : plugin, source and contribution types
 *   - manifest : Zod schemas for contributions and discovery documents
 *   - sources  : static, file and package plugin sources
 *   - resolver : default module resolver and node_modules enumerator
 *   - lifecycle: install / enable / disable
 *   - manager  : PluginManager facade for the host
 */

export * from './types.js';
export * from './manifest.js';
export * from './sources.js';
export * from './resolver.js';
export * from './lifecycle.js';
export * from './manager.js';
