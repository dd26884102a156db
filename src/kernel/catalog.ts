/**
 * Well-known pipelines
 *
 * Filter and action names used by the plugin lifecycle, the config
 * composition and the CLI, with their value and argument types. Collaborators
 * that define pipelines of their own add them to these interfaces through
 * declaration merging on this module:
 *
 *   declare module '../kernel/catalog.js' {
 *     interface FilterCatalog {
 *       'env:render:extra': { value: string[]; args: [root: string] };
 *     }
 *   }
 */

import type { Command } from 'commander';
import type { Config } from '../config/types.js';
import type { HookEntry, PatchEntry, Plugin, TemplateTarget } from '../plugins/types.js';

export interface FilterCatalog {
  /** Base config layer: prefixed `add` entries and unprefixed `set` entries. */
  'config:base': { value: Config; args: [] };
  /** Default config layer: prefixed `defaults` entries, rendered later. */
  'config:defaults': { value: Config; args: [] };
  /** Values plugins insist on; replayed per plugin on disable. */
  'config:overrides': { value: Config; args: [] };
  'plugins:installed': { value: Plugin[]; args: [] };
  'plugins:enabled': { value: Plugin[]; args: [] };
  'env:patches': { value: PatchEntry[]; args: [patchName: string] };
  'env:templates:roots': { value: string[]; args: [] };
  'env:templates:targets': { value: TemplateTarget[]; args: [] };
  'app:hooks': { value: HookEntry[]; args: [hookName: string] };
  'cli:commands': { value: Command[]; args: [] };
}

export interface ActionCatalog {
  /** Dispatched once the user config is read; installs and enables plugins. */
  'config:user:load': [config: Config];
  /** Discovers and installs plugins from every dynamic source. */
  'plugins:install': [];
  /** Enable trigger registered by each installed plugin. */
  [trigger: `plugins:${string}:enable`]: [];
}

export type EnableTrigger = `plugins:${string}:enable`;

export function enableTrigger(pluginName: string): EnableTrigger {
  return `plugins:${pluginName}:enable`;
}

/** Context that install-time registrations are tagged with. */
export const PLUGINS_CONTEXT = 'plugins';
