/**
 * Plugin lifecycle
 *
 * DISCOVERED → INSTALLED → ENABLED, and back from ENABLED to INSTALLED on
 * disable. The transitions are the same for every plugin source.
 */

import path from 'path';
import { Command } from 'commander';
import { ValidationError } from '../errors.js';
import { describeType } from '../config/types.js';
import type { Config } from '../config/types.js';
import { PLUGINS_CONTEXT, enableTrigger } from '../kernel/catalog.js';
import { joinContext } from '../kernel/contexts.js';
import type { Kernel } from '../kernel/kernel.js';
import {
  ConfigContributionSchema,
  HooksSchema,
  PatchesSchema,
  TemplatesSchema,
  parseField,
} from './manifest.js';
import { resolveContributions } from './sources.js';
import type { Plugin, PluginResolver, TemplateTarget } from './types.js';

/** Template folders of a plugin root rendered into the environment. */
export const TEMPLATE_FOLDERS = ['apps', 'build'] as const;
/** Environment directory plugin templates are rendered into. */
export const TEMPLATE_TARGET = 'plugins';

export function pluginContext(name: string): string {
  return joinContext(PLUGINS_CONTEXT, name);
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

function byName(a: Plugin, b: Plugin): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Installed plugins sorted by name, duplicates included. */
export function installedPlugins(kernel: Kernel): Plugin[] {
  return kernel.filters.apply('plugins:installed', []).sort(byName);
}

/** Enabled plugins sorted by name, duplicates included. */
export function enabledPlugins(kernel: Kernel): Plugin[] {
  return kernel.filters.apply('plugins:enabled', []).sort(byName);
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

/**
 * Record `plugin` as installed and register its enable trigger. Both entries
 * are tagged `plugins`, so disabling the plugin leaves it installed.
 */
export function installPlugin(kernel: Kernel, plugin: Plugin, resolver: PluginResolver): void {
  kernel.filters.addItem('plugins:installed', plugin, PLUGINS_CONTEXT);
  kernel.actions.add(
    enableTrigger(plugin.name),
    function enableInstalledPlugin() {
      enablePlugin(kernel, plugin, resolver);
    },
    PLUGINS_CONTEXT,
  );
  kernel.logger.debug(`Installed ${plugin.source.kind} plugin ${plugin.name}`, { plugin: plugin.name });
}

/**
 * Register everything `plugin` contributes under `plugins:<name>`. Fields
 * are loaded in order (config, patches, hooks, templates, command); the
 * first invalid field throws and the fields after it are not loaded.
 *
 * Module code that registers on the kernel while its contributions are read
 * is tagged with the plugin's context too.
 */
export function enablePlugin(kernel: Kernel, plugin: Plugin, resolver: PluginResolver): void {
  const context = pluginContext(plugin.name);
  kernel.filters.addItem('plugins:enabled', plugin, context);

  const contributions = kernel.contexts.enter(context, () => resolveContributions(plugin, resolver));
  loadConfig(kernel, plugin.name, contributions.config, context);
  loadPatches(kernel, plugin.name, contributions.patches, context);
  loadHooks(kernel, plugin.name, contributions.hooks, context);
  loadTemplatesRoot(kernel, plugin.name, contributions.templates, context);
  loadCommand(kernel, plugin.name, contributions.command, context);

  kernel.logger.debug(`Enabled plugin ${plugin.name}`, { plugin: plugin.name });
}

/** Clear every entry registered under `plugins:<name>` and below. */
export function disablePlugin(kernel: Kernel, plugin: Plugin): void {
  kernel.clear({ context: pluginContext(plugin.name), descendants: true });
  kernel.logger.debug(`Disabled plugin ${plugin.name}`, { plugin: plugin.name });
}

// ---------------------------------------------------------------------------
// Loaders
// ---------------------------------------------------------------------------

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

function prefixKeys(values: Config, prefix: string): Config {
  const prefixed: Config = {};
  for (const [key, value] of Object.entries(values)) {
    prefixed[`${prefix}${key}`] = value;
  }
  return prefixed;
}

// Every fold gets its own copy of the contributed values.
function setMissing(target: Config, values: Config): void {
  for (const [key, value] of Object.entries(values)) {
    if (!Object.hasOwn(target, key)) target[key] = structuredClone(value);
  }
}

function setAll(target: Config, values: Config): void {
  for (const [key, value] of Object.entries(values)) {
    target[key] = structuredClone(value);
  }
}

function loadConfig(kernel: Kernel, name: string, raw: unknown, context: string): void {
  if (isAbsent(raw)) return;
  const config = parseField(ConfigContributionSchema, raw, name, 'config', 'mapping', 'mapping');

  const prefix = `${name.toUpperCase()}_`;
  const added = prefixKeys(config.add ?? {}, prefix);
  const defaults = prefixKeys(config.defaults ?? {}, prefix);
  const forced = config.set ?? {};

  kernel.filters.add(
    'config:base',
    function addBaseConfig(base) {
      setMissing(base, added);
      setAll(base, forced);
      return base;
    },
    context,
  );
  kernel.filters.add(
    'config:defaults',
    function addDefaultConfig(current) {
      setMissing(current, defaults);
      return current;
    },
    context,
  );
  kernel.filters.add(
    'config:overrides',
    function addConfigOverrides(overrides) {
      setAll(overrides, forced);
      return overrides;
    },
    context,
  );
}

function loadPatches(kernel: Kernel, name: string, raw: unknown, context: string): void {
  if (isAbsent(raw)) return;
  const patches = parseField(PatchesSchema, raw, name, 'patches', 'mapping', 'string');

  kernel.filters.add(
    'env:patches',
    function addPatch(entries, patchName) {
      if (Object.hasOwn(patches, patchName)) entries.push([name, patches[patchName]]);
      return entries;
    },
    context,
  );
}

function loadHooks(kernel: Kernel, name: string, raw: unknown, context: string): void {
  if (isAbsent(raw)) return;
  const hooks = parseField(HooksSchema, raw, name, 'hooks', 'mapping', 'list or mapping');

  kernel.filters.add(
    'app:hooks',
    function addHook(entries, hookName) {
      if (!Object.hasOwn(hooks, hookName)) return entries;
      const hook = hooks[hookName];
      if (Object.keys(hook).length > 0) entries.push([name, hook]);
      return entries;
    },
    context,
  );
}

function loadTemplatesRoot(kernel: Kernel, name: string, raw: unknown, context: string): void {
  if (isAbsent(raw)) return;
  const root = parseField(TemplatesSchema, raw, name, 'templates', 'string');

  kernel.filters.addItem('env:templates:roots', root, context);
  kernel.filters.addItems(
    'env:templates:targets',
    TEMPLATE_FOLDERS.map((folder): TemplateTarget => [path.join(name, folder), TEMPLATE_TARGET]),
    context,
  );
}

/**
 * A package plugin may bundle its own copy of commander, so commands are
 * recognised by shape as well as by class.
 */
function isCommand(value: unknown): value is Command {
  if (value instanceof Command) return true;
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'function' &&
    'parseAsync' in value &&
    typeof value.parseAsync === 'function' &&
    'commands' in value &&
    Array.isArray(value.commands)
  );
}

function loadCommand(kernel: Kernel, name: string, raw: unknown, context: string): void {
  if (isAbsent(raw)) return;
  if (!isCommand(raw)) {
    throw ValidationError.forPlugin(name, 'command', 'command', describeType(raw));
  }
  raw.name(name);
  kernel.filters.addItem('cli:commands', raw, context);
}
