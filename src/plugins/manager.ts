/**
 * Plugin Manager
 *
 * Host-facing facade over the plugin lifecycle:
 *   - installStatic(name)  : install a plugin registered in code
 *   - installDiscovered()  : install every file and package plugin found
 *   - load(config)         : install, then enable the plugins listed in PLUGINS
 *   - enable(config, name) : add a plugin to the PLUGINS list
 *   - disable(config, p)   : remove it, its forced config and its registrations
 *   - patchesFor / hooksFor / templateRoots / templateTargets / commands
 *
 * The manager wires itself to the kernel on construction: `load` runs on
 * `config:user:load` and discovery on `plugins:install`.
 */

import path from 'path';
import type { Command } from 'commander';
import { NotFoundError } from '../errors.js';
import { ConfigComposer, PLUGINS_CONFIG_KEY } from '../config/composer.js';
import { readStringList } from '../config/types.js';
import type { Config } from '../config/types.js';
import { resolvePluginsRoot } from '../env.js';
import { enableTrigger } from '../kernel/catalog.js';
import type { Kernel } from '../kernel/kernel.js';
import type { Logger } from '../logging/logger.js';
import { enabledPlugins, installPlugin, installedPlugins } from './lifecycle.js';
import { createModuleResolver, createNodeModulesEnumerator } from './resolver.js';
import { createStaticPlugin, discoverFilePlugins, discoverPackagePlugins, pluginVersion } from './sources.js';
import type {
  EntryPointEnumerator,
  HookEntry,
  PatchEntry,
  Plugin,
  PluginDescriptor,
  PluginResolver,
  TemplateTarget,
} from './types.js';

// ---------------------------------------------------------------------------
// Manager config
// ---------------------------------------------------------------------------

export interface PluginManagerOptions {
  kernel: Kernel;
  /** Directory scanned for declarative plugin files */
  pluginsRoot?: string;
  /** Loads static and package plugin modules */
  resolver?: PluginResolver;
  /** Lists the plugin entry points of installed packages */
  enumerateEntryPoints?: EntryPointEnumerator;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// PluginManager
// ---------------------------------------------------------------------------

export class PluginManager {
  readonly kernel: Kernel;
  readonly pluginsRoot: string;
  readonly composer: ConfigComposer;
  private readonly resolver: PluginResolver;
  private readonly enumerateEntryPoints: EntryPointEnumerator;
  private readonly logger: Logger;

  constructor(options: PluginManagerOptions) {
    this.kernel = options.kernel;
    this.logger = options.logger ?? options.kernel.logger.child('plugins');
    this.pluginsRoot = options.pluginsRoot ?? resolvePluginsRoot();
    this.resolver = options.resolver ?? createModuleResolver();
    this.enumerateEntryPoints =
      options.enumerateEntryPoints ??
      createNodeModulesEnumerator(path.join(process.cwd(), 'node_modules'), this.logger);
    this.composer = new ConfigComposer(this.kernel);

    const loadEnabledPlugins = (config: Config): void => this.load(config);
    const installDiscoveredPlugins = (): void => this.installDiscovered();
    this.kernel.actions.add('config:user:load', loadEnabledPlugins);
    this.kernel.actions.add('plugins:install', installDiscoveredPlugins);
  }

  // ---- Installation --------------------------------------------------------

  install(plugin: Plugin): Plugin {
    installPlugin(this.kernel, plugin, this.resolver);
    return plugin;
  }

  /** Install a plugin whose module is registered in code, `deckhand-<name>` by default. */
  installStatic(name: string, module?: string): Plugin {
    return this.install(createStaticPlugin(name, module));
  }

  /** Install every declarative file plugin and every package plugin found. */
  installDiscovered(): void {
    const discovered = [
      ...discoverPackagePlugins(this.enumerateEntryPoints),
      ...discoverFilePlugins(this.pluginsRoot, this.logger),
    ];
    for (const plugin of discovered) {
      this.install(plugin);
    }
    this.logger.debug(`Discovered ${discovered.length} plugin(s)`, { source: this.pluginsRoot });
  }

  /**
   * Install plugins once per kernel, then fire the enable trigger of every
   * name listed in PLUGINS. Each trigger fires at most once.
   */
  load(config: Config): void {
    this.kernel.actions.doOnce('plugins:install');
    for (const name of readStringList(config, PLUGINS_CONFIG_KEY)) {
      if (!this.isInstalled(name)) {
        this.logger.warn(`Plugin ${name} is enabled but not installed`, { plugin: name });
        continue;
      }
      this.kernel.actions.doOnce(enableTrigger(name));
    }
  }

  // ---- Lifecycle -----------------------------------------------------------

  /** @throws NotInstalledError */
  enable(config: Config, name: string): void {
    this.composer.enable(config, name);
  }

  disable(config: Config, plugin: Plugin): void {
    this.composer.disable(config, plugin);
  }

  // ---- Queries -------------------------------------------------------------

  installed(): Plugin[] {
    return installedPlugins(this.kernel);
  }

  enabled(): Plugin[] {
    return enabledPlugins(this.kernel);
  }

  isInstalled(name: string): boolean {
    return this.installed().some((plugin) => plugin.name === name);
  }

  isEnabled(name: string): boolean {
    return this.enabled().some((plugin) => plugin.name === name);
  }

  /** @throws NotFoundError when no plugin of that name is enabled */
  getEnabled(name: string): Plugin {
    const plugin = this.enabled().find((candidate) => candidate.name === name);
    if (!plugin) throw new NotFoundError('Enabled plugin', name);
    return plugin;
  }

  version(plugin: Plugin): string {
    return pluginVersion(plugin, this.resolver);
  }

  describe(plugin: Plugin): PluginDescriptor {
    return { name: plugin.name, version: this.version(plugin) };
  }

  patchesFor(patchName: string): PatchEntry[] {
    return this.kernel.filters.apply('env:patches', [], patchName);
  }

  hooksFor(hookName: string): HookEntry[] {
    return this.kernel.filters.apply('app:hooks', [], hookName);
  }

  templateRoots(): string[] {
    return this.kernel.filters.apply('env:templates:roots', []);
  }

  templateTargets(): TemplateTarget[] {
    return this.kernel.filters.apply('env:templates:targets', []);
  }

  commands(): Command[] {
    return this.kernel.filters.apply('cli:commands', []);
  }
}
