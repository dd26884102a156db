/**
 * Config composition
 *
 * Folds plugin contributions into the base, defaults and overrides layers
 * and keeps the `PLUGINS` list of a user config in step with enable and
 * disable.
 */

import { NotInstalledError } from '../errors.js';
import type { Kernel } from '../kernel/kernel.js';
import { disablePlugin, installedPlugins, pluginContext } from '../plugins/lifecycle.js';
import type { Plugin } from '../plugins/types.js';
import { getStringList } from './types.js';
import type { Config } from './types.js';

/** User config key holding the sorted names of enabled plugins. */
export const PLUGINS_CONFIG_KEY = 'PLUGINS';

export class ConfigComposer {
  constructor(private readonly kernel: Kernel) {}

  getBase(): Config {
    return this.kernel.filters.apply('config:base', {});
  }

  getDefaults(): Config {
    return this.kernel.filters.apply('config:defaults', {});
  }

  /**
   * The `set` values contributed by plugins named `pluginName`. Overrides
   * registered outside any plugin context are not part of it.
   */
  getOverrides(pluginName: string): Config {
    return this.kernel.filters.applyScoped(
      'config:overrides',
      { context: pluginContext(pluginName), descendants: true, scopedOnly: true },
      {},
    );
  }

  /** Copy base entries the user config does not hold yet. */
  updateWithBase(config: Config): void {
    copyMissing(config, this.getBase());
  }

  updateWithDefaults(config: Config): void {
    copyMissing(config, this.getDefaults());
  }

  /**
   * Add `name` to the `PLUGINS` list of `config`, keeping it sorted and free
   * of duplicates. Plugins are only loaded for real on the next config load.
   */
  enable(config: Config, name: string): void {
    if (!installedPlugins(this.kernel).some((plugin) => plugin.name === name)) {
      throw new NotInstalledError(name);
    }
    const enabled = getStringList(config, PLUGINS_CONFIG_KEY);
    if (enabled.includes(name)) return;
    enabled.push(name);
    enabled.sort();
  }

  /**
   * Remove the keys `plugin` forces onto the config and its name from the
   * `PLUGINS` list, then clear everything it registered.
   */
  disable(config: Config, plugin: Plugin): void {
    for (const key of Object.keys(this.getOverrides(plugin.name))) {
      delete config[key];
    }

    const enabled = getStringList(config, PLUGINS_CONFIG_KEY);
    let index = enabled.indexOf(plugin.name);
    while (index >= 0) {
      enabled.splice(index, 1);
      index = enabled.indexOf(plugin.name);
    }

    disablePlugin(this.kernel, plugin);
  }
}

function copyMissing(target: Config, source: Config): void {
  for (const [key, value] of Object.entries(source)) {
    if (!Object.hasOwn(target, key)) target[key] = value;
  }
}
