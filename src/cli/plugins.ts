import { copyFileSync, existsSync, mkdirSync, rmSync, statSync } from 'fs';
import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { DeckhandError, NotFoundError, errorMessage } from '../errors.js';
import { loadMinimal, saveConfigFile } from '../config/loader.js';
import type { ConfigValue } from '../config/types.js';
import { PLUGINS_ROOT_ENV_VAR } from '../env.js';
import { PLUGIN_FILE_EXTENSION } from '../plugins/sources.js';
import type { CliContext } from './context.js';

const REGENERATE_HINT = 'You should now re-generate your environment to apply the change.';

function formatValue(value: ConfigValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Remove the rendered templates of a plugin from the project environment. */
export function deletePluginEnv(root: string, name: string): void {
  const pluginDir = path.join(root, 'env', 'plugins', name);
  if (!existsSync(pluginDir)) return;
  try {
    rmSync(pluginDir, { recursive: true, force: true });
  } catch (err) {
    throw new DeckhandError(
      `Could not delete ${pluginDir} of plugin ${name}: ${errorMessage(err)}`,
      'DELETE_FAILED',
      { plugin: name, path: pluginDir },
      { cause: err },
    );
  }
}

/** Copy a local declarative plugin file into the plugins root. */
export function installPluginFile(location: string, pluginsRoot: string): string {
  if (!existsSync(location) || !statSync(location).isFile()) {
    throw new NotFoundError('Plugin file', location);
  }
  let basename = path.basename(location);
  if (!basename.endsWith(PLUGIN_FILE_EXTENSION)) basename += PLUGIN_FILE_EXTENSION;

  const target = path.join(pluginsRoot, basename);
  mkdirSync(pluginsRoot, { recursive: true });
  copyFileSync(location, target);
  return target;
}

export function registerPluginsCommand(program: Command, context: CliContext): void {
  const { plugins, kernel } = context;
  const group = program.command('plugins').description('Manage deckhand plugins');

  group
    .command('list')
    .description('List installed plugins')
    .action(() => {
      for (const plugin of plugins.installed()) {
        const status = plugins.isEnabled(plugin.name) ? '' : chalk.dim(' (disabled)');
        console.log(`${plugin.name}==${plugins.version(plugin)}${status}`);
      }
    });

  group
    .command('enable <plugins...>')
    .description('Enable one or more plugins')
    .action((names: string[]) => {
      const config = loadMinimal(kernel, context.root);
      for (const name of names) {
        plugins.enable(config, name);
        console.log(chalk.green(`Plugin ${name} enabled`));
      }
      saveConfigFile(context.root, config);
      console.log(REGENERATE_HINT);
    });

  group
    .command('disable <plugins...>')
    .description("Disable one or more plugins. Specify 'all' to disable every enabled plugin.")
    .action((names: string[]) => {
      const config = loadMinimal(kernel, context.root);
      const disableAll = names.includes('all');
      for (const plugin of plugins.enabled()) {
        if (!disableAll && !names.includes(plugin.name)) continue;
        console.log(`Disabling plugin ${plugin.name}...`);
        for (const [key, value] of Object.entries(plugins.composer.getOverrides(plugin.name))) {
          console.log(`    Removing config entry ${key}=${formatValue(value)}`);
        }
        plugins.disable(config, plugin);
        deletePluginEnv(context.root, plugin.name);
        console.log(chalk.green('    Plugin disabled'));
      }
      saveConfigFile(context.root, config);
      console.log(REGENERATE_HINT);
    });

  group
    .command('printroot')
    .description(`Print the location of file plugins. Set ${PLUGINS_ROOT_ENV_VAR} to change it.`)
    .action(() => {
      console.log(plugins.pluginsRoot);
    });

  group
    .command('install <file>')
    .description(`Install a plugin from a local YAML file into ${PLUGINS_ROOT_ENV_VAR}`)
    .action((location: string) => {
      const target = installPluginFile(location, plugins.pluginsRoot);
      console.log(chalk.green(`Plugin installed at ${target}`));
    });
}
