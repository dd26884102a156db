import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { loadMinimal } from '../config/loader.js';
import { resolveProjectRoot } from '../env.js';
import { errorMessage } from '../errors.js';
import { createKernel } from '../kernel/kernel.js';
import { PluginManager } from '../plugins/manager.js';
import type { CliContext } from './context.js';
import { registerPluginsCommand } from './plugins.js';

export const VERSION = '0.1.0';
const NAME = 'deckhand';

/**
 * Root program with the built-in command groups and every command
 * contributed by an enabled plugin.
 *
 * Plugins that share a name contribute commands of the same name: the last
 * one wins. A contributed command never replaces a built-in one.
 */
export function createProgram(context: CliContext): Command {
  const program = new Command();
  program.name(NAME).description('Configure and render deployment environments').version(VERSION).exitOverride();

  registerPluginsCommand(program, context);

  const builtIn = new Set(program.commands.map((command) => command.name()));
  const contributed = new Map<string, Command>();
  for (const command of context.plugins.commands()) {
    const name = command.name();
    if (builtIn.has(name)) {
      context.kernel.logger.warn(`Ignoring the command of plugin ${name}: a built-in command has that name`, {
        plugin: name,
      });
      continue;
    }
    contributed.set(name, command);
  }
  for (const command of contributed.values()) {
    program.addCommand(command);
  }
  return program;
}

export interface RunOptions {
  plugins?: PluginManager;
  root?: string;
}

/**
 * Load the project config, which installs and enables plugins, then run the
 * command named by `argv` (user arguments only). Returns the exit code.
 */
export function run(argv: string[], options: RunOptions = {}): number {
  const plugins = options.plugins ?? new PluginManager({ kernel: createKernel() });
  const root = options.root ?? resolveProjectRoot();

  try {
    loadMinimal(plugins.kernel, root);
    createProgram({ kernel: plugins.kernel, plugins, root }).parse(argv, { from: 'user' });
    return 0;
  } catch (err) {
    // commander has already printed its own message
    if (err instanceof CommanderError) return err.exitCode;
    console.error(chalk.red(errorMessage(err)));
    return 1;
  }
}
