/**
 * User config loader - reads and writes `config.yml` in a project root
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { parse, stringify } from 'yaml';
import { ValidationError, errorMessage } from '../errors.js';
import type { Kernel } from '../kernel/kernel.js';
import { ConfigComposer } from './composer.js';
import { castConfig } from './types.js';
import type { Config } from './types.js';

export const CONFIG_FILENAME = 'config.yml';

export function getConfigPath(root: string): string {
  return path.join(root, CONFIG_FILENAME);
}

/** The persisted user config, or `{}` when the project has none yet. */
export function loadUserConfig(root: string): Config {
  const configPath = getConfigPath(root);
  if (!existsSync(configPath)) return {};

  const content = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new ValidationError(
      `Invalid configuration in ${configPath}: ${errorMessage(err)}`,
      'config',
      'YAML document',
      'unparsable content',
    );
  }
  // An empty file parses to null.
  return parsed === null ? {} : castConfig(parsed);
}

/**
 * Read the user config and dispatch `config:user:load`, which installs
 * plugins and enables those listed in `PLUGINS`.
 */
export function loadMinimal(kernel: Kernel, root: string): Config {
  const config = loadUserConfig(root);
  kernel.actions.do('config:user:load', config);
  return config;
}

/** `loadMinimal`, then fill in what the user config leaves out from the base and defaults layers. */
export function loadFull(kernel: Kernel, root: string): Config {
  const config = loadMinimal(kernel, root);
  const composer = new ConfigComposer(kernel);
  composer.updateWithBase(config);
  composer.updateWithDefaults(config);
  return config;
}

export function saveConfigFile(root: string, config: Config): void {
  mkdirSync(root, { recursive: true });
  writeFileSync(getConfigPath(root), stringify(config), 'utf-8');
}
