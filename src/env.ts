import path from 'path';
import os from 'os';

export const HOME_DIR = path.join(os.homedir(), '.deckhand');
export const DEFAULT_PLUGINS_ROOT = path.join(HOME_DIR, 'plugins');

/** Directory scanned for declarative plugin files. */
export const PLUGINS_ROOT_ENV_VAR = 'DECKHAND_PLUGINS_ROOT';
/** Project root used by the CLI. */
export const ROOT_ENV_VAR = 'DECKHAND_ROOT';

export function expandHome(value: string, home: string = os.homedir()): string {
  if (value === '~') return home;
  if (value.startsWith('~/')) return path.join(home, value.slice(2));
  return value;
}

export function resolvePluginsRoot(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[PLUGINS_ROOT_ENV_VAR];
  return configured ? expandHome(configured) : DEFAULT_PLUGINS_ROOT;
}

export function resolveProjectRoot(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const configured = env[ROOT_ENV_VAR];
  return path.resolve(cwd, configured ? expandHome(configured) : '.');
}
