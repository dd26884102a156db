/**
 * Plugin sources
 *
 * A plugin comes from one of three sources:
 *   - static  - a module registered in code by name
 *   - file    - a declarative YAML file in the plugins root
 *   - package - an extension point declared by an installed package
 *
 * Sources only differ in how a plugin's contributions and version are
 * resolved; install, enable and disable are shared (see lifecycle.ts).
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { DiscoveryError, ValidationError, errorMessage } from '../errors.js';
import { describeType } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import { DeclarativePluginFileSchema, readModuleContributions, readModuleVersion } from './manifest.js';
import type {
  DeclarativePlugin,
  EntryPoint,
  EntryPointEnumerator,
  Plugin,
  PluginResolver,
  RawContributions,
} from './types.js';

/** Version reported for package plugins whose distribution has none. */
export const UNKNOWN_VERSION = '0.0.0';

export const PLUGIN_FILE_EXTENSION = '.yml';

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function createStaticPlugin(name: string, module = `deckhand-${name}`): Plugin {
  return { name, source: { kind: 'static', module } };
}

export function createFilePlugin(data: DeclarativePlugin, filePath?: string): Plugin {
  return { name: data.name, source: { kind: 'file', data, path: filePath } };
}

export function createPackagePlugin(entryPoint: EntryPoint): Plugin {
  return { name: entryPoint.name, source: { kind: 'package', entryPoint } };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function loadModule(resolver: PluginResolver, specifier: string): unknown {
  try {
    return resolver.resolve(specifier);
  } catch (err) {
    throw new DiscoveryError(specifier, errorMessage(err), { cause: err });
  }
}

/** Resolve the raw, unvalidated contribution fields of `plugin`. */
export function resolveContributions(plugin: Plugin, resolver: PluginResolver): RawContributions {
  const source = plugin.source;
  switch (source.kind) {
    case 'static':
      return readModuleContributions(loadModule(resolver, source.module));
    case 'package':
      return readModuleContributions(loadModule(resolver, source.entryPoint.ref));
    case 'file':
      return {
        config: source.data['config'],
        patches: source.data['patches'],
        hooks: source.data['hooks'],
        templates: source.data['templates'],
        command: source.data['command'],
      };
  }
}

export function pluginVersion(plugin: Plugin, resolver: PluginResolver): string {
  const source = plugin.source;
  let version: unknown;
  switch (source.kind) {
    case 'static':
      version = readModuleVersion(loadModule(resolver, source.module));
      break;
    case 'file':
      version = source.data.version;
      break;
    case 'package':
      return source.entryPoint.version ?? UNKNOWN_VERSION;
  }
  if (typeof version !== 'string') {
    throw ValidationError.forPlugin(plugin.name, 'version', 'string', describeType(version));
  }
  return version;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/** Read one declarative plugin file. */
export function readPluginFile(filePath: string): Plugin {
  let document: unknown;
  try {
    document = parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new DiscoveryError(filePath, errorMessage(err), { cause: err });
  }

  const result = DeclarativePluginFileSchema.safeParse(document);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new DiscoveryError(filePath, reason);
  }
  return createFilePlugin(result.data, filePath);
}

/**
 * Every `*.yml` file directly under `root`, one plugin per file, in file
 * name order. Unreadable files are logged and skipped.
 */
export function discoverFilePlugins(root: string, log: Logger): Plugin[] {
  if (!existsSync(root)) return [];

  const plugins: Plugin[] = [];
  const files = readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(PLUGIN_FILE_EXTENSION))
    .map((entry) => entry.name)
    .sort();

  for (const file of files) {
    try {
      plugins.push(readPluginFile(path.join(root, file)));
    } catch (err) {
      if (!(err instanceof DiscoveryError)) throw err;
      log.warn(err.message, { source: err.source });
    }
  }
  return plugins;
}

export function discoverPackagePlugins(enumerate: EntryPointEnumerator): Plugin[] {
  return Array.from(enumerate(), createPackagePlugin);
}
