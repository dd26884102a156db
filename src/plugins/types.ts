/**
 * Plugin model types
 */

import type { Config } from '../config/types.js';

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

/** An installed package's extension point, as listed by an enumerator. */
export interface EntryPoint {
  /** Plugin name declared by the package */
  name: string;
  /** Module specifier or absolute path of the plugin module */
  ref: string;
  /** Version of the distribution that declares the entry point */
  version?: string;
  /** Package that declares the entry point */
  packageName?: string;
}

/** Content of a declarative plugin file. */
export interface DeclarativePlugin extends Record<string, unknown> {
  name: string;
  version?: string;
}

export type PluginSource =
  | { kind: 'static'; module: string }
  | { kind: 'file'; data: DeclarativePlugin; path?: string }
  | { kind: 'package'; entryPoint: EntryPoint };

export type PluginKind = PluginSource['kind'];

export interface Plugin {
  readonly name: string;
  readonly source: PluginSource;
}

/** Name and version, as reported to the host. */
export interface PluginDescriptor {
  name: string;
  version: string;
}

// ---------------------------------------------------------------------------
// Contributions
// ---------------------------------------------------------------------------

/**
 * Fields a plugin may contribute, before validation. Module-backed plugins
 * may export any of config, patches, hooks or templates as a function
 * returning the value.
 */
export interface RawContributions {
  config?: unknown;
  patches?: unknown;
  hooks?: unknown;
  templates?: unknown;
  command?: unknown;
}

export interface ConfigContribution {
  /** Added to the base layer as `<NAME>_<KEY>` unless already set */
  add?: Config;
  /** Forced onto the config, unprefixed */
  set?: Config;
  /** Added to the defaults layer as `<NAME>_<KEY>` */
  defaults?: Config;
}

/** An init-style hook lists services; an image-style hook maps names to values. */
export type Hook = string[] | Record<string, string>;

/** [plugin name, patch text] */
export type PatchEntry = [plugin: string, patch: string];

/** [plugin name, hook] */
export type HookEntry = [plugin: string, hook: Hook];

/** [template source directory, render target directory] */
export type TemplateTarget = [source: string, target: string];

// ---------------------------------------------------------------------------
// Collaborators injected into discovery and enable
// ---------------------------------------------------------------------------

/** Loads a plugin module. The core never imports plugin code itself. */
export interface PluginResolver {
  resolve(specifier: string): unknown;
}

/** Lists the extension points of installed packages. */
export type EntryPointEnumerator = () => Iterable<EntryPoint>;
