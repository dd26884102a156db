/**
 * Default collaborators for module-backed plugins: a CommonJS module
 * resolver and an enumerator of the plugins declared by the packages in a
 * node_modules directory.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { createRequire } from 'module';
import path from 'path';
import { DiscoveryError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { PackageManifestSchema } from './manifest.js';
import type { PackageManifest } from './manifest.js';
import type { EntryPoint, EntryPointEnumerator, PluginResolver } from './types.js';

/** Resolve plugin modules the way `require` would from `base`, the current directory by default. */
export function createModuleResolver(base: string = path.join(process.cwd(), 'package.json')): PluginResolver {
  const require = createRequire(base);
  return {
    resolve(specifier: string): unknown {
      const exports: unknown = require(specifier);
      return exports;
    },
  };
}

// ---- node_modules scanning -------------------------------------------------

function listPackageDirs(nodeModulesDir: string): string[] {
  const dirs: string[] = [];
  for (const entry of readdirSync(nodeModulesDir, { withFileTypes: true })) {
    if (entry.name.startsWith('.')) continue;
    if (!entry.isDirectory() && !entry.isSymbolicLink()) continue;
    const dir = path.join(nodeModulesDir, entry.name);
    if (entry.name.startsWith('@')) {
      for (const scoped of readdirSync(dir, { withFileTypes: true })) {
        if (scoped.isDirectory() || scoped.isSymbolicLink()) dirs.push(path.join(dir, scoped.name));
      }
    } else {
      dirs.push(dir);
    }
  }
  return dirs.sort();
}

export function readPackageManifest(packageDir: string): PackageManifest | null {
  const manifestPath = path.join(packageDir, 'package.json');
  if (!existsSync(manifestPath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(manifestPath, 'utf-8'));
  } catch (err) {
    throw new DiscoveryError(manifestPath, errorMessage(err), { cause: err });
  }

  const result = PackageManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new DiscoveryError(manifestPath, result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

/** Entry points declared under `"deckhand": { "plugins": {...} }` by one package. */
export function packageEntryPoints(packageDir: string, manifest: PackageManifest): EntryPoint[] {
  const declared = manifest.deckhand?.plugins ?? {};
  return Object.entries(declared).map(([name, ref]) => ({
    name,
    ref: ref.startsWith('.') ? path.resolve(packageDir, ref) : ref,
    version: manifest.version,
    packageName: manifest.name,
  }));
}

/**
 * Enumerate the plugin entry points of every package installed under
 * `nodeModulesDir`. Packages whose package.json cannot be read are logged
 * and skipped.
 */
export function createNodeModulesEnumerator(nodeModulesDir: string, log: Logger): EntryPointEnumerator {
  return () => {
    if (!existsSync(nodeModulesDir)) return [];

    const entryPoints: EntryPoint[] = [];
    for (const packageDir of listPackageDirs(nodeModulesDir)) {
      try {
        const manifest = readPackageManifest(packageDir);
        if (manifest) entryPoints.push(...packageEntryPoints(packageDir, manifest));
      } catch (err) {
        if (!(err instanceof DiscoveryError)) throw err;
        log.warn(err.message, { source: err.source });
      }
    }
    return entryPoints;
  };
}
