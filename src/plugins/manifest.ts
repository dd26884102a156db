/**
 * Plugin Manifest
 *
 * Zod schemas for the fields a plugin contributes and for the documents
 * plugins are discovered from. A contribution can come from a module's
 * exports or from a declarative YAML file; both are validated against the
 * same schemas when the plugin is enabled.
 *
 * Fields:
 *   config    - { add?, set?, defaults? }, each a map of config values
 *   patches   - patch name → template text
 *   hooks     - hook name → list of services, or map of string → string
 *   templates - template root directory
 *   command   - a commander Command (checked by the lifecycle, not here)
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { describeType, isRecord } from '../config/types.js';
import type { ConfigValue } from '../config/types.js';
import type { RawContributions } from './types.js';

// ---------------------------------------------------------------------------
// Contribution schemas
// ---------------------------------------------------------------------------

export const ConfigValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ConfigValueSchema),
    z.record(z.string(), ConfigValueSchema),
  ]),
);

const ConfigMapSchema = z.record(z.string(), ConfigValueSchema);

export const ConfigContributionSchema = z
  .object({
    add: ConfigMapSchema.optional(),
    set: ConfigMapSchema.optional(),
    defaults: ConfigMapSchema.optional(),
  })
  .strict();

export const PatchesSchema = z.record(z.string(), z.string());

export const HookSchema = z.union([z.array(z.string()), z.record(z.string(), z.string())]);

export const HooksSchema = z.record(z.string(), HookSchema);

export const TemplatesSchema = z.string().min(1);

// ---------------------------------------------------------------------------
// Discovery schemas
// ---------------------------------------------------------------------------

/** A declarative plugin file: `name` and `version` are required. */
export const DeclarativePluginFileSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
  })
  .passthrough();

/**
 * The part of an installed package's package.json that declares plugins:
 *
 *   "deckhand": { "plugins": { "minio": "./dist/plugin.js" } }
 */
export const PackageManifestSchema = z.object({
  name: z.string(),
  version: z.string().optional(),
  deckhand: z
    .object({
      plugins: z.record(z.string(), z.string()),
    })
    .optional(),
});

export type PackageManifest = z.infer<typeof PackageManifestSchema>;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const TYPE_NAMES: Record<string, string> = {
  object: 'mapping',
  array: 'list',
  undefined: 'nothing',
};

function typeName(zodType: string): string {
  return TYPE_NAMES[zodType] ?? zodType;
}

function valueAt(value: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = value;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isRecord(current) && typeof segment === 'string' && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/** Follow a union mismatch into the branch that got furthest into the value. */
function deepestIssue(issue: z.ZodIssue): z.ZodIssue {
  if (issue.code !== z.ZodIssueCode.invalid_union) return issue;
  let deepest: z.ZodIssue = issue;
  for (const branch of issue.unionErrors) {
    for (const candidate of branch.issues) {
      if (candidate.path.length > deepest.path.length) deepest = candidate;
    }
  }
  return deepest === issue ? issue : deepestIssue(deepest);
}

/**
 * Validate one contributed field of `plugin`. The first zod issue becomes a
 * ValidationError naming the plugin, the offending key and the expected and
 * actual types. `expected` labels the field as a whole and `entryExpected`
 * one of its entries, for issues that carry no type of their own.
 */
export function parseField<T>(
  schema: z.ZodType<T>,
  value: unknown,
  plugin: string,
  field: string,
  expected: string,
  entryExpected = 'valid value',
): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const first = result.error.issues[0];
  if (!first) throw ValidationError.forPlugin(plugin, field, expected, describeType(value));
  const issue = deepestIssue(first);

  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    const key = [...issue.path, issue.keys[0] ?? ''].join('.');
    throw ValidationError.forPlugin(plugin, `${field} entry '${key}'`, 'a known key', `'${key}'`);
  }

  const location = issue.path.length > 0 ? `${field} entry '${issue.path.join('.')}'` : field;
  let wanted = issue.path.length > 0 ? entryExpected : expected;
  if (issue.code === z.ZodIssueCode.invalid_type) wanted = typeName(issue.expected);
  throw ValidationError.forPlugin(plugin, location, wanted, describeType(valueAt(value, issue.path)));
}

// ---------------------------------------------------------------------------
// Module exports → contributions
// ---------------------------------------------------------------------------

function isThunk(value: unknown): value is () => unknown {
  return typeof value === 'function';
}

function evaluate(value: unknown): unknown {
  return isThunk(value) ? value() : value;
}

/**
 * Read the contribution fields of a plugin module. The default export is
 * used when it is an object; config, patches, hooks and templates may be
 * exported as functions and are called once.
 */
export function readModuleContributions(moduleExports: unknown): RawContributions {
  const fallback = isRecord(moduleExports) ? moduleExports['default'] : undefined;
  const target = isRecord(fallback) ? fallback : moduleExports;
  if (!isRecord(target)) return {};
  return {
    config: evaluate(target['config']),
    patches: evaluate(target['patches']),
    hooks: evaluate(target['hooks']),
    templates: evaluate(target['templates']),
    command: target['command'],
  };
}

/** Read the version a plugin module exports, if any. */
export function readModuleVersion(moduleExports: unknown): unknown {
  if (!isRecord(moduleExports)) return undefined;
  if (moduleExports['version'] !== undefined) return moduleExports['version'];
  const fallback = moduleExports['default'];
  return isRecord(fallback) ? fallback['version'] : undefined;
}
