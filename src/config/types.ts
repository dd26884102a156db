/**
 * Config value model
 *
 * The configuration is one flat mapping from upper-case keys to values. The
 * persisted user config, the base and defaults layers and plugin
 * contributions all share this shape.
 */

import { ValidationError } from '../errors.js';

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue };

export type Config = Record<string, ConfigValue>;

/** Human-readable type name used in validation messages. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'nothing';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'object') return 'mapping';
  return typeof value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isConfigValue(value: unknown): value is ConfigValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (Array.isArray(value)) return value.every(isConfigValue);
      return Object.values(value).every(isConfigValue);
    default:
      return false;
  }
}

/** Check that an arbitrary parsed document is a config mapping. */
export function castConfig(value: unknown): Config {
  if (!isRecord(value)) {
    throw new ValidationError(
      `Invalid configuration: expected mapping, got ${describeType(value)}`,
      'config',
      'mapping',
      describeType(value),
    );
  }
  const config: Config = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isConfigValue(entry)) {
      throw new ValidationError(
        `Invalid config entry '${key}': unsupported value of type ${describeType(entry)}`,
        key,
        'config value',
        describeType(entry),
      );
    }
    config[key] = entry;
  }
  return config;
}

/** Read a string list entry, inserting `[]` when the key is absent. */
export function getStringList(config: Config, key: string): string[] {
  const value = config[key] ?? null;
  if (value === null) {
    const list: string[] = [];
    config[key] = list;
    return list;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(
      `Invalid config entry '${key}': expected list of strings, got ${describeType(value)}`,
      key,
      'list of strings',
      describeType(value),
    );
  }
  return value;
}

/** Like `getStringList`, without inserting anything into `config`. */
export function readStringList(config: Config, key: string): string[] {
  if ((config[key] ?? null) === null) return [];
  return getStringList(config, key);
}
