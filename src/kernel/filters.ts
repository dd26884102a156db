/**
 * Filter registry
 *
 * A filter is a named pipeline of transforms folded left to right over a
 * value: each callback receives the previous callback's result plus the
 * extra arguments given to `apply`. Entries keep their registration order
 * forever and are tagged with a context so that a plugin's entries can be
 * cleared in one call.
 *
 * The registry is typed by a catalog interface mapping each filter name to
 * its value and extra-argument types:
 *
 *   interface MyFilters {
 *     'env:patches': { value: PatchEntry[]; args: [patchName: string] };
 *   }
 *   const filters = new FilterRegistry<MyFilters>(contexts, logger);
 */

import type { Logger } from '../logging/logger.js';
import { DeckhandError, PipelineError } from '../errors.js';
import { isCleared, isVisible } from './contexts.js';
import type { ContextQuery, ContextStack } from './contexts.js';

export interface FilterSignature {
  value: unknown;
  args: unknown[];
}

export type FilterCatalogShape<C> = { [K in keyof C]: FilterSignature };

export type FilterCallback<S extends FilterSignature> = (
  value: S['value'],
  ...args: S['args']
) => S['value'];

export interface FilterEntry<S extends FilterSignature> {
  callback: FilterCallback<S>;
  context?: string;
}

/** Element type of a list-valued filter; `never` for other filters. */
export type FilterItem<S extends FilterSignature> = S['value'] extends ReadonlyArray<infer E> ? E : never;

/** `copy` stands for `list` when `list` is itself an array. */
function isCopyOf<V>(list: V, copy: unknown[]): copy is V & unknown[] {
  return Array.isArray(list);
}

type FilterTable<C extends FilterCatalogShape<C>> = { [K in keyof C]?: FilterEntry<C[K]>[] };

export class FilterRegistry<C extends FilterCatalogShape<C>> {
  private table: FilterTable<C> = {};
  private readonly registered = new Set<keyof C & string>();

  constructor(
    private readonly contexts: ContextStack,
    private readonly logger: Logger,
  ) {}

  /**
   * Append `callback` to the `name` pipeline. The entry is tagged with
   * `context`, or with the current context of the stack when omitted.
   */
  add<K extends keyof C & string>(name: K, callback: FilterCallback<C[K]>, context?: string): void {
    const entry: FilterEntry<C[K]> = { callback, context: context ?? this.contexts.current() };
    const entries = this.table[name];
    if (entries) {
      entries.push(entry);
    } else {
      this.table[name] = [entry];
    }
    this.registered.add(name);
  }

  addItem<K extends keyof C & string>(name: K, item: FilterItem<C[K]>, context?: string): void {
    this.addItems(name, [item], context);
  }

  /**
   * Register a callback that concatenates `items` to the list held by a
   * list-valued filter. The list passed in is left as it is.
   */
  addItems<K extends keyof C & string>(name: K, items: FilterItem<C[K]>[], context?: string): void {
    const fixed = [...items];
    this.add(
      name,
      function appendItems(value, ..._args: C[K]['args']) {
        const next: unknown[] = Array.isArray(value) ? [...value, ...fixed] : [];
        return isCopyOf(value, next) ? next : value;
      },
      context,
    );
  }

  /** Fold every entry of `name` over `value`, whatever its context. */
  apply<K extends keyof C & string>(name: K, value: C[K]['value'], ...args: C[K]['args']): C[K]['value'] {
    return this.applyScoped(name, {}, value, ...args);
  }

  /**
   * Fold the entries of `name` that are visible under `query`. Entries that
   * are not visible are skipped, not removed.
   */
  applyScoped<K extends keyof C & string>(
    name: K,
    query: ContextQuery,
    value: C[K]['value'],
    ...args: C[K]['args']
  ): C[K]['value'] {
    let result = value;
    for (const entry of [...(this.table[name] ?? [])]) {
      if (!isVisible(entry.context, query)) continue;
      try {
        result = entry.callback(result, ...args);
      } catch (err) {
        throw this.failure(name, entry, err);
      }
    }
    return result;
  }

  /** Remove the entries of `name` matched by `query`; all of them without a query. */
  clear<K extends keyof C & string>(name: K, query: ContextQuery = {}): void {
    const entries = this.table[name];
    if (!entries) return;
    this.table[name] = entries.filter((entry) => !isCleared(entry.context, query));
  }

  clearAll(query: ContextQuery = {}): void {
    for (const name of this.registered) {
      this.clear(name, query);
    }
  }

  /** Drop every entry of every filter. */
  reset(): void {
    this.table = {};
    this.registered.clear();
  }

  /** Names that have at least one entry. */
  names(): string[] {
    return [...this.registered].filter((name) => this.count(name) > 0);
  }

  count<K extends keyof C & string>(name: K, query: ContextQuery = {}): number {
    return (this.table[name] ?? []).filter((entry) => isVisible(entry.context, query)).length;
  }

  private failure<K extends keyof C & string>(name: K, entry: FilterEntry<C[K]>, err: unknown): Error {
    const callback = entry.callback.name || 'anonymous callback';
    this.logger.error(`Error applying ${callback} for filter '${name}'`, {
      pipeline: name,
      callback,
      context: entry.context,
      error: err,
    });
    if (err instanceof DeckhandError) return err;
    return new PipelineError(name, callback, { cause: err });
  }
}
