/**
 * Action registry
 *
 * Actions are named lists of side-effecting callbacks, dispatched in
 * registration order. They share the context tagging of filters and add
 * fire-once dispatch: `doOnce` only runs an action whose name has never been
 * dispatched to completion in the lifetime of the registry.
 */

import type { Logger } from '../logging/logger.js';
import { DeckhandError, PipelineError } from '../errors.js';
import { isCleared, isVisible } from './contexts.js';
import type { ContextQuery, ContextStack } from './contexts.js';

export type ActionCatalogShape<C> = { [K in keyof C]: unknown[] };

export type ActionCallback<A extends unknown[]> = (...args: A) => void;

export interface ActionEntry<A extends unknown[]> {
  callback: ActionCallback<A>;
  context?: string;
}

type ActionTable<C extends ActionCatalogShape<C>> = { [K in keyof C]?: ActionEntry<C[K]>[] };

export class ActionRegistry<C extends ActionCatalogShape<C>> {
  private table: ActionTable<C> = {};
  private readonly registered = new Set<keyof C & string>();
  private readonly done = new Set<string>();
  private readonly running = new Set<string>();

  constructor(
    private readonly contexts: ContextStack,
    private readonly logger: Logger,
  ) {}

  add<K extends keyof C & string>(name: K, callback: ActionCallback<C[K]>, context?: string): void {
    const entry: ActionEntry<C[K]> = { callback, context: context ?? this.contexts.current() };
    const entries = this.table[name];
    if (entries) {
      entries.push(entry);
    } else {
      this.table[name] = [entry];
    }
    this.registered.add(name);
  }

  do<K extends keyof C & string>(name: K, ...args: C[K]): void {
    this.doScoped(name, {}, ...args);
  }

  /**
   * Run the callbacks of `name` visible under `query`. The first callback
   * that throws aborts the dispatch. The name counts as done once every
   * callback has returned.
   */
  doScoped<K extends keyof C & string>(name: K, query: ContextQuery, ...args: C[K]): void {
    this.running.add(name);
    try {
      for (const entry of [...(this.table[name] ?? [])]) {
        if (!isVisible(entry.context, query)) continue;
        try {
          entry.callback(...args);
        } catch (err) {
          throw this.failure(name, entry, err);
        }
      }
    } finally {
      this.running.delete(name);
    }
    this.done.add(name);
  }

  /**
   * Dispatch `name` unless a dispatch of it already completed or is under
   * way. A dispatch that threw does not count.
   */
  doOnce<K extends keyof C & string>(name: K, ...args: C[K]): void {
    if (this.done.has(name) || this.running.has(name)) return;
    this.do(name, ...args);
  }

  isDone(name: keyof C & string): boolean {
    return this.done.has(name);
  }

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

  /** Drop every entry and forget which actions were done. */
  reset(): void {
    this.table = {};
    this.registered.clear();
    this.done.clear();
    this.running.clear();
  }

  names(): string[] {
    return [...this.registered].filter((name) => this.count(name) > 0);
  }

  count<K extends keyof C & string>(name: K, query: ContextQuery = {}): number {
    return (this.table[name] ?? []).filter((entry) => isVisible(entry.context, query)).length;
  }

  private failure<K extends keyof C & string>(name: K, entry: ActionEntry<C[K]>, err: unknown): Error {
    const callback = entry.callback.name || 'anonymous callback';
    this.logger.error(`Error running ${callback} for action '${name}'`, {
      pipeline: name,
      callback,
      context: entry.context,
      error: err,
    });
    if (err instanceof DeckhandError) return err;
    return new PipelineError(name, callback, { cause: err });
  }
}
