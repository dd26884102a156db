/**
 * Extension kernel
 *
 * Owns the context stack and both registries. One kernel is created per CLI
 * run and passed by reference to every collaborator; tests create their own
 * or call `reset()` between cases.
 */

import { logger as rootLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { ActionRegistry } from './actions.js';
import type { ActionCatalog, FilterCatalog } from './catalog.js';
import { ContextStack } from './contexts.js';
import type { ContextQuery } from './contexts.js';
import { FilterRegistry } from './filters.js';

export interface KernelOptions {
  logger?: Logger;
}

export class Kernel {
  readonly contexts = new ContextStack();
  readonly filters: FilterRegistry<FilterCatalog>;
  readonly actions: ActionRegistry<ActionCatalog>;
  readonly logger: Logger;

  constructor(options: KernelOptions = {}) {
    this.logger = options.logger ?? rootLogger.child('kernel');
    this.filters = new FilterRegistry<FilterCatalog>(this.contexts, this.logger);
    this.actions = new ActionRegistry<ActionCatalog>(this.contexts, this.logger);
  }

  /**
   * Remove the filter and action entries matched by `query` from both
   * registries.
   */
  clear(query: ContextQuery): void {
    this.filters.clearAll(query);
    this.actions.clearAll(query);
  }

  /** Back to a freshly constructed kernel: no entries, no done actions, no context. */
  reset(): void {
    this.filters.reset();
    this.actions.reset();
    this.contexts.clear();
  }
}

export function createKernel(options?: KernelOptions): Kernel {
  return new Kernel(options);
}
