/**
 * Context stack
 *
 * A context is a scope name attached to every filter and action entry at
 * registration time. Nested contexts join with ':' into a path, so entries
 * registered under `plugins:minio` can be cleared by `plugins:minio` alone or,
 * when descendants are requested, by `plugins`.
 */

export const CONTEXT_SEPARATOR = ':';

export interface ContextQuery {
  /** Context to match. Undefined means "every context". */
  context?: string;
  /** Also match contexts nested below `context`. */
  descendants?: boolean;
  /** Leave out entries registered without a context. */
  scopedOnly?: boolean;
}

export function joinContext(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join(CONTEXT_SEPARATOR);
}

/**
 * True when `context` equals `ancestor` or, with `descendants`, is nested
 * below it.
 */
export function isWithinContext(context: string, ancestor: string, descendants = false): boolean {
  if (context === ancestor) return true;
  return descendants && context.startsWith(ancestor + CONTEXT_SEPARATOR);
}

/**
 * Whether an entry registered under `entryContext` takes part in a fold or
 * dispatch for `query`. Unscoped entries do unless the query is `scopedOnly`.
 */
export function isVisible(entryContext: string | undefined, query: ContextQuery = {}): boolean {
  if (entryContext === undefined) return query.scopedOnly !== true;
  if (query.context === undefined) return true;
  return isWithinContext(entryContext, query.context, query.descendants);
}

/**
 * Whether a clear for `query` removes an entry registered under
 * `entryContext`. A query without a context removes everything; a scoped query
 * never removes unscoped entries.
 */
export function isCleared(entryContext: string | undefined, query: ContextQuery = {}): boolean {
  if (query.context === undefined) return true;
  if (entryContext === undefined) return false;
  return isWithinContext(entryContext, query.context, query.descendants);
}

export class ContextStack {
  private readonly stack: string[] = [];

  current(): string | undefined {
    return this.stack.at(-1);
  }

  get depth(): number {
    return this.stack.length;
  }

  /**
   * Run `fn` inside `name`, nested below the current context. The context is
   * popped when `fn` returns or throws.
   */
  enter<T>(name: string, fn: () => T): T {
    const parent = this.current();
    this.stack.push(parent === undefined ? name : joinContext(parent, name));
    try {
      return fn();
    } finally {
      this.stack.pop();
    }
  }

  clear(): void {
    this.stack.length = 0;
  }
}
