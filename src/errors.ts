/** Error taxonomy shared by the kernel, the plugin lifecycle and the CLI. */

export class DeckhandError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DeckhandError';
  }
}

/**
 * A plugin field or a config entry does not have the expected shape.
 * `plugin` is absent for errors raised on the user config itself.
 */
export class ValidationError extends DeckhandError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly expected: string,
    public readonly actual: string,
    public readonly plugin?: string,
  ) {
    super(message, 'VALIDATION_ERROR', { plugin, field, expected, actual });
    this.name = 'ValidationError';
  }

  static forPlugin(plugin: string, field: string, expected: string, actual: string): ValidationError {
    return new ValidationError(
      `Invalid ${field} in plugin ${plugin}: expected ${expected}, got ${actual}`,
      field,
      expected,
      actual,
      plugin,
    );
  }
}

export class NotInstalledError extends DeckhandError {
  constructor(public readonly plugin: string) {
    super(`Plugin '${plugin}' is not installed`, 'NOT_INSTALLED', { plugin });
    this.name = 'NotInstalledError';
  }
}

export class NotFoundError extends DeckhandError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', { entity, id });
    this.name = 'NotFoundError';
  }
}

/** A discovered plugin entry could not be read. Logged and skipped by discovery. */
export class DiscoveryError extends DeckhandError {
  constructor(
    public readonly source: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to load plugin from ${source}: ${reason}`, 'DISCOVERY_ERROR', { source }, options);
    this.name = 'DiscoveryError';
  }
}

/** A filter or action callback threw something that is not a DeckhandError. */
export class PipelineError extends DeckhandError {
  constructor(
    public readonly pipeline: string,
    public readonly callback: string,
    options?: ErrorOptions,
  ) {
    super(
      `Error in ${callback} for pipeline '${pipeline}': ${describeCause(options?.cause)}`,
      'PIPELINE_ERROR',
      { pipeline, callback },
      options,
    );
    this.name = 'PipelineError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? 'unknown error' : errorMessage(cause);
}
