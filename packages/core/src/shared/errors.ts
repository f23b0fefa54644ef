export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UniquenessViolationError extends Error {
  constructor(
    public readonly table: string,
    public readonly key: string,
    public readonly cause?: unknown,
  ) {
    super(`Key "${key}" already exists in ${table}`);
    this.name = 'UniquenessViolationError';
  }
}

/**
 * Raised when an optimistic-concurrency check matches no row: another writer
 * changed the entity after the caller read it. `actualModified` is null when
 * the entity no longer exists.
 */
export class StaleEntityError extends Error {
  constructor(
    public readonly entKey: string,
    public readonly expectedModified: number,
    public readonly actualModified: number | null,
  ) {
    super(
      `Stale entity ${entKey}: expected modified ${expectedModified}, actual ${actualModified ?? 'none'}`,
    );
    this.name = 'StaleEntityError';
  }
}

export class UnknownFilterTypeError extends Error {
  constructor(public readonly filter: unknown) {
    super(`unknown filter type '${JSON.stringify(filter)}'`);
    this.name = 'UnknownFilterTypeError';
  }
}

export class SerializationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'SerializationError';
  }
}

export class EntityNotFoundError extends Error {
  constructor(public readonly entKey: string) {
    super(`Entity not found: ${entKey}`);
    this.name = 'EntityNotFoundError';
  }
}
