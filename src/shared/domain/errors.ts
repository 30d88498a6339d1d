/**
 * Base class for domain errors.
 * Domain errors represent business rule violations.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Raised by repositories when a write loses a race against another
 * transaction (stale version, lock timeout, serialization failure).
 * Command runners retry on it.
 */
export class ConcurrencyConflictError extends DomainError {
  readonly code = 'CONCURRENCY_CONFLICT';

  constructor(
    message: string,
    public readonly aggregateId?: string,
  ) {
    super(message);
  }
}
