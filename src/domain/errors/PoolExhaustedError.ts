import { InfrastructureError } from './InfrastructureError';

/**
 * No database connection became available within the acquire timeout.
 *
 * Transient: callers may retry with backoff. Mapped to HTTP 503.
 */
export class PoolExhaustedError extends InfrastructureError {
  public readonly waitedMs: number;

  public constructor(waitedMs: number, options?: { cause?: unknown }) {
    super(`No database connection available within ${waitedMs}ms`, options);
    this.name = 'PoolExhaustedError';
    this.waitedMs = waitedMs;
  }
}
