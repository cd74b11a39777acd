import { DomainError } from './DomainError';

/**
 * Error thrown when an optimistic locking conflict is detected.
 * The conditional update matched no row because the product's version no longer
 * equals the version the caller read, i.e. another writer committed first.
 *
 * **HTTP Status:** 409 Conflict. The client should re-read the product and retry.
 */
export class OptimisticLockError extends DomainError {
  public readonly productId: number;
  public readonly expectedVersion: number;
  public readonly currentVersion: number;

  public constructor(productId: number, expectedVersion: number, currentVersion: number) {
    super(
      'VERSION_CONFLICT',
      `Product ${productId} was modified by another request (expected version ${expectedVersion}, current version ${currentVersion})`
    );
    this.name = 'OptimisticLockError';
    this.productId = productId;
    this.expectedVersion = expectedVersion;
    this.currentVersion = currentVersion;
  }
}
