import type { IProductRepository } from '../ports/IProductRepository';
import { OptimisticLockError } from '../../../../domain/errors/OptimisticLockError';
import { ProductNotFoundError } from '../../../../domain/errors/ProductNotFoundError';
import { logger } from '../../../../shared/logger';

/**
 * Explains why a conditional update matched no row.
 *
 * The update result alone cannot tell a stale version from a deleted row, so
 * this reads the row once more: gone means ProductNotFoundError, present means
 * OptimisticLockError with the version the caller should re-read from. The read
 * is informational only; nothing is retried.
 */
export async function resolveRejectedUpdate(
  productRepository: IProductRepository,
  productId: number,
  expectedVersion: number
): Promise<never> {
  const current = await productRepository.findById(productId);

  if (!current) {
    throw new ProductNotFoundError(productId);
  }

  logger.debug({
    msg: 'Conditional update rejected: version conflict',
    productId,
    expectedVersion,
    currentVersion: current.version,
  });

  throw new OptimisticLockError(productId, expectedVersion, current.version);
}
