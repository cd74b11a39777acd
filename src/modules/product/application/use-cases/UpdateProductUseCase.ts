import type { IProductRepository } from '../ports/IProductRepository';
import type { Product } from '../../domain/entities/Product';
import type { UpdateProductDTO } from '../../../../shared/validation/schemas';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { toProductDetails } from '../dtos/toProductDetails';
import { resolveRejectedUpdate } from './resolveRejectedUpdate';

/**
 * UpdateProductUseCase - Replace a product's fields under optimistic locking
 *
 * **Flow:** Validate → Attempt(expectedVersion) → Success | Conflict | NotFound | ValidationError
 *
 * 1. Validate the new values and the expected version. Nothing reaches the store
 *    on failure.
 * 2. One conditional write: applied only if the stored version still equals
 *    `dto.version`; the store bumps the version and updatedAt in the same step.
 * 3. If no row matched, resolveRejectedUpdate() decides between conflict and
 *    not-found.
 *
 * Each call is self-contained and never retries. Re-reading and retrying after a
 * conflict is the client's decision.
 *
 * **Usage:**
 * ```typescript
 * const product = await getProductUseCase.execute(42);
 * const updated = await updateProductUseCase.execute(42, {
 *   name: product.name,
 *   price: '21.00',
 *   stockQuantity: product.stockQuantity,
 *   version: product.version,
 * });
 * ```
 *
 * **Throws:**
 * - ValidationError if input validation fails (HTTP 400)
 * - ProductNotFoundError if the product does not exist (HTTP 404)
 * - OptimisticLockError if another writer committed first (HTTP 409)
 * - InfrastructureError / PoolExhaustedError if the database fails (HTTP 500 / 503)
 */
export class UpdateProductUseCase {
  public constructor(private readonly productRepository: IProductRepository) {}

  public async execute(productId: number, dto: UpdateProductDTO): Promise<Product> {
    if (!Number.isSafeInteger(dto.version) || dto.version < 0) {
      throw ValidationError.forField('version', 'Version must be a non-negative integer');
    }
    const details = toProductDetails(dto);

    const updated = await this.productRepository.update(productId, details, dto.version);
    if (updated) {
      return updated;
    }

    return await resolveRejectedUpdate(this.productRepository, productId, dto.version);
  }
}
