import type { IProductRepository } from '../ports/IProductRepository';
import type { Product } from '../../domain/entities/Product';
import type { PurchaseProductDTO } from '../../../../shared/validation/schemas';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { OptimisticLockError } from '../../../../domain/errors/OptimisticLockError';
import { ProductNotFoundError } from '../../../../domain/errors/ProductNotFoundError';
import { resolveRejectedUpdate } from './resolveRejectedUpdate';

/**
 * PurchaseProductUseCase - Take units out of stock without overselling
 *
 * Reads the product and subtracts `quantity` from that copy. The copy must be the
 * state the client saw: a read at any other version is a conflict before anything
 * is written. The write is gated on that same version, so if another purchase
 * commits in between, it matches no row and the caller gets OptimisticLockError
 * instead of a second decrement against stock that is no longer there.
 *
 * **Throws:**
 * - ValidationError if quantity or version is invalid (HTTP 400)
 * - ProductNotFoundError if the product does not exist (HTTP 404)
 * - InsufficientStockError if the stock read is below `quantity` (HTTP 422)
 * - OptimisticLockError if the product changed since the client read it (HTTP 409)
 */
export class PurchaseProductUseCase {
  public constructor(private readonly productRepository: IProductRepository) {}

  public async execute(productId: number, dto: PurchaseProductDTO): Promise<Product> {
    if (!Number.isSafeInteger(dto.quantity) || dto.quantity <= 0) {
      throw ValidationError.forField('quantity', 'Quantity must be a positive integer');
    }
    if (!Number.isSafeInteger(dto.version) || dto.version < 0) {
      throw ValidationError.forField('version', 'Version must be a non-negative integer');
    }

    const product = await this.productRepository.findById(productId);
    if (!product) {
      throw new ProductNotFoundError(productId);
    }
    // The new stock is computed from this row, so the write may only target its version
    if (product.version !== dto.version) {
      throw new OptimisticLockError(productId, dto.version, product.version);
    }

    const remaining = product.withdrawStock(dto.quantity);

    const updated = await this.productRepository.update(productId, remaining.details, product.version);
    if (updated) {
      return updated;
    }

    return await resolveRejectedUpdate(this.productRepository, productId, dto.version);
  }
}
