import type { IProductRepository } from '../ports/IProductRepository';
import { ProductNotFoundError } from '../../../../domain/errors/ProductNotFoundError';

/**
 * DeleteProductUseCase - Remove a product permanently
 *
 * Deletion is unconditional (not version-gated) and terminal. A concurrent
 * writer holding an older version will see its next update rejected.
 *
 * **Throws:**
 * - ProductNotFoundError if no row was removed (HTTP 404)
 * - InfrastructureError if database operation fails (HTTP 500)
 */
export class DeleteProductUseCase {
  public constructor(private readonly productRepository: IProductRepository) {}

  public async execute(productId: number): Promise<void> {
    const deleted = await this.productRepository.delete(productId);
    if (!deleted) {
      throw new ProductNotFoundError(productId);
    }
  }
}
