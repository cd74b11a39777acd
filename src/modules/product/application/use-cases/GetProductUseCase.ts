import type { IProductRepository } from '../ports/IProductRepository';
import type { Product } from '../../domain/entities/Product';

/**
 * GetProductUseCase - Retrieve a product by ID
 *
 * Returns the row exactly as stored, version included. A caller that updates
 * later must assume that version can go stale at any moment.
 *
 * **Returns:**
 * - Product entity if found
 * - null if the product does not exist
 */
export class GetProductUseCase {
  public constructor(private readonly productRepository: IProductRepository) {}

  public async execute(productId: number): Promise<Product | null> {
    return await this.productRepository.findById(productId);
  }
}
