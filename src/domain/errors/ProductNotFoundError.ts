import { DomainError } from './DomainError';

/**
 * ProductNotFoundError - the product id does not exist (or no longer exists)
 *
 * **HTTP Status:** 404 Not Found
 *
 * **Usage:**
 * ```typescript
 * const product = await productRepository.findById(productId);
 * if (!product) {
 *   throw new ProductNotFoundError(productId);
 * }
 * ```
 */
export class ProductNotFoundError extends DomainError {
  public readonly productId: number;

  public constructor(productId: number) {
    super('PRODUCT_NOT_FOUND', `Product not found: ${productId}`);
    this.name = 'ProductNotFoundError';
    this.productId = productId;
  }
}
