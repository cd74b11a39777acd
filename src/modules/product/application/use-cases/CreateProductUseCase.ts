import type { IProductRepository } from '../ports/IProductRepository';
import type { Product } from '../../domain/entities/Product';
import type { CreateProductDTO } from '../../../../shared/validation/schemas';
import { toProductDetails } from '../dtos/toProductDetails';

/**
 * CreateProductUseCase - Validate and insert a new product
 *
 * The store assigns the id, version 0 and both timestamps.
 *
 * **Usage:**
 * ```typescript
 * const createProductUseCase = new CreateProductUseCase(productRepository);
 * const product = await createProductUseCase.execute({
 *   name: 'Desk Lamp',
 *   price: '24.50',
 *   stockQuantity: 12,
 * });
 * ```
 *
 * **Throws:**
 * - ValidationError if input validation fails (HTTP 400)
 * - InfrastructureError if database operation fails (HTTP 500)
 */
export class CreateProductUseCase {
  /**
   * @param productRepository - Repository port for product persistence operations
   */
  public constructor(private readonly productRepository: IProductRepository) {}

  public async execute(dto: CreateProductDTO): Promise<Product> {
    const details = toProductDetails(dto);
    return await this.productRepository.create(details);
  }
}
