import type { IProductRepository, Pagination } from '../ports/IProductRepository';
import type { Product } from '../../domain/entities/Product';
import { ValidationError } from '../../../../domain/errors/ValidationError';

export const MAX_PAGE_SIZE = 1000;

export interface ProductPage extends Pagination {
  products: Product[];
  total: number;
}

/**
 * ListProductsUseCase - One page of products ordered by id, plus the total count
 *
 * The page and the count are two separate reads; under concurrent inserts or
 * deletes they may disagree by the rows that changed in between.
 */
export class ListProductsUseCase {
  public constructor(private readonly productRepository: IProductRepository) {}

  /**
   * @throws ValidationError if limit is outside 1-1000 or offset is negative
   */
  public async execute(page: Pagination): Promise<ProductPage> {
    if (!Number.isInteger(page.limit) || page.limit < 1 || page.limit > MAX_PAGE_SIZE) {
      throw ValidationError.forField('limit', `Limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    if (!Number.isInteger(page.offset) || page.offset < 0) {
      throw ValidationError.forField('offset', 'Offset must be a non-negative integer');
    }

    const [products, total] = await Promise.all([
      this.productRepository.findAll(page),
      this.productRepository.count(),
    ]);

    return { products, total, limit: page.limit, offset: page.offset };
  }
}
