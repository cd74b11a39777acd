import { DateTime } from 'luxon';
import type { IProductRepository, Pagination } from '../../application/ports/IProductRepository';
import { Product, type ProductDetails } from '../../domain/entities/Product';

/**
 * Lets other pending operations run before this one touches the map, so
 * concurrent callers interleave the way they would against a real database.
 */
function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * In-memory implementation of IProductRepository.
 *
 * Same contract as the PostgreSQL adapter: version 0 on create, version + 1 and a
 * fresh updatedAt on every successful conditional update, null when id and
 * expected version do not both match. The compare and the write in update() run
 * without an await between them, which makes them one atomic step on the event loop.
 *
 * Used by the concurrency test harness and for running the API without a database
 * (PRODUCT_STORE=memory). State lives only as long as the instance.
 *
 * @example
 * ```typescript
 * const repository = new InMemoryProductRepository();
 * const product = await repository.create({ name: 'Desk Lamp', description: null, price: Price.parse('24.50'), stockQuantity: 3 });
 * await repository.update(product.id, { ...product.details, stockQuantity: 2 }, product.version); // version 1
 * await repository.update(product.id, { ...product.details, stockQuantity: 1 }, product.version); // null
 * ```
 */
export class InMemoryProductRepository implements IProductRepository {
  private readonly products = new Map<number, Product>();
  private nextId = 1;

  /**
   * @param clock - Source of timestamps (tests pass a fixed clock)
   */
  public constructor(private readonly clock: () => DateTime = () => DateTime.now()) {}

  public async create(details: ProductDetails): Promise<Product> {
    await yieldToEventLoop();

    const now = this.clock();
    const product = new Product({
      ...details,
      id: this.nextId,
      version: 0,
      createdAt: now,
      updatedAt: now,
    });

    this.nextId += 1;
    this.products.set(product.id, product);
    return product;
  }

  public async findById(productId: number): Promise<Product | null> {
    await yieldToEventLoop();
    return this.products.get(productId) ?? null;
  }

  public async findAll(page: Pagination): Promise<Product[]> {
    await yieldToEventLoop();
    return Array.from(this.products.values())
      .sort((a, b) => a.id - b.id)
      .slice(page.offset, page.offset + page.limit);
  }

  public async count(): Promise<number> {
    await yieldToEventLoop();
    return this.products.size;
  }

  public async update(
    productId: number,
    details: ProductDetails,
    expectedVersion: number
  ): Promise<Product | null> {
    await yieldToEventLoop();

    // No await from here on: check and write are one step
    const current = this.products.get(productId);
    if (!current || current.version !== expectedVersion) {
      return null;
    }

    const updated = new Product({
      ...details,
      id: current.id,
      version: current.version + 1,
      createdAt: current.createdAt,
      updatedAt: this.clock(),
    });
    this.products.set(productId, updated);
    return updated;
  }

  public async delete(productId: number): Promise<boolean> {
    await yieldToEventLoop();
    return this.products.delete(productId);
  }
}
