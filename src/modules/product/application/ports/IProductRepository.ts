import type { Product, ProductDetails } from '../../domain/entities/Product';

export interface Pagination {
  limit: number;
  offset: number;
}

/**
 * Repository interface for Product persistence operations.
 *
 * This port abstracts product data access so the use cases stay independent of
 * the storage technology (PostgreSQL in production, in-memory in tests).
 *
 * "Nothing matched" outcomes are returned as values (`null`, `false`), not thrown:
 * they are expected results the use cases map to domain errors. Only unexpected
 * storage failures reject (InfrastructureError, PoolExhaustedError).
 *
 * Note: The 'I' prefix for port interfaces follows the Hexagonal Architecture
 * naming used throughout this codebase.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IProductRepository {
  /**
   * Inserts a product with version 0 and both timestamps set to now.
   *
   * @returns The stored product, including its generated id
   */
  create(details: ProductDetails): Promise<Product>;

  /**
   * @returns The product as currently stored, or null if the id does not exist
   */
  findById(productId: number): Promise<Product | null>;

  /**
   * Lists products ordered by id.
   */
  findAll(page: Pagination): Promise<Product[]>;

  /**
   * Total number of stored products.
   */
  count(): Promise<number>;

  /**
   * Conditional update (optimistic locking).
   *
   * In ONE atomic step: applies `details`, sets version to version + 1 and
   * refreshes updatedAt, but only where the row's id matches AND its version
   * equals `expectedVersion`.
   *
   * **Implementation Requirements:**
   * - MUST NOT be a read followed by a write; the version check travels with the write
   * - MUST apply all fields, the version bump and the timestamp together or nothing
   *
   * @returns The updated product, or null when no row matched. A null result does
   * not say whether the version was stale or the row is gone.
   */
  update(productId: number, details: ProductDetails, expectedVersion: number): Promise<Product | null>;

  /**
   * Unconditional delete.
   *
   * @returns true if a row was removed, false if the id did not exist
   */
  delete(productId: number): Promise<boolean>;
}
