import { DateTime } from 'luxon';
import { Product, type ProductProps } from '../../modules/product/domain/entities/Product';
import { Price } from '../../modules/product/domain/value-objects/Price';
import type { IProductRepository } from '../../modules/product/application/ports/IProductRepository';

export const FIXED_TIMESTAMP = DateTime.fromISO('2024-03-01T10:00:00.000Z', { zone: 'utc' });

/**
 * Builds a valid Product; any field can be overridden
 */
export function buildProduct(overrides: Partial<ProductProps> = {}): Product {
  return new Product({
    id: 1,
    name: 'Desk Lamp',
    description: 'Adjustable arm',
    price: Price.parse('24.50'),
    stockQuantity: 5,
    version: 0,
    createdAt: FIXED_TIMESTAMP,
    updatedAt: FIXED_TIMESTAMP,
    ...overrides,
  });
}

export function createMockProductRepository(): jest.Mocked<IProductRepository> {
  return {
    create: jest.fn(),
    findById: jest.fn(),
    findAll: jest.fn(),
    count: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
  } as jest.Mocked<IProductRepository>;
}

/**
 * Fixed clock for InMemoryProductRepository: every call advances one second
 */
export function createSteppingClock(start: DateTime = FIXED_TIMESTAMP): () => DateTime {
  let ticks = 0;
  return () => {
    const now = start.plus({ seconds: ticks });
    ticks += 1;
    return now;
  };
}
