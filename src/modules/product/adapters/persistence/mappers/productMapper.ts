import { DateTime } from 'luxon';
import { Product, type ProductDetails } from '../../../domain/entities/Product';
import { Price } from '../../../domain/value-objects/Price';

/**
 * Row shape returned by the products queries.
 * `price` is NUMERIC, which node-postgres hands back as a string.
 */
export type ProductRow = {
  id: number;
  name: string;
  description: string | null;
  price: string;
  stock_quantity: number;
  version: number;
  created_at: Date;
  updated_at: Date;
};

/**
 * Converts a products row to a domain Product entity
 */
export function productToDomain(row: ProductRow): Product {
  return new Product({
    id: row.id,
    name: row.name,
    description: row.description,
    price: Price.parse(row.price),
    stockQuantity: row.stock_quantity,
    version: row.version,
    createdAt: DateTime.fromJSDate(row.created_at),
    updatedAt: DateTime.fromJSDate(row.updated_at),
  });
}

/**
 * Positional parameters for name, description, price, stock_quantity.
 * The price travels as its exact decimal string.
 */
export function productDetailsToParams(details: ProductDetails): [string, string | null, string, number] {
  return [details.name, details.description, details.price.toString(), details.stockQuantity];
}
