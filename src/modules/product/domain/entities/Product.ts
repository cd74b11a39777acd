import { DateTime } from 'luxon';
import { Price } from '../value-objects/Price';
import { ValidationError, type ValidationIssue } from '../../../../domain/errors/ValidationError';
import { InsufficientStockError } from '../../../../domain/errors/InsufficientStockError';

export const MAX_NAME_LENGTH = 255;

/**
 * The caller-editable fields of a product. Everything a create or an update writes.
 */
export interface ProductDetails {
  name: string;
  description: string | null;
  price: Price;
  stockQuantity: number;
}

export interface ProductProps extends ProductDetails {
  id: number;
  version: number;
  createdAt: DateTime;
  updatedAt: DateTime;
}

/**
 * Collects every rule a set of product details breaks.
 * Returns an empty array when the details are valid.
 */
export function findProductDetailsIssues(details: ProductDetails): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (details.name.trim().length === 0) {
    issues.push({ path: 'name', message: 'Name cannot be empty' });
  } else if (details.name.length > MAX_NAME_LENGTH) {
    issues.push({ path: 'name', message: `Name cannot exceed ${MAX_NAME_LENGTH} characters` });
  }

  if (!Number.isSafeInteger(details.stockQuantity)) {
    issues.push({ path: 'stockQuantity', message: 'Stock quantity must be an integer' });
  } else if (details.stockQuantity < 0) {
    issues.push({ path: 'stockQuantity', message: 'Stock quantity cannot be negative' });
  }

  return issues;
}

/**
 * Throws a ValidationError listing every broken rule
 */
export function assertValidProductDetails(details: ProductDetails): void {
  const issues = findProductDetailsIssues(details);
  if (issues.length > 0) {
    throw new ValidationError(issues.map((issue) => issue.message).join('; '), issues);
  }
}

/**
 * Product entity
 *
 * A row of the products table as last read from the store. The version is the
 * lease token for the next conditional write: it is only valid until another
 * writer commits. Immutable; derived copies (e.g. withdrawStock) keep the version
 * they were read at and are advisory until the store accepts them.
 */
export class Product {
  public readonly id: number;
  public readonly name: string;
  public readonly description: string | null;
  public readonly price: Price;
  public readonly stockQuantity: number;
  public readonly version: number;
  public readonly createdAt: DateTime;
  public readonly updatedAt: DateTime;

  public constructor(props: ProductProps) {
    if (!Number.isSafeInteger(props.id) || props.id <= 0) {
      throw new ValidationError(`Product id must be a positive integer, got ${props.id}`);
    }
    if (!Number.isSafeInteger(props.version) || props.version < 0) {
      throw new ValidationError(`Product version must be a non-negative integer, got ${props.version}`);
    }
    assertValidProductDetails(props);

    this.id = props.id;
    this.name = props.name;
    this.description = props.description;
    this.price = props.price;
    this.stockQuantity = props.stockQuantity;
    this.version = props.version;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
  }

  public get details(): ProductDetails {
    return {
      name: this.name,
      description: this.description,
      price: this.price,
      stockQuantity: this.stockQuantity,
    };
  }

  /**
   * Takes units out of stock (immutable - returns new instance)
   * @param quantity Positive number of units
   * @throws InsufficientStockError if fewer than `quantity` units are in stock
   */
  public withdrawStock(quantity: number): Product {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw ValidationError.forField('quantity', 'Quantity must be a positive integer');
    }
    if (quantity > this.stockQuantity) {
      throw new InsufficientStockError(this.id, quantity, this.stockQuantity);
    }

    return new Product({
      ...this,
      stockQuantity: this.stockQuantity - quantity,
    });
  }
}
