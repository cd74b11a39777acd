import { assertValidProductDetails, type ProductDetails } from '../../domain/entities/Product';
import { Price } from '../../domain/value-objects/Price';
import type { CreateProductDTO } from '../../../../shared/validation/schemas';

/**
 * Turns client input into validated ProductDetails.
 *
 * @throws ValidationError for an empty name, a negative or over-precise price,
 * or a negative / fractional stock quantity
 */
export function toProductDetails(dto: CreateProductDTO): ProductDetails {
  const details: ProductDetails = {
    name: dto.name,
    description: dto.description ?? null,
    price: Price.parse(dto.price),
    stockQuantity: dto.stockQuantity,
  };

  assertValidProductDetails(details);
  return details;
}
