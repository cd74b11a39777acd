import { DomainError } from './DomainError';

/**
 * Thrown when a purchase asks for more units than the product has in stock
 */
export class InsufficientStockError extends DomainError {
  public constructor(
    public readonly productId: number,
    public readonly requested: number,
    public readonly available: number
  ) {
    super(
      'INSUFFICIENT_STOCK',
      `Insufficient stock for product ${productId}: requested ${requested}, available ${available}`
    );
    this.name = 'InsufficientStockError';
  }
}
