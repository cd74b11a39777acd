import { PurchaseProductUseCase } from './PurchaseProductUseCase';
import type { IProductRepository } from '../ports/IProductRepository';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { OptimisticLockError } from '../../../../domain/errors/OptimisticLockError';
import { ProductNotFoundError } from '../../../../domain/errors/ProductNotFoundError';
import { InsufficientStockError } from '../../../../domain/errors/InsufficientStockError';
import { buildProduct, createMockProductRepository } from '../../../../__tests__/helpers/product-fixtures';

describe('PurchaseProductUseCase', () => {
  let useCase: PurchaseProductUseCase;
  let mockProductRepository: jest.Mocked<IProductRepository>;

  beforeEach(() => {
    mockProductRepository = createMockProductRepository();
    useCase = new PurchaseProductUseCase(mockProductRepository);
  });

  describe('execute', () => {
    it('should write the reduced stock gated on the client version', async () => {
      // Arrange
      const current = buildProduct({ id: 2, stockQuantity: 5, version: 1 });
      const updated = buildProduct({ id: 2, stockQuantity: 3, version: 2 });
      mockProductRepository.findById.mockResolvedValue(current);
      mockProductRepository.update.mockResolvedValue(updated);

      // Act
      const result = await useCase.execute(2, { quantity: 2, version: 1 });

      // Assert
      expect(result).toBe(updated);
      expect(mockProductRepository.update).toHaveBeenCalledWith(
        2,
        { ...current.details, stockQuantity: 3 },
        1
      );
    });

    it.each([
      { read: 4, sent: 3 },
      { read: 0, sent: 1 },
    ])(
      'should reject version $sent against a product read at version $read without writing',
      async ({ read, sent }) => {
        // Arrange
        mockProductRepository.findById.mockResolvedValue(buildProduct({ id: 2, version: read }));

        // Act
        const error: unknown = await useCase
          .execute(2, { quantity: 1, version: sent })
          .catch((e: unknown) => e);

        // Assert
        expect(error).toBeInstanceOf(OptimisticLockError);
        expect(error).toMatchObject({ productId: 2, expectedVersion: sent, currentVersion: read });
        expect(mockProductRepository.update).not.toHaveBeenCalled();
      }
    );

    it('should throw InsufficientStockError without writing', async () => {
      // Arrange
      mockProductRepository.findById.mockResolvedValue(buildProduct({ id: 2, stockQuantity: 1 }));

      // Act & Assert
      await expect(useCase.execute(2, { quantity: 2, version: 0 })).rejects.toThrow(
        InsufficientStockError
      );
      expect(mockProductRepository.update).not.toHaveBeenCalled();
    });

    it('should throw ProductNotFoundError when the product does not exist', async () => {
      // Arrange
      mockProductRepository.findById.mockResolvedValue(null);

      // Act & Assert
      await expect(useCase.execute(2, { quantity: 1, version: 0 })).rejects.toThrow(
        ProductNotFoundError
      );
    });

    it('should throw ProductNotFoundError when the product is deleted before the write', async () => {
      // Arrange
      mockProductRepository.findById
        .mockResolvedValueOnce(buildProduct({ id: 2 }))
        .mockResolvedValueOnce(null);
      mockProductRepository.update.mockResolvedValue(null);

      // Act & Assert
      await expect(useCase.execute(2, { quantity: 1, version: 0 })).rejects.toThrow(
        ProductNotFoundError
      );
    });

    it.each([0, -1, 1.5])('should reject quantity %p', async (quantity) => {
      // Act & Assert
      await expect(useCase.execute(2, { quantity, version: 0 })).rejects.toThrow(ValidationError);
      expect(mockProductRepository.findById).not.toHaveBeenCalled();
    });
  });
});
