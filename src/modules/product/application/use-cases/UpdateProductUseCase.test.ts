import { UpdateProductUseCase } from './UpdateProductUseCase';
import type { IProductRepository } from '../ports/IProductRepository';
import { Price } from '../../domain/value-objects/Price';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { OptimisticLockError } from '../../../../domain/errors/OptimisticLockError';
import { ProductNotFoundError } from '../../../../domain/errors/ProductNotFoundError';
import { buildProduct, createMockProductRepository } from '../../../../__tests__/helpers/product-fixtures';

describe('UpdateProductUseCase', () => {
  let useCase: UpdateProductUseCase;
  let mockProductRepository: jest.Mocked<IProductRepository>;

  const dto = {
    name: 'Desk Lamp Pro',
    description: null,
    price: '29.99',
    stockQuantity: 8,
    version: 2,
  };

  beforeEach(() => {
    mockProductRepository = createMockProductRepository();
    useCase = new UpdateProductUseCase(mockProductRepository);
  });

  describe('execute', () => {
    it('should issue one conditional update with the expected version', async () => {
      // Arrange
      const updated = buildProduct({ id: 4, name: 'Desk Lamp Pro', version: 3 });
      mockProductRepository.update.mockResolvedValue(updated);

      // Act
      const result = await useCase.execute(4, dto);

      // Assert
      expect(result).toBe(updated);
      expect(mockProductRepository.update).toHaveBeenCalledTimes(1);
      expect(mockProductRepository.update).toHaveBeenCalledWith(
        4,
        {
          name: 'Desk Lamp Pro',
          description: null,
          price: Price.parse('29.99'),
          stockQuantity: 8,
        },
        2
      );
      expect(mockProductRepository.findById).not.toHaveBeenCalled();
    });

    it('should throw OptimisticLockError when the row exists at another version', async () => {
      // Arrange
      mockProductRepository.update.mockResolvedValue(null);
      mockProductRepository.findById.mockResolvedValue(buildProduct({ id: 4, version: 5 }));

      // Act & Assert
      await expect(useCase.execute(4, dto)).rejects.toThrow(
        'Product 4 was modified by another request (expected version 2, current version 5)'
      );
    });

    it('should carry both versions on the conflict error', async () => {
      // Arrange
      mockProductRepository.update.mockResolvedValue(null);
      mockProductRepository.findById.mockResolvedValue(buildProduct({ id: 4, version: 5 }));

      // Act
      const error: unknown = await useCase.execute(4, dto).catch((e: unknown) => e);

      // Assert
      expect(error).toBeInstanceOf(OptimisticLockError);
      expect(error).toMatchObject({ productId: 4, expectedVersion: 2, currentVersion: 5 });
    });

    it('should throw ProductNotFoundError when the row is gone', async () => {
      // Arrange
      mockProductRepository.update.mockResolvedValue(null);
      mockProductRepository.findById.mockResolvedValue(null);

      // Act & Assert
      await expect(useCase.execute(4, dto)).rejects.toThrow(ProductNotFoundError);
    });

    it('should never retry a rejected update', async () => {
      // Arrange
      mockProductRepository.update.mockResolvedValue(null);
      mockProductRepository.findById.mockResolvedValue(buildProduct({ id: 4, version: 3 }));

      // Act
      await expect(useCase.execute(4, dto)).rejects.toThrow(OptimisticLockError);

      // Assert
      expect(mockProductRepository.update).toHaveBeenCalledTimes(1);
    });

    it('should reject invalid fields without calling the repository', async () => {
      // Act & Assert
      await expect(useCase.execute(4, { ...dto, stockQuantity: -1 })).rejects.toThrow(
        'Stock quantity cannot be negative'
      );
      await expect(useCase.execute(4, { ...dto, version: -1 })).rejects.toThrow(ValidationError);
      expect(mockProductRepository.update).not.toHaveBeenCalled();
    });
  });
});
