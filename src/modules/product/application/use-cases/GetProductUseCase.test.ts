import { GetProductUseCase } from './GetProductUseCase';
import type { IProductRepository } from '../ports/IProductRepository';
import { buildProduct, createMockProductRepository } from '../../../../__tests__/helpers/product-fixtures';

describe('GetProductUseCase', () => {
  let useCase: GetProductUseCase;
  let mockProductRepository: jest.Mocked<IProductRepository>;

  beforeEach(() => {
    mockProductRepository = createMockProductRepository();
    useCase = new GetProductUseCase(mockProductRepository);
  });

  describe('execute', () => {
    it('should return the product with its current version', async () => {
      // Arrange
      const product = buildProduct({ id: 3, version: 4 });
      mockProductRepository.findById.mockResolvedValue(product);

      // Act
      const result = await useCase.execute(3);

      // Assert
      expect(result).toBe(product);
      expect(result?.version).toBe(4);
      expect(mockProductRepository.findById).toHaveBeenCalledTimes(1);
      expect(mockProductRepository.findById).toHaveBeenCalledWith(3);
    });

    it('should return null when the product does not exist', async () => {
      // Arrange
      mockProductRepository.findById.mockResolvedValue(null);

      // Act
      const result = await useCase.execute(99);

      // Assert
      expect(result).toBeNull();
    });

    it('should throw error if repository throws error', async () => {
      // Arrange
      mockProductRepository.findById.mockRejectedValue(new Error('Database connection failed'));

      // Act & Assert
      await expect(useCase.execute(3)).rejects.toThrow('Database connection failed');
    });
  });
});
