import { ListProductsUseCase, MAX_PAGE_SIZE } from './ListProductsUseCase';
import type { IProductRepository } from '../ports/IProductRepository';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { buildProduct, createMockProductRepository } from '../../../../__tests__/helpers/product-fixtures';

describe('ListProductsUseCase', () => {
  let useCase: ListProductsUseCase;
  let mockProductRepository: jest.Mocked<IProductRepository>;

  beforeEach(() => {
    mockProductRepository = createMockProductRepository();
    useCase = new ListProductsUseCase(mockProductRepository);
  });

  describe('execute', () => {
    it('should return the page together with the total count', async () => {
      // Arrange
      const products = [buildProduct({ id: 11 }), buildProduct({ id: 12 })];
      mockProductRepository.findAll.mockResolvedValue(products);
      mockProductRepository.count.mockResolvedValue(40);

      // Act
      const result = await useCase.execute({ limit: 2, offset: 10 });

      // Assert
      expect(result).toEqual({ products, total: 40, limit: 2, offset: 10 });
      expect(mockProductRepository.findAll).toHaveBeenCalledWith({ limit: 2, offset: 10 });
      expect(mockProductRepository.count).toHaveBeenCalledTimes(1);
    });

    it('should return an empty page past the end', async () => {
      // Arrange
      mockProductRepository.findAll.mockResolvedValue([]);
      mockProductRepository.count.mockResolvedValue(3);

      // Act
      const result = await useCase.execute({ limit: 100, offset: 500 });

      // Assert
      expect(result.products).toEqual([]);
      expect(result.total).toBe(3);
    });

    it('should accept the maximum page size', async () => {
      // Arrange
      mockProductRepository.findAll.mockResolvedValue([]);
      mockProductRepository.count.mockResolvedValue(0);

      // Act & Assert
      await expect(useCase.execute({ limit: MAX_PAGE_SIZE, offset: 0 })).resolves.toMatchObject({
        limit: 1000,
      });
    });

    it.each([
      { limit: 0, offset: 0 },
      { limit: 1001, offset: 0 },
      { limit: 2.5, offset: 0 },
      { limit: 10, offset: -1 },
    ])('should reject limit $limit with offset $offset', async (page) => {
      // Act & Assert
      await expect(useCase.execute(page)).rejects.toThrow(ValidationError);
      expect(mockProductRepository.findAll).not.toHaveBeenCalled();
    });
  });
});
