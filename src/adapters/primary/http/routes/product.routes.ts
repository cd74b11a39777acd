import { FastifyInstance } from 'fastify';
import type { IProductRepository } from '../../../../modules/product/application/ports/IProductRepository';
import type { Product } from '../../../../modules/product/domain/entities/Product';
import { CreateProductUseCase } from '../../../../modules/product/application/use-cases/CreateProductUseCase';
import { GetProductUseCase } from '../../../../modules/product/application/use-cases/GetProductUseCase';
import { ListProductsUseCase } from '../../../../modules/product/application/use-cases/ListProductsUseCase';
import { UpdateProductUseCase } from '../../../../modules/product/application/use-cases/UpdateProductUseCase';
import { PurchaseProductUseCase } from '../../../../modules/product/application/use-cases/PurchaseProductUseCase';
import { DeleteProductUseCase } from '../../../../modules/product/application/use-cases/DeleteProductUseCase';
import { ProductNotFoundError } from '../../../../domain/errors/ProductNotFoundError';
import { toIsoString } from '../../../../shared/time';
import {
  CreateProductSchema,
  ListProductsQuerySchema,
  ProductListResponseSchema,
  ProductParamsSchema,
  ProductResponseSchema,
  PurchaseProductSchema,
  UpdateProductSchema,
  type ProductResponse,
} from '../../../../shared/validation/schemas';

/**
 * Product Routes Module
 *
 * Implements REST API endpoints for product CRUD operations:
 * - POST   /api/products              - Create product (version 0)
 * - GET    /api/products              - List products (limit/offset)
 * - GET    /api/products/:id          - Retrieve product by ID
 * - PUT    /api/products/:id          - Update product (optimistic locking)
 * - POST   /api/products/:id/purchase - Decrement stock (optimistic locking)
 * - DELETE /api/products/:id          - Delete product
 *
 * **Architecture:**
 * This is a Primary Adapter that:
 * 1. Validates requests using Zod schemas
 * 2. Calls use case execute() methods
 * 3. Maps domain entities to HTTP responses
 *
 * Domain errors are mapped to status codes by the server's error handler.
 */

export const PRODUCTS_PREFIX = '/api/products';

/**
 * Map Product domain entity to ProductResponse DTO
 */
export function mapProductToResponse(product: Product): ProductResponse {
  return {
    id: product.id,
    name: product.name,
    description: product.description,
    price: product.price.toString(),
    stockQuantity: product.stockQuantity,
    version: product.version,
    createdAt: toIsoString(product.createdAt),
    updatedAt: toIsoString(product.updatedAt),
  };
}

/**
 * Register product routes on Fastify server
 *
 * @param server - Fastify instance
 * @param productRepository - Store the use cases operate on
 */
export function registerProductRoutes(
  server: FastifyInstance,
  productRepository: IProductRepository
): void {
  const createProduct = new CreateProductUseCase(productRepository);
  const getProduct = new GetProductUseCase(productRepository);
  const listProducts = new ListProductsUseCase(productRepository);
  const updateProduct = new UpdateProductUseCase(productRepository);
  const purchaseProduct = new PurchaseProductUseCase(productRepository);
  const deleteProduct = new DeleteProductUseCase(productRepository);

  /**
   * POST /api/products - Create a new product
   *
   * **Response Codes:**
   * - 201: Product created (version 0)
   * - 400: Invalid input
   */
  server.post<{ Body: unknown }>(PRODUCTS_PREFIX, async (request, reply) => {
    const body = CreateProductSchema.parse(request.body);

    const product = await createProduct.execute(body);

    return reply.status(201).send(ProductResponseSchema.parse(mapProductToResponse(product)));
  });

  /**
   * GET /api/products - List products ordered by id
   *
   * **Response Codes:**
   * - 200: { products, total, limit, offset }
   * - 400: limit outside 1-1000 or negative offset
   */
  server.get<{ Querystring: unknown }>(PRODUCTS_PREFIX, async (request, reply) => {
    const query = ListProductsQuerySchema.parse(request.query);

    const page = await listProducts.execute(query);

    const response = ProductListResponseSchema.parse({
      products: page.products.map(mapProductToResponse),
      total: page.total,
      limit: page.limit,
      offset: page.offset,
    });

    return reply.status(200).send(response);
  });

  /**
   * GET /api/products/:id - Retrieve a product by ID
   *
   * **Response Codes:**
   * - 200: Product found
   * - 400: Invalid id
   * - 404: Product not found
   */
  server.get<{ Params: { id: string } }>(`${PRODUCTS_PREFIX}/:id`, async (request, reply) => {
    const params = ProductParamsSchema.parse(request.params);

    const product = await getProduct.execute(params.id);
    if (!product) {
      throw new ProductNotFoundError(params.id);
    }

    return reply.status(200).send(ProductResponseSchema.parse(mapProductToResponse(product)));
  });

  /**
   * PUT /api/products/:id - Replace a product's fields
   *
   * **Request Body:** name, description?, price, stockQuantity, version
   *
   * **Response Codes:**
   * - 200: Updated; response carries version + 1
   * - 400: Invalid input
   * - 404: Product not found
   * - 409: Version conflict - re-read the product and retry
   */
  server.put<{ Params: { id: string }; Body: unknown }>(
    `${PRODUCTS_PREFIX}/:id`,
    async (request, reply) => {
      const params = ProductParamsSchema.parse(request.params);
      const body = UpdateProductSchema.parse(request.body);

      const product = await updateProduct.execute(params.id, body);

      return reply.status(200).send(ProductResponseSchema.parse(mapProductToResponse(product)));
    }
  );

  /**
   * POST /api/products/:id/purchase - Decrement stock
   *
   * **Request Body:** quantity, version
   *
   * **Response Codes:**
   * - 200: Stock decremented
   * - 400: Invalid input
   * - 404: Product not found
   * - 409: Version conflict - re-read the product and retry
   * - 422: Not enough stock
   */
  server.post<{ Params: { id: string }; Body: unknown }>(
    `${PRODUCTS_PREFIX}/:id/purchase`,
    async (request, reply) => {
      const params = ProductParamsSchema.parse(request.params);
      const body = PurchaseProductSchema.parse(request.body);

      const product = await purchaseProduct.execute(params.id, body);

      return reply.status(200).send(ProductResponseSchema.parse(mapProductToResponse(product)));
    }
  );

  /**
   * DELETE /api/products/:id - Delete a product
   *
   * **Response Codes:**
   * - 204: Deleted
   * - 400: Invalid id
   * - 404: Product not found
   */
  server.delete<{ Params: { id: string } }>(`${PRODUCTS_PREFIX}/:id`, async (request, reply) => {
    const params = ProductParamsSchema.parse(request.params);

    await deleteProduct.execute(params.id);

    return reply.status(204).send();
  });
}
