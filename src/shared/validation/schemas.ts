import { z } from 'zod';

/** Upper bound of a PostgreSQL INTEGER column (id, version, stock_quantity) */
export const MAX_INT4 = 2147483647;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const VersionSchema = z
  .number()
  .int('Version must be an integer')
  .nonnegative('Version cannot be negative')
  .max(MAX_INT4, `Version cannot exceed ${MAX_INT4}`);

/**
 * Price as sent by clients: a JSON number or a decimal string.
 * Exact parsing (at most two fractional digits, non-negative) happens in the
 * Price value object, so the same rules apply to every caller of the use cases.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const PriceInputSchema = z.union([
  z.number(),
  z.string().trim().min(1, 'Price is required'),
]);

/**
 * Zod schema for CreateProduct input validation
 *
 * This schema serves as the single source of truth for:
 * - Runtime validation of POST /api/products bodies (via schema.parse())
 * - Compile-time types (via z.infer<>)
 *
 * Validation Rules:
 * - name: required, 1-255 characters after trimming
 * - description: optional, may be null
 * - price: number or decimal string
 * - stockQuantity: required, non-negative integer
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const CreateProductSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Name is required')
    .max(255, 'Name cannot exceed 255 characters'),
  description: z.string().nullable().optional(),
  price: PriceInputSchema,
  stockQuantity: z
    .number()
    .int('Stock quantity must be an integer')
    .nonnegative('Stock quantity cannot be negative')
    .max(MAX_INT4, `Stock quantity cannot exceed ${MAX_INT4}`),
});

/**
 * TypeScript type derived from CreateProductSchema
 *
 * DO NOT manually define this type - always derive it from the schema using z.infer<>
 */
export type CreateProductDTO = z.infer<typeof CreateProductSchema>;

/**
 * Zod schema for UpdateProduct input validation
 *
 * Full replacement of the editable fields plus the version the client read.
 * The version is the optimistic-lock token: the update only applies if the
 * stored version still equals it.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const UpdateProductSchema = CreateProductSchema.extend({
  version: VersionSchema,
});

export type UpdateProductDTO = z.infer<typeof UpdateProductSchema>;

/**
 * Zod schema for POST /api/products/:id/purchase
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const PurchaseProductSchema = z.object({
  quantity: z.number().int('Quantity must be an integer').positive('Quantity must be positive'),
  version: VersionSchema,
});

export type PurchaseProductDTO = z.infer<typeof PurchaseProductSchema>;

/**
 * Zod schema for URL parameters containing a product ID
 *
 * Used by GET, PUT, DELETE /api/products/:id and POST /api/products/:id/purchase
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ProductParamsSchema = z.object({
  id: z.coerce
    .number()
    .int('Product id must be an integer')
    .positive('Product id must be positive')
    .max(MAX_INT4, `Product id cannot exceed ${MAX_INT4}`),
});

export type ProductParams = z.infer<typeof ProductParamsSchema>;

/**
 * Zod schema for GET /api/products pagination
 *
 * - limit: 1-1000, default 100
 * - offset: >= 0, default 0
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ListProductsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListProductsQuery = z.infer<typeof ListProductsQuerySchema>;

/**
 * Zod schema for Product response serialization
 *
 * Response Fields:
 * - price: fixed 2-digit decimal string (never a float)
 * - version: token to send back with the next update
 * - createdAt / updatedAt: ISO 8601 datetime strings
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ProductResponseSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  description: z.string().nullable(),
  price: z.string().regex(/^\d+\.\d{2}$/),
  stockQuantity: z.number().int().nonnegative(),
  version: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type ProductResponse = z.infer<typeof ProductResponseSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ProductListResponseSchema = z.object({
  products: z.array(ProductResponseSchema),
  total: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
  offset: z.number().int().nonnegative(),
});

export type ProductListResponse = z.infer<typeof ProductListResponseSchema>;

/**
 * Zod schema for error responses
 *
 * Standard error format for all API error responses.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
