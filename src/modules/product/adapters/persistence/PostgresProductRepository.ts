import type { QueryResultRow } from 'pg';
import type { IProductRepository, Pagination } from '../../application/ports/IProductRepository';
import type { Product, ProductDetails } from '../../domain/entities/Product';
import type { DatabasePool } from '../../../../shared/database/DatabasePool';
import { sqlLoader, type SqlLoader } from '../../../../shared/database/SqlLoader';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { productDetailsToParams, productToDomain, type ProductRow } from './mappers/productMapper';

const ENTITY = 'products';

/**
 * PostgreSQL implementation of IProductRepository on top of DatabasePool.
 *
 * Every method borrows exactly one pooled connection for a single statement and
 * gives it back before returning. Statements live in sql/products/*.sql.
 *
 * **Conditional update:**
 * `UPDATE ... WHERE id = $5 AND version = $6 RETURNING ...` carries the version
 * check inside the write, so PostgreSQL's row lock makes check-and-set one step.
 * Zero returned rows means "no row matched" and is reported as null.
 */
export class PostgresProductRepository implements IProductRepository {
  public constructor(
    private readonly pool: DatabasePool,
    private readonly sql: SqlLoader = sqlLoader
  ) {}

  public async create(details: ProductDetails): Promise<Product> {
    const rows = await this.query<ProductRow>('create', productDetailsToParams(details));
    const [row] = rows;
    if (!row) {
      throw new InfrastructureError('Insert into products returned no row');
    }
    return productToDomain(row);
  }

  public async findById(productId: number): Promise<Product | null> {
    const [row] = await this.query<ProductRow>('find_by_id', [productId]);
    return row ? productToDomain(row) : null;
  }

  public async findAll(page: Pagination): Promise<Product[]> {
    const rows = await this.query<ProductRow>('find_all', [page.limit, page.offset]);
    return rows.map(productToDomain);
  }

  public async count(): Promise<number> {
    // COUNT(*) is BIGINT, returned as a string
    const [row] = await this.query<{ total: string }>('count', []);
    return row ? Number(row.total) : 0;
  }

  public async update(
    productId: number,
    details: ProductDetails,
    expectedVersion: number
  ): Promise<Product | null> {
    const [row] = await this.query<ProductRow>('update', [
      ...productDetailsToParams(details),
      productId,
      expectedVersion,
    ]);
    return row ? productToDomain(row) : null;
  }

  public async delete(productId: number): Promise<boolean> {
    const statement = this.sql.load(ENTITY, 'delete');
    const result = await this.pool.withConnection((connection) =>
      connection.query(statement, [productId])
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async query<R extends QueryResultRow>(operation: string, params: unknown[]): Promise<R[]> {
    const statement = this.sql.load(ENTITY, operation);
    const result = await this.pool.withConnection((connection) => connection.query<R>(statement, params));
    return result.rows;
  }
}
