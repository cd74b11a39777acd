/**
 * Standalone Fastify API Server Entry Point
 *
 * **Usage:**
 * - Build and run: `npm run build && npm start`
 *
 * **Startup order:**
 * 1. Load and validate configuration (fatal on error)
 * 2. Open the database pool with its minimum connections (fatal on error)
 * 3. Optionally apply sql/products/schema.sql (DATABASE_APPLY_SCHEMA=true)
 * 4. Register routes and listen
 *
 * **Shutdown (SIGINT / SIGTERM):**
 * Stop accepting requests, let in-flight database work finish, close every
 * pooled connection.
 *
 * **Endpoints:**
 * - GET    /                          - Service banner
 * - GET    /health                    - Database health check
 * - POST   /api/products              - Create product
 * - GET    /api/products              - List products
 * - GET    /api/products/:id          - Retrieve product
 * - PUT    /api/products/:id          - Update product (optimistic locking)
 * - POST   /api/products/:id/purchase - Decrement stock (optimistic locking)
 * - DELETE /api/products/:id          - Delete product
 */

import 'dotenv/config';
import { loadConfig, type AppConfig } from './shared/config';
import { logger } from './shared/logger';
import { DatabasePool } from './shared/database/DatabasePool';
import { sqlLoader } from './shared/database/SqlLoader';
import { createServer, startServer } from './adapters/primary/http/server';
import { registerProductRoutes } from './adapters/primary/http/routes/product.routes';
import { registerHealthRoutes } from './adapters/primary/http/routes/health.routes';
import { PostgresProductRepository } from './modules/product/adapters/persistence/PostgresProductRepository';
import { InMemoryProductRepository } from './modules/product/adapters/persistence/InMemoryProductRepository';
import type { IProductRepository } from './modules/product/application/ports/IProductRepository';

interface ProductStore {
  repository: IProductRepository;
  checkHealth: () => Promise<void>;
  close: () => Promise<void>;
}

async function openProductStore(config: AppConfig): Promise<ProductStore> {
  if (config.productStore === 'memory') {
    logger.warn({ msg: 'PRODUCT_STORE=memory: products are not persisted' });
    return {
      repository: new InMemoryProductRepository(),
      checkHealth: () => Promise.resolve(),
      close: () => Promise.resolve(),
    };
  }

  const pool = DatabasePool.create(config.database);
  await pool.open();

  if (config.database.applySchema) {
    const schema = sqlLoader.load('products', 'schema');
    await pool.withConnection((connection) => connection.query(schema));
    logger.info({ msg: 'Applied products schema' });
  }

  return {
    repository: new PostgresProductRepository(pool),
    checkHealth: () => pool.ping(),
    close: () => pool.close(),
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await openProductStore(config);

  const server = createServer();
  registerHealthRoutes(server, store.checkHealth);
  registerProductRoutes(server, store.repository);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ msg: 'Gracefully shutting down', signal });

    try {
      await server.close();
      await store.close();
      process.exit(0);
    } catch (error) {
      logger.error({
        msg: 'Error during shutdown',
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await startServer(server, config.port, config.host);
}

main().catch((error: unknown) => {
  logger.fatal({
    msg: 'Failed to start server',
    error: error instanceof Error ? error.message : String(error),
    cause: error instanceof Error && error.cause instanceof Error ? error.cause.message : undefined,
  });
  process.exit(1);
});
