import { FastifyInstance } from 'fastify';
import { logger } from '../../../../shared/logger';

/**
 * Resolves when the backing store answers, rejects otherwise
 */
export type HealthCheck = () => Promise<void>;

/**
 * Register service banner and health check routes
 *
 * - GET /       - Service banner
 * - GET /health - 200 when the database answers, 503 otherwise
 */
export function registerHealthRoutes(server: FastifyInstance, checkDatabase: HealthCheck): void {
  server.get('/', () => {
    return {
      message: 'Product Inventory API',
      products: '/api/products',
      health: '/health',
    };
  });

  server.get('/health', async (_request, reply) => {
    try {
      await checkDatabase();
      return reply.status(200).send({
        status: 'ok',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.warn({
        msg: 'Health check failed',
        error: error instanceof Error ? error.message : String(error),
      });
      return reply.status(503).send({
        status: 'error',
        database: 'disconnected',
        timestamp: new Date().toISOString(),
      });
    }
  });
}
