import fastify, { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { ValidationError } from '../../../domain/errors/ValidationError';
import { ProductNotFoundError } from '../../../domain/errors/ProductNotFoundError';
import { OptimisticLockError } from '../../../domain/errors/OptimisticLockError';
import { InsufficientStockError } from '../../../domain/errors/InsufficientStockError';
import { PoolExhaustedError } from '../../../domain/errors/PoolExhaustedError';
import type { ErrorResponse } from '../../../shared/validation/schemas';

/**
 * Fastify Server Configuration
 *
 * This module configures the Fastify HTTP server with:
 * - Global error handling that maps domain outcomes to distinct status codes
 * - CORS support
 * - JSON logging with Pino (disabled under NODE_ENV=test)
 *
 * **Status mapping:**
 * - ZodError / ValidationError → 400 VALIDATION_FAILED
 * - ProductNotFoundError → 404 PRODUCT_NOT_FOUND
 * - OptimisticLockError → 409 VERSION_CONFLICT (re-read and retry)
 * - InsufficientStockError → 422 INSUFFICIENT_STOCK
 * - PoolExhaustedError → 503 POOL_EXHAUSTED with Retry-After
 * - anything else → 500 INTERNAL_ERROR (logged)
 */

function errorBody(code: string, message: string, details?: unknown): ErrorResponse {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

function clientErrorStatus(error: Error): number | null {
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return error.statusCode;
  }
  return null;
}

/**
 * Create and configure a Fastify server instance
 *
 * @returns Configured Fastify instance ready to register routes
 */
export function createServer(): FastifyInstance {
  const server = fastify({
    logger:
      process.env['NODE_ENV'] === 'test'
        ? false // Disable logging in tests
        : {
            level: process.env['LOG_LEVEL'] || 'info',
          },
  });

  void server.register(cors, {
    origin: true,
  });

  server.setErrorHandler((error: Error, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send(
        errorBody(
          'VALIDATION_FAILED',
          'Request validation failed',
          error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        )
      );
    }

    if (error instanceof ValidationError) {
      return reply.status(400).send(errorBody(error.code, error.message, error.details));
    }

    if (error instanceof ProductNotFoundError) {
      return reply.status(404).send(errorBody(error.code, error.message));
    }

    if (error instanceof OptimisticLockError) {
      return reply.status(409).send(
        errorBody(error.code, error.message, {
          expectedVersion: error.expectedVersion,
          currentVersion: error.currentVersion,
        })
      );
    }

    if (error instanceof InsufficientStockError) {
      return reply.status(422).send(
        errorBody(error.code, error.message, {
          requested: error.requested,
          available: error.available,
        })
      );
    }

    if (error instanceof PoolExhaustedError) {
      request.log.warn({ err: error }, 'Request rejected: database pool exhausted');
      return reply
        .status(503)
        .header('Retry-After', '1')
        .send(errorBody('POOL_EXHAUSTED', 'The service is busy, retry shortly'));
    }

    // Framework-level client errors (malformed JSON, unsupported media type, ...)
    const status = clientErrorStatus(error);
    if (status !== null) {
      return reply.status(status).send(errorBody('BAD_REQUEST', error.message));
    }

    // Log unexpected errors
    request.log.error(error);

    return reply.status(500).send(errorBody('INTERNAL_ERROR', 'An unexpected error occurred'));
  });

  return server;
}

/**
 * Start the Fastify server
 *
 * @param server - Fastify instance
 * @param port - Port to listen on (default: 3000)
 * @param host - Host to bind to (default: 0.0.0.0)
 */
export async function startServer(
  server: FastifyInstance,
  port = 3000,
  host = '0.0.0.0'
): Promise<void> {
  await server.listen({ port, host });
  server.log.info(`Server listening on ${host}:${port}`);
}
