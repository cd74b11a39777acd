import type { FastifyInstance } from 'fastify';
import { createServer } from '../server';
import { registerHealthRoutes } from './health.routes';

describe('Health Routes', () => {
  let server: FastifyInstance;
  let checkDatabase: jest.Mock<Promise<void>, []>;

  beforeEach(async () => {
    checkDatabase = jest.fn<Promise<void>, []>().mockResolvedValue(undefined);
    server = createServer();
    registerHealthRoutes(server, checkDatabase);
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  it('should describe the API at the root', async () => {
    const response = await server.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      message: 'Product Inventory API',
      products: '/api/products',
      health: '/health',
    });
  });

  it('should report healthy when the database answers', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', database: 'connected' });
    expect(checkDatabase).toHaveBeenCalledTimes(1);
  });

  it('should report 503 when the database check fails', async () => {
    checkDatabase.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'error', database: 'disconnected' });
  });

  it('should include an ISO timestamp', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    const body = response.json<{ timestamp: string }>();
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
  });
});
