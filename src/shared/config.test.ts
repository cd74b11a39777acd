import { loadConfig } from './config';
import { ValidationError } from '../domain/errors/ValidationError';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: 'development',
      host: '0.0.0.0',
      port: 3000,
      productStore: 'postgres',
      database: {
        host: 'localhost',
        port: 5432,
        database: 'concurrency_db',
        user: 'postgres',
        password: 'postgres',
        minConnections: 1,
        maxConnections: 10,
        acquireTimeoutMs: 5000,
        idleTimeoutMs: 30000,
        statementTimeoutMs: undefined,
        applySchema: false,
      },
    });
  });

  it('should read and coerce every variable', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      HOST: '127.0.0.1',
      PORT: '8080',
      PRODUCT_STORE: 'memory',
      DATABASE_HOST: 'db',
      DATABASE_PORT: '6543',
      DATABASE_NAME: 'inventory',
      DATABASE_USER: 'app',
      DATABASE_PASSWORD: 'test-secret',
      DATABASE_POOL_MIN: '2',
      DATABASE_POOL_MAX: '20',
      DATABASE_ACQUIRE_TIMEOUT_MS: '1500',
      DATABASE_IDLE_TIMEOUT_MS: '0',
      DATABASE_STATEMENT_TIMEOUT_MS: '2000',
      DATABASE_APPLY_SCHEMA: 'true',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.port).toBe(8080);
    expect(config.productStore).toBe('memory');
    expect(config.database).toEqual({
      host: 'db',
      port: 6543,
      database: 'inventory',
      user: 'app',
      password: 'test-secret',
      minConnections: 2,
      maxConnections: 20,
      acquireTimeoutMs: 1500,
      idleTimeoutMs: 0,
      statementTimeoutMs: 2000,
      applySchema: true,
    });
  });

  it('should reject a pool minimum above the maximum', () => {
    expect(() => loadConfig({ DATABASE_POOL_MIN: '5', DATABASE_POOL_MAX: '2' })).toThrow(
      'Invalid configuration: DATABASE_POOL_MIN: DATABASE_POOL_MIN cannot exceed DATABASE_POOL_MAX'
    );
  });

  it('should list every invalid variable in the error details', () => {
    let thrown: unknown;
    try {
      loadConfig({ PORT: 'abc', PRODUCT_STORE: 'redis', DATABASE_APPLY_SCHEMA: 'yes' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    const paths = thrown instanceof ValidationError ? thrown.details?.map((d) => d.path) : [];
    expect(paths).toEqual(['PORT', 'PRODUCT_STORE', 'DATABASE_APPLY_SCHEMA']);
  });
});
