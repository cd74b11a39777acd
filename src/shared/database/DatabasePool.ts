import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { DatabaseConfig } from '../config';
import { logger } from '../logger';
import { DomainError } from '../../domain/errors/DomainError';
import { InfrastructureError } from '../../domain/errors/InfrastructureError';
import { PoolExhaustedError } from '../../domain/errors/PoolExhaustedError';

/** pg-pool rejects a queued connect() with this message once connectionTimeoutMillis elapses */
const ACQUIRE_TIMEOUT_MESSAGE = 'timeout exceeded when trying to connect';

type PoolState = 'created' | 'open' | 'closing' | 'closed';

export interface DatabasePoolOptions {
  minConnections: number;
  acquireTimeoutMs: number;
}

export interface PoolStats {
  total: number;
  idle: number;
  waiting: number;
}

/**
 * One borrowed connection. Release is idempotent; queries after release fail.
 */
export class PooledConnection {
  private released = false;

  public constructor(
    private readonly client: PoolClient,
    private readonly onRelease: () => void
  ) {}

  public get isReleased(): boolean {
    return this.released;
  }

  public query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    if (this.released) {
      return Promise.reject(new InfrastructureError('Database connection used after release'));
    }
    return this.client.query<R>(text, values);
  }

  public release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.client.release();
    this.onRelease();
  }
}

function isAcquireTimeout(error: unknown): boolean {
  return error instanceof Error && error.message.includes(ACQUIRE_TIMEOUT_MESSAGE);
}

function toStorageError(error: unknown): Error {
  if (error instanceof DomainError || error instanceof InfrastructureError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InfrastructureError(`Database operation failed: ${message}`, { cause: error });
}

/**
 * DatabasePool - process-wide PostgreSQL connection pool with explicit lifecycle
 *
 * Wraps a `pg.Pool` bounded by `max` connections.
 *
 * **Lifecycle:**
 * 1. `DatabasePool.create(config)` - builds the pool, opens nothing
 * 2. `open()` - establishes `minConnections`; any failure ends the pool and throws
 * 3. `withConnection()` / `acquire()` - one borrowed connection per operation
 * 4. `close()` - stops handing out connections, waits for in-flight work, ends the pool
 *
 * **Acquisition:**
 * A caller waits at most `acquireTimeoutMs` for a free connection, then gets a
 * PoolExhaustedError. `withConnection()` releases on every exit path.
 *
 * @example
 * ```typescript
 * const pool = DatabasePool.create(config.database);
 * await pool.open();
 * const total = await pool.withConnection(async (connection) => {
 *   const result = await connection.query<{ total: string }>('SELECT COUNT(*) AS total FROM products');
 *   return Number(result.rows[0].total);
 * });
 * await pool.close();
 * ```
 */
export class DatabasePool {
  private state: PoolState = 'created';
  private closing: Promise<void> | null = null;
  private readonly inFlight = new Set<Promise<unknown>>();

  public constructor(
    private readonly pool: Pool,
    private readonly options: DatabasePoolOptions
  ) {
    this.pool.on('error', (error: Error) => {
      logger.error({
        msg: 'Unexpected error on idle database client',
        error: error.message,
        stack: error.stack,
      });
    });
  }

  public static create(config: DatabaseConfig): DatabasePool {
    const pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: config.maxConnections,
      connectionTimeoutMillis: config.acquireTimeoutMs,
      idleTimeoutMillis: config.idleTimeoutMs,
      statement_timeout: config.statementTimeoutMs,
    });

    return new DatabasePool(pool, {
      minConnections: config.minConnections,
      acquireTimeoutMs: config.acquireTimeoutMs,
    });
  }

  public get isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Establishes the configured minimum number of connections.
   *
   * @throws InfrastructureError if any of them cannot be established; the pool is
   * ended and cannot be reopened
   */
  public async open(): Promise<void> {
    if (this.state !== 'created') {
      throw new InfrastructureError(`Database pool cannot be opened while ${this.state}`);
    }

    const attempts = await Promise.allSettled(
      Array.from({ length: this.options.minConnections }, () => this.pool.connect())
    );

    for (const attempt of attempts) {
      if (attempt.status === 'fulfilled') {
        attempt.value.release();
      }
    }

    const failure = attempts.find(
      (attempt): attempt is PromiseRejectedResult => attempt.status === 'rejected'
    );
    if (failure) {
      this.state = 'closed';
      await this.pool.end();
      throw new InfrastructureError(
        `Unable to establish the minimum of ${this.options.minConnections} database connections`,
        { cause: failure.reason }
      );
    }

    this.state = 'open';
    logger.info({
      msg: 'Database pool opened',
      minConnections: this.options.minConnections,
      ...this.stats(),
    });
  }

  /**
   * Borrows a connection. The caller must release it, preferably via withConnection().
   *
   * @throws PoolExhaustedError if none frees up within acquireTimeoutMs
   * @throws InfrastructureError if the pool is not open or the connection fails
   */
  public async acquire(): Promise<PooledConnection> {
    if (this.state !== 'open') {
      throw new InfrastructureError(`Database pool is not open (state: ${this.state})`);
    }

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      if (isAcquireTimeout(error)) {
        logger.warn({ msg: 'Database pool exhausted', ...this.stats() });
        throw new PoolExhaustedError(this.options.acquireTimeoutMs, { cause: error });
      }
      throw toStorageError(error);
    }

    return new PooledConnection(client, () => {
      logger.debug({ msg: 'Database connection released' });
    });
  }

  /**
   * Runs `work` on one borrowed connection and releases it afterwards, whether
   * `work` resolves or throws. Unexpected driver errors surface as InfrastructureError.
   */
  public withConnection<T>(work: (connection: PooledConnection) => Promise<T>): Promise<T> {
    const operation = this.runWithConnection(work);
    this.inFlight.add(operation);

    const untrack = (): void => {
      this.inFlight.delete(operation);
    };
    void operation.then(untrack, untrack);

    return operation;
  }

  /**
   * Round trip used by the health check
   */
  public async ping(): Promise<void> {
    await this.withConnection((connection) => connection.query('SELECT 1'));
  }

  public stats(): PoolStats {
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }

  /**
   * Refuses new work, waits for in-flight operations, then closes every connection.
   * Safe to call more than once.
   */
  public close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.drainAndEnd();
    }
    return this.closing;
  }

  private async runWithConnection<T>(work: (connection: PooledConnection) => Promise<T>): Promise<T> {
    const connection = await this.acquire();
    try {
      return await work(connection);
    } catch (error) {
      throw toStorageError(error);
    } finally {
      connection.release();
    }
  }

  private async drainAndEnd(): Promise<void> {
    const alreadyEnded = this.state === 'closed';
    this.state = 'closing';

    await Promise.allSettled(Array.from(this.inFlight));

    if (!alreadyEnded) {
      await this.pool.end();
    }
    this.state = 'closed';
    logger.info({ msg: 'Database pool closed' });
  }
}
