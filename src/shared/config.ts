import { z } from 'zod';
import { ValidationError } from '../domain/errors/ValidationError';

/**
 * Application Configuration
 *
 * Reads the process environment once at startup and validates it with Zod.
 * Invalid configuration is a fatal startup error: nothing falls back silently.
 *
 * **Environment Variables:**
 * - HOST / PORT: HTTP listen address (default 0.0.0.0:3000)
 * - DATABASE_HOST, DATABASE_PORT, DATABASE_NAME, DATABASE_USER, DATABASE_PASSWORD
 * - DATABASE_POOL_MIN / DATABASE_POOL_MAX: pool bounds (min must not exceed max)
 * - DATABASE_ACQUIRE_TIMEOUT_MS: how long a request waits for a free connection
 * - DATABASE_IDLE_TIMEOUT_MS: how long an idle connection is kept
 * - DATABASE_STATEMENT_TIMEOUT_MS: optional per-statement timeout
 * - DATABASE_APPLY_SCHEMA: 'true' runs sql/products/schema.sql at startup
 * - PRODUCT_STORE: 'postgres' (default) or 'memory'
 */

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const positiveInt = z.coerce.number().int().positive();

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const EnvironmentSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: positiveInt.max(65535).default(3000),
    PRODUCT_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_HOST: z.string().min(1).default('localhost'),
    DATABASE_PORT: positiveInt.max(65535).default(5432),
    DATABASE_NAME: z.string().min(1).default('concurrency_db'),
    DATABASE_USER: z.string().min(1).default('postgres'),
    DATABASE_PASSWORD: z.string().default('postgres'),
    DATABASE_POOL_MIN: z.coerce.number().int().nonnegative().default(1),
    DATABASE_POOL_MAX: positiveInt.default(10),
    DATABASE_ACQUIRE_TIMEOUT_MS: positiveInt.default(5000),
    DATABASE_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
    DATABASE_STATEMENT_TIMEOUT_MS: positiveInt.optional(),
    DATABASE_APPLY_SCHEMA: booleanFlag,
  })
  .refine((env) => env.DATABASE_POOL_MIN <= env.DATABASE_POOL_MAX, {
    message: 'DATABASE_POOL_MIN cannot exceed DATABASE_POOL_MAX',
    path: ['DATABASE_POOL_MIN'],
  });

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  minConnections: number;
  maxConnections: number;
  acquireTimeoutMs: number;
  idleTimeoutMs: number;
  statementTimeoutMs?: number;
  applySchema: boolean;
}

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  host: string;
  port: number;
  productStore: 'postgres' | 'memory';
  database: DatabaseConfig;
}

/**
 * Builds the application configuration from environment variables
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvironmentSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration: ${details.map((d) => `${d.path}: ${d.message}`).join(', ')}`,
      details
    );
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,
    productStore: parsed.PRODUCT_STORE,
    database: {
      host: parsed.DATABASE_HOST,
      port: parsed.DATABASE_PORT,
      database: parsed.DATABASE_NAME,
      user: parsed.DATABASE_USER,
      password: parsed.DATABASE_PASSWORD,
      minConnections: parsed.DATABASE_POOL_MIN,
      maxConnections: parsed.DATABASE_POOL_MAX,
      acquireTimeoutMs: parsed.DATABASE_ACQUIRE_TIMEOUT_MS,
      idleTimeoutMs: parsed.DATABASE_IDLE_TIMEOUT_MS,
      statementTimeoutMs: parsed.DATABASE_STATEMENT_TIMEOUT_MS,
      applySchema: parsed.DATABASE_APPLY_SCHEMA,
    },
  };
}
