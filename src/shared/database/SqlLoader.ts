import fs from 'fs';
import path from 'path';
import { InfrastructureError } from '../../domain/errors/InfrastructureError';

/** Resolves to <project>/sql from both src/shared/database and dist/shared/database */
export const DEFAULT_SQL_DIRECTORY = path.resolve(__dirname, '../../../sql');

const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * SqlLoader - reads SQL statements from `<baseDir>/<entity>/<operation>.sql`
 *
 * Statements are read once and cached by `entity.operation`. Names are restricted
 * to lowercase identifiers, so a lookup cannot leave the SQL directory.
 *
 * @example
 * ```typescript
 * const updateSql = sqlLoader.load('products', 'update');
 * ```
 */
export class SqlLoader {
  private readonly cache = new Map<string, string>();

  public constructor(private readonly baseDir: string = DEFAULT_SQL_DIRECTORY) {}

  public load(entity: string, operation: string): string {
    const key = SqlLoader.cacheKey(entity, operation);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const filePath = path.join(this.baseDir, entity, `${operation}.sql`);
    if (!fs.existsSync(filePath)) {
      throw new InfrastructureError(
        `SQL file not found: ${filePath} (entity "${entity}", operation "${operation}")`
      );
    }

    let statement: string;
    try {
      statement = fs.readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      throw new InfrastructureError(`Error reading SQL file ${filePath}`, { cause: error });
    }

    this.cache.set(key, statement);
    return statement;
  }

  /**
   * Drops the cached copy and reads the file again
   */
  public reload(entity: string, operation: string): string {
    this.cache.delete(SqlLoader.cacheKey(entity, operation));
    return this.load(entity, operation);
  }

  public clearCache(): void {
    this.cache.clear();
  }

  public cachedKeys(): string[] {
    return Array.from(this.cache.keys()).sort();
  }

  public listOperations(entity: string): string[] {
    SqlLoader.assertName(entity);
    const entityDir = path.join(this.baseDir, entity);
    if (!fs.existsSync(entityDir)) {
      return [];
    }

    return fs
      .readdirSync(entityDir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith('.sql'))
      .map((entry) => path.basename(entry.name, '.sql'))
      .sort();
  }

  public listEntities(): string[] {
    if (!fs.existsSync(this.baseDir)) {
      return [];
    }

    return fs
      .readdirSync(this.baseDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  private static cacheKey(entity: string, operation: string): string {
    SqlLoader.assertName(entity);
    SqlLoader.assertName(operation);
    return `${entity}.${operation}`;
  }

  private static assertName(name: string): void {
    if (!NAME_PATTERN.test(name)) {
      throw new InfrastructureError(`Invalid SQL file name segment: "${name}"`);
    }
  }
}

export const sqlLoader = new SqlLoader();
