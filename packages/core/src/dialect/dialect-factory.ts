/**
 * Dialect Factory
 *
 * Creates the SQL dialect for a database type.
 */

import { MySQLDialect } from './mysql-dialect';
import { PostgreSQLDialect } from './postgresql-dialect';
import { SQLiteDialect } from './sqlite-dialect';
import { ValidationError } from '../errors';

import type { DialectOptions, SQLDialect } from './sql-dialect';

export type DialectDatabaseType = 'mysql' | 'mariadb' | 'postgresql' | 'postgres' | 'sqlite';

type NormalizedType = 'mysql' | 'postgresql' | 'sqlite';

const dialectCache = new Map<NormalizedType, SQLDialect>();

export class DialectFactory {
  /**
   * Get dialect with default options for database type (cached)
   */
  static getDialect(type: DialectDatabaseType): SQLDialect {
    const normalizedType = this.normalizeType(type);

    const cached = dialectCache.get(normalizedType);
    if (cached) {
      return cached;
    }

    const dialect = this.createDialect(normalizedType);
    dialectCache.set(normalizedType, dialect);
    return dialect;
  }

  /**
   * Create new dialect instance (not cached)
   */
  static createDialect(type: DialectDatabaseType, options: DialectOptions = {}): SQLDialect {
    switch (this.normalizeType(type)) {
      case 'mysql': {
        return new MySQLDialect(options);
      }
      case 'postgresql': {
        return new PostgreSQLDialect(options);
      }
      case 'sqlite': {
        return new SQLiteDialect(options);
      }
    }
  }

  /**
   * Normalize database type aliases
   */
  private static normalizeType(type: string): NormalizedType {
    switch (type) {
      case 'mysql':
      case 'mariadb': {
        return 'mysql';
      }
      case 'postgresql':
      case 'postgres': {
        return 'postgresql';
      }
      case 'sqlite': {
        return 'sqlite';
      }
      default: {
        throw new ValidationError(`Unsupported database type: ${type}`, 'type');
      }
    }
  }

  /**
   * Check if database type is supported
   */
  static isSupported(type: string): type is DialectDatabaseType {
    return ['mysql', 'mariadb', 'postgresql', 'postgres', 'sqlite'].includes(type);
  }

  /**
   * Clear dialect cache (useful for testing)
   */
  static clearCache(): void {
    dialectCache.clear();
  }
}
