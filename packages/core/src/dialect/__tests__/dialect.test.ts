import { describe, it, expect, beforeEach } from 'vitest';

import { EncodeError, ParameterLimitError, ValidationError } from '../../errors';
import { DialectFactory } from '../dialect-factory';
import { MySQLDialect, formatMySQLDateTime } from '../mysql-dialect';
import { PostgreSQLDialect } from '../postgresql-dialect';
import { SQLiteDialect } from '../sqlite-dialect';

import type { DialectDatabaseType } from '../dialect-factory';

describe('PostgreSQLDialect', () => {
  let dialect: PostgreSQLDialect;

  beforeEach(() => {
    dialect = new PostgreSQLDialect();
  });

  describe('config', () => {
    it('should have correct name', () => {
      expect(dialect.name).toBe('postgresql');
    });

    it('should use numbered placeholders', () => {
      expect(dialect.config.placeholderStyle).toBe('numbered');
    });

    it('should allow 65535 parameters by default', () => {
      expect(dialect.config.maxParameters).toBe(65_535);
    });
  });

  describe('formatPlaceholder', () => {
    it('should return $N for the given index', () => {
      expect(dialect.formatPlaceholder(1)).toBe('$1');
      expect(dialect.formatPlaceholder(12)).toBe('$12');
    });
  });

  describe('escapeIdentifier', () => {
    it('should wrap identifier with double quotes', () => {
      expect(dialect.escapeIdentifier('users')).toBe('"users"');
    });

    it('should handle schema.table format', () => {
      expect(dialect.escapeIdentifier('public.users')).toBe('"public"."users"');
    });

    it('should double embedded quotes', () => {
      expect(dialect.escapeIdentifier('we"ird')).toBe('"we""ird"');
    });
  });

  describe('encode', () => {
    it('should encode null and undefined as null', () => {
      expect(dialect.encode(null)).toBeNull();
      expect(dialect.encode(undefined)).toBeNull();
    });

    it('should pass strings through', () => {
      expect(dialect.encode("it's")).toBe("it's");
    });

    it('should reject strings containing NUL', () => {
      expect(() => dialect.encode('a\u0000b')).toThrow(EncodeError);
    });

    it('should encode non-finite numbers as float8 text', () => {
      expect(dialect.encode(3.5)).toBe(3.5);
      expect(dialect.encode(Number.NaN)).toBe('NaN');
      expect(dialect.encode(Number.POSITIVE_INFINITY)).toBe('Infinity');
      expect(dialect.encode(Number.NEGATIVE_INFINITY)).toBe('-Infinity');
    });

    it('should encode bigint as text within int8 range', () => {
      expect(dialect.encode(10n)).toBe('10');
      expect(dialect.encode(-(2n ** 63n))).toBe('-9223372036854775808');
      expect(() => dialect.encode(2n ** 63n)).toThrow(EncodeError);
    });

    it('should keep booleans', () => {
      expect(dialect.encode(true)).toBe(true);
    });

    it('should encode Date as ISO text', () => {
      expect(dialect.encode(new Date('2024-01-15T10:30:00.000Z'))).toBe('2024-01-15T10:30:00.000Z');
    });

    it('should reject invalid dates', () => {
      expect(() => dialect.encode(new Date('not a date'))).toThrow('Invalid Date cannot be bound');
    });

    it('should keep Buffers and convert Uint8Array', () => {
      const buffer = Buffer.from([0xde, 0xad]);
      expect(dialect.encode(buffer)).toBe(buffer);

      const encoded = dialect.encode(new Uint8Array([1, 2]));
      expect(Buffer.isBuffer(encoded)).toBe(true);
      expect(encoded).toEqual(Buffer.from([1, 2]));
    });

    it('should encode arrays element by element', () => {
      expect(dialect.encode([1, 'a', [true, null], 5n])).toEqual([1, 'a', [true, null], '5']);
    });

    it('should encode objects as JSON', () => {
      expect(dialect.encode({ key: 'value', list: [1, 2] })).toBe('{"key":"value","list":[1,2]}');
    });

    it('should reject objects that cannot be serialized', () => {
      const circular: Record<string, unknown> = {};
      circular['self'] = circular;

      try {
        dialect.encode(circular);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EncodeError);
        if (error instanceof EncodeError) {
          expect(error.dialect).toBe('postgresql');
          expect(error.valueType).toBe('object');
          expect(error.cause).toBeInstanceOf(TypeError);
        }
      }
    });
  });
});

describe('MySQLDialect', () => {
  let dialect: MySQLDialect;

  beforeEach(() => {
    dialect = new MySQLDialect();
  });

  it('should have correct name and limit', () => {
    expect(dialect.name).toBe('mysql');
    expect(dialect.config.maxParameters).toBe(65_535);
  });

  describe('formatPlaceholder', () => {
    it('should return ? for all parameters', () => {
      expect(dialect.formatPlaceholder(1)).toBe('?');
      expect(dialect.formatPlaceholder(2)).toBe('?');
      expect(dialect.formatPlaceholder(3)).toBe('?');
    });
  });

  describe('escapeIdentifier', () => {
    it('should wrap identifier with backticks', () => {
      expect(dialect.escapeIdentifier('users')).toBe('`users`');
    });

    it('should handle schema.table format', () => {
      expect(dialect.escapeIdentifier('mydb.users')).toBe('`mydb`.`users`');
    });
  });

  describe('encode', () => {
    it('should encode booleans as 1 and 0', () => {
      expect(dialect.encode(true)).toBe(1);
      expect(dialect.encode(false)).toBe(0);
    });

    it('should encode Date as local DATETIME text', () => {
      expect(dialect.encode(new Date(2024, 0, 15, 10, 30, 5))).toBe('2024-01-15 10:30:05');
    });

    it('should encode bigint up to BIGINT UNSIGNED', () => {
      expect(dialect.encode(2n ** 64n - 1n)).toBe('18446744073709551615');
      expect(dialect.encode(-(2n ** 63n))).toBe('-9223372036854775808');
      expect(() => dialect.encode(2n ** 64n)).toThrow(EncodeError);
    });

    it('should reject non-finite numbers', () => {
      expect(() => dialect.encode(Number.NaN)).toThrow('mysql cannot bind non-finite number NaN');
    });

    it('should reject arrays', () => {
      expect(() => dialect.encode([1, 2])).toThrow(
        'mysql has no array type, bind each element separately',
      );
    });

    it('should encode nested arrays inside objects as JSON', () => {
      expect(dialect.encode({ a: [1] })).toBe('{"a":[1]}');
    });
  });

  describe('formatMySQLDateTime', () => {
    it('should pad every component', () => {
      expect(formatMySQLDateTime(new Date(2023, 8, 3, 4, 5, 6))).toBe('2023-09-03 04:05:06');
    });
  });
});

describe('SQLiteDialect', () => {
  let dialect: SQLiteDialect;

  beforeEach(() => {
    dialect = new SQLiteDialect();
  });

  it('should use positional placeholders and a 32766 limit', () => {
    expect(dialect.name).toBe('sqlite');
    expect(dialect.formatPlaceholder(7)).toBe('?');
    expect(dialect.config.maxParameters).toBe(32_766);
  });

  it('should encode booleans as integers', () => {
    expect(dialect.encode(true)).toBe(1);
  });

  it('should keep bigint within int64', () => {
    expect(dialect.encode(5n)).toBe(5n);
    expect(() => dialect.encode(2n ** 63n)).toThrow(EncodeError);
  });

  it('should encode Date as ISO text', () => {
    expect(dialect.encode(new Date('2024-02-29T00:00:00.000Z'))).toBe('2024-02-29T00:00:00.000Z');
  });

  it('should reject Infinity', () => {
    expect(() => dialect.encode(Number.POSITIVE_INFINITY)).toThrow(EncodeError);
  });
});

describe('dialect options', () => {
  it('should accept a custom parameter limit', () => {
    expect(new SQLiteDialect({ maxParameters: 999 }).config.maxParameters).toBe(999);
  });

  it('should reject invalid limits', () => {
    expect(() => new SQLiteDialect({ maxParameters: 0 })).toThrow(ValidationError);
    expect(() => new PostgreSQLDialect({ maxParameters: 1.5 })).toThrow(
      'maxParameters must be a positive integer',
    );
  });

  it('should enforce the limit in assertParameterCount', () => {
    const dialect = new MySQLDialect({ maxParameters: 2 });
    expect(() => dialect.assertParameterCount(2)).not.toThrow();
    expect(() => dialect.assertParameterCount(3)).toThrow(ParameterLimitError);
  });

  it('should create pre-filled argument buffers', () => {
    const args = new PostgreSQLDialect().createArguments([1, 'two', null]);
    expect(args.length).toBe(3);
    expect(args.toArray()).toEqual([1, 'two', null]);
  });
});

describe('DialectFactory', () => {
  beforeEach(() => {
    DialectFactory.clearCache();
  });

  it('should create dialects for every alias', () => {
    expect(DialectFactory.getDialect('mysql')).toBeInstanceOf(MySQLDialect);
    expect(DialectFactory.getDialect('mariadb')).toBeInstanceOf(MySQLDialect);
    expect(DialectFactory.getDialect('postgresql')).toBeInstanceOf(PostgreSQLDialect);
    expect(DialectFactory.getDialect('postgres')).toBeInstanceOf(PostgreSQLDialect);
    expect(DialectFactory.getDialect('sqlite')).toBeInstanceOf(SQLiteDialect);
  });

  it('should cache dialects per normalized type', () => {
    expect(DialectFactory.getDialect('postgres')).toBe(DialectFactory.getDialect('postgresql'));
  });

  it('should not cache created dialects', () => {
    const created = DialectFactory.createDialect('sqlite', { maxParameters: 999 });
    expect(created).not.toBe(DialectFactory.getDialect('sqlite'));
    expect(created.config.maxParameters).toBe(999);
  });

  it('should reject unsupported types', () => {
    expect(() => DialectFactory.getDialect('oracle' as DialectDatabaseType)).toThrow(
      'Unsupported database type: oracle',
    );
  });

  it('should report supported types', () => {
    expect(DialectFactory.isSupported('sqlite')).toBe(true);
    expect(DialectFactory.isSupported('oracle')).toBe(false);
  });
});
