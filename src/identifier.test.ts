import { describe, it, expect } from 'vitest';
import { TableName, isIdentifier, validateIdentifier } from './identifier.js';
import { ConfigurationError } from './errors.js';

describe('validateIdentifier', () => {
  it('should accept letters, digits and underscores', () => {
    expect(validateIdentifier('schema_migrations')).toBeNull();
    expect(validateIdentifier('_v2')).toBeNull();
    expect(validateIdentifier('Migrations')).toBeNull();
  });

  it('should reject empty values', () => {
    expect(validateIdentifier('')).toBe('cannot be empty');
  });

  it('should reject a leading digit', () => {
    expect(validateIdentifier('2fa')).toBe('must start with a letter or underscore');
  });

  it('should reject quotes, spaces and punctuation', () => {
    expect(validateIdentifier('a"b')).toBe('can only contain letters, numbers, and underscores');
    expect(validateIdentifier('a b')).toBe('can only contain letters, numbers, and underscores');
    expect(validateIdentifier('a.b')).toBe('can only contain letters, numbers, and underscores');
    expect(validateIdentifier('a`b')).toBe('can only contain letters, numbers, and underscores');
  });

  it('should reject names longer than 63 characters', () => {
    expect(validateIdentifier('a'.repeat(63))).toBeNull();
    expect(validateIdentifier('a'.repeat(64))).toBe('must be 63 characters or less');
  });

  it('should back the isIdentifier guard', () => {
    expect(isIdentifier('ok')).toBe(true);
    expect(isIdentifier('not ok')).toBe(false);
  });
});

describe('TableName', () => {
  it('should render a quoted table', () => {
    const table = TableName.parse('schema_migrations');

    expect(table.toSql()).toBe('"schema_migrations"');
    expect(table.toString()).toBe('schema_migrations');
    expect(table.schema).toBeUndefined();
  });

  it('should render a schema-qualified table', () => {
    const table = TableName.parse('versions', 'ops');

    expect(table.toSql()).toBe('"ops"."versions"');
    expect(table.toString()).toBe('ops.versions');
  });

  it('should refuse injection attempts', () => {
    expect(() => TableName.parse('t"; DROP TABLE users; --')).toThrow(ConfigurationError);
    expect(() => TableName.parse('t', 'public"; --')).toThrow(ConfigurationError);
  });
});
