import { ConfigurationError } from './errors.js';

/**
 * A PostgreSQL identifier restricted to letters, digits and underscores.
 * Only values that passed `isIdentifier` carry this type.
 */
export type Identifier = string & { readonly __brand: 'Identifier' };

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const MAX_IDENTIFIER_LENGTH = 63;

/**
 * Validate identifier format
 * Returns null if valid, error message if invalid
 */
export function validateIdentifier(value: string): string | null {
  if (value.length === 0) {
    return 'cannot be empty';
  }

  if (!/^[A-Za-z_]/.test(value)) {
    return 'must start with a letter or underscore';
  }

  if (!IDENTIFIER_PATTERN.test(value)) {
    return 'can only contain letters, numbers, and underscores';
  }

  if (value.length > MAX_IDENTIFIER_LENGTH) {
    return `must be ${MAX_IDENTIFIER_LENGTH} characters or less`;
  }

  return null;
}

export function isIdentifier(value: string): value is Identifier {
  return validateIdentifier(value) === null;
}

/**
 * Name of the migrations table, optionally qualified by a schema.
 * Rendered double-quoted, so the stored case is preserved.
 */
export class TableName {
  private constructor(
    readonly table: Identifier,
    readonly schema: Identifier | undefined
  ) {}

  /**
   * @throws ConfigurationError when either part is not a valid identifier
   */
  static parse(table: string, schema?: string): TableName {
    if (!isIdentifier(table)) {
      throw new ConfigurationError(
        `migrationsTable "${table}" ${validateIdentifier(table) ?? 'is invalid'}`
      );
    }

    if (schema === undefined) {
      return new TableName(table, undefined);
    }

    if (!isIdentifier(schema)) {
      throw new ConfigurationError(
        `migrationsSchema "${schema}" ${validateIdentifier(schema) ?? 'is invalid'}`
      );
    }

    return new TableName(table, schema);
  }

  toSql(): string {
    return this.schema === undefined
      ? `"${this.table}"`
      : `"${this.schema}"."${this.table}"`;
  }

  toString(): string {
    return this.schema === undefined ? this.table : `${this.schema}.${this.table}`;
  }
}
