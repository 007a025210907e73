import { MAX_MIGRATION_VERSION } from '../../types.js';
import { CLIErrors } from './errors.js';

/**
 * Validate a version argument
 * Returns null if valid, error message if invalid
 */
export function validateVersion(value: string): string | null {
  if (!value || value.trim().length === 0) {
    return 'Version cannot be empty';
  }

  if (!/^\d+$/.test(value.trim())) {
    return 'Version must be a non-negative integer';
  }

  if (BigInt(value.trim()) > MAX_MIGRATION_VERSION) {
    return `Version must be ${MAX_MIGRATION_VERSION} or less`;
  }

  return null;
}

/**
 * Parse a version argument into a bigint
 *
 * @throws CLIError when the value is not a version
 */
export function parseVersionArgument(value: string): bigint {
  if (validateVersion(value) !== null) {
    throw CLIErrors.invalidVersion(value);
  }
  return BigInt(value.trim());
}
