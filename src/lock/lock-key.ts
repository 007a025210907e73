/**
 * Salt multiplied into the checksum. Every process migrating the same
 * database must use the same value, or they will not exclude each other.
 */
export const ADVISORY_LOCK_ID_SALT = 1486364155;

const CRC32_TABLE = buildCrc32Table();

function buildCrc32Table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
}

/**
 * CRC-32 (IEEE 802.3 polynomial) of a byte sequence
 */
export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = (CRC32_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Derive the advisory lock key for a database
 *
 * The key is the CRC-32 of the UTF-8 database name multiplied by
 * {@link ADVISORY_LOCK_ID_SALT} in wrapping unsigned 32-bit arithmetic,
 * rendered in base 10.
 *
 * @example
 * ```typescript
 * getLockingKey('testdb'); // '2584668960'
 * ```
 */
export function getLockingKey(databaseName: string): string {
  const sum = crc32(new TextEncoder().encode(databaseName));
  return (Math.imul(sum, ADVISORY_LOCK_ID_SALT) >>> 0).toString(10);
}
