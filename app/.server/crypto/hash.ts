// SHA-256 digests for transcript files
import fs from 'fs/promises';
import { createHash } from 'crypto';
import { IOError } from '~/.server/errors';

const SHA256_HEX = /^[0-9a-f]{64}$/i;

/**
 * Lowercase hex SHA-256 of bytes (strings are hashed as UTF-8)
 */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Hash the file at `filePath`
 */
export async function hashFile(filePath: string): Promise<string> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    throw new IOError(`Cannot read file for hashing: ${filePath}`, { cause: error });
  }
  return sha256Hex(data);
}

/**
 * Compare two hex digests ignoring case
 */
export function verifyHash(computedHash: string, expectedHash: string): boolean {
  return computedHash.toLowerCase() === expectedHash.toLowerCase();
}

export function isSha256Hex(value: string): boolean {
  return SHA256_HEX.test(value);
}

/**
 * Decode a hex string to bytes; null for odd length or non-hex characters
 */
export function hexToBytes(hex: string): Buffer | null {
  if (hex.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(hex)) {
    return null;
  }
  return Buffer.from(hex, 'hex');
}
