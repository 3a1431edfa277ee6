import * as crypto from 'crypto';

/**
 * Computes a SHA256 hash for the given content.
 * @param content - The string or bytes to hash.
 * @returns The hex-encoded SHA256 hash.
 */
export function createContentHash(content: string | Uint8Array): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * First 8 bytes of the SHA256 digest, for bucketing features.
 */
export function createHashBytes(content: string): Buffer {
  return crypto.createHash('sha256').update(content).digest().subarray(0, 8);
}
