/**
 * @fileoverview Content-Addressing Hash Utilities
 *
 * FORMAT: sha256(raw bytes), lowercase hex - matches `sha256sum` and mpremote `fs sha256sum`
 * USED BY: version ledger | build output manifest | local scan | device diff
 * HASH ON: exact file bytes. No line-ending or BOM normalization: the device
 *          hashes what it stores, so the local side must hash the same bytes.
 */
import { createHash } from 'crypto';
import { promises as fs } from 'fs';

/** Ledger value for a module whose hash has not been computed */
export const UNKNOWN_HASH = 'unknown';

/** Ledger value for a module whose file could not be read */
export const ERROR_HASH = 'error';

/**
 * Compute SHA-256 digest of raw content
 *
 * Strings are hashed as their UTF-8 bytes.
 *
 * @returns SHA-256 hash as 64-character hex string
 */
export function computeSha256(content: Buffer | Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Compute SHA-256 digest of a file's bytes
 */
export async function hashFile(filePath: string): Promise<string> {
  const data = await fs.readFile(filePath);
  return computeSha256(data);
}

/**
 * Validate that a string looks like a SHA-256 hex digest
 *
 * @returns true if hash is 64 lowercase hex characters
 */
export function isValidSha256(hash: string): boolean {
  return /^[a-f0-9]{64}$/.test(hash);
}

/**
 * Compare two hashes for equality (case-insensitive)
 *
 * Sentinels and empty strings never match a real digest, so an unknown
 * remote hash always reads as "changed".
 */
export function hashesEqual(hash1: string, hash2: string): boolean {
  if (!hash1 || !hash2) {
    return false;
  }
  return hash1.toLowerCase() === hash2.toLowerCase();
}
