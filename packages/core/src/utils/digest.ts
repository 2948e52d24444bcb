/**
 * Digest engine: SHA-256 over evidence content
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

/**
 * Hash algorithm to use
 */
export const HASH_ALGORITHM = 'sha256';

/**
 * Extension of persisted digest files
 */
export const DIGEST_FILE_EXTENSION = '.sha256';

/**
 * SHA-256 of the empty byte sequence
 */
export const EMPTY_DIGEST = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

const DIGEST_PATTERN = /^[a-f0-9]{64}$/;

/**
 * Generate a SHA-256 hash of content
 * @param content - The content to hash (string or bytes)
 * @returns The lower-case hexadecimal hash string
 */
export function digest(content: string | Uint8Array): string {
  const hash = createHash(HASH_ALGORITHM);
  hash.update(content);
  return hash.digest('hex');
}

/**
 * Stream a file through SHA-256 without holding it in memory
 * @param filePath - File to hash
 * @returns The lower-case hexadecimal hash string
 */
export function digestFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(HASH_ALGORITHM);
    const stream = createReadStream(filePath);

    stream.on('data', chunk => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Verify that content matches an expected hash
 */
export function verifyDigest(content: string | Uint8Array, expected: string): boolean {
  return digest(content) === expected.toLowerCase();
}

/**
 * Whether a string is a well-formed SHA-256 hex digest
 */
export function isDigest(value: string): boolean {
  return DIGEST_PATTERN.test(value);
}

/**
 * Format the single line stored in a digest file
 * @param hex - Digest of the stored copy
 * @param storedPath - Absolute path of the stored copy
 */
export function formatDigestLine(hex: string, storedPath: string): string {
  return `${hex}  ${storedPath}\n`;
}

/**
 * Parse a digest file line back into its parts
 * @returns The digest and path, or undefined when the line is malformed
 */
export function parseDigestLine(line: string): { sha256: string; path: string } | undefined {
  const trimmed = line.replace(/\r?\n$/, '');
  const separator = trimmed.indexOf('  ');
  if (separator < 0) return undefined;

  const sha256 = trimmed.slice(0, separator);
  const path = trimmed.slice(separator + 2);

  if (!isDigest(sha256) || path.length === 0) {
    return undefined;
  }

  return { sha256, path };
}
