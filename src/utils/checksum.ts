/**
 * SHA-256 checksum for detecting file changes.
 */
import { createHash } from 'node:crypto';

/**
 * First 16 hex characters of the SHA-256 digest of `content`.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}
