/**
 * Hashing helpers
 */

import { createHash } from 'node:crypto';

/**
 * Lowercase hex SHA-1 digest of the UTF-8 encoding of `value`
 */
export function sha1(value: string): string {
  return createHash('sha1').update(value, 'utf8').digest('hex');
}
