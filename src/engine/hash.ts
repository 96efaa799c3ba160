/**
 * Identifier hashing.
 *
 * Numeric ability identifiers sent by clients are derived from the
 * configuration strings with a multiplicative hash over UTF-16 code
 * units: h = h * 131 + c, wrapping at 32 bits.
 */

import type { NameHash } from './types';

export function abilityHash(name: string): NameHash {
  let hash = 0;
  for (let i = 0; i < name.length; i++) {
    hash = (Math.imul(hash, 131) + name.charCodeAt(i)) | 0;
  }
  return hash >>> 0;
}

/**
 * Normalize a hash received as a signed 32-bit integer to its unsigned form.
 */
export function toUnsignedHash(hash: number): NameHash {
  return hash >>> 0;
}
