/**
 * Multipart boundary generation
 */

import { createHash, randomBytes } from 'crypto';

/**
 * RFC 2046 boundary syntax: 1-70 bchars, the last one not a space
 */
const BOUNDARY_PATTERN = /^[0-9A-Za-z'()+_,\-./:=? ]{0,69}[0-9A-Za-z'()+_,\-./:=?]$/;

/**
 * Generates a boundary token: '_' + unix seconds + '-' + an unpadded
 * base64 MD5 digest of 16 random bytes
 *
 * @example
 * generateBoundary() // '_1760889600-q7mJ0lJt8rW8l0sJb3o3zA'
 */
export function generateBoundary(): string {
  const seconds = Math.floor(Date.now() / 1000);
  const digest = createHash('md5')
    .update(randomBytes(16))
    .digest('base64')
    .replace(/=+$/, '');
  return `_${seconds}-${digest}`;
}

/**
 * Whether a token is a usable multipart boundary
 *
 * Tokens starting with '--' are rejected so that a boundary line can never
 * be mistaken for the closing delimiter of another boundary.
 */
export function isValidBoundary(token: string): boolean {
  return BOUNDARY_PATTERN.test(token) && !token.startsWith('--');
}
