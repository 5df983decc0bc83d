/**
 * Base64 encoding/decoding using Node.js Buffer
 *
 * Binary parts (image/*, video/*, audio/*) are written to the multipart
 * stream as a single unwrapped base64 line.
 */

import { binaryStringToBytes } from './charset.js';

/**
 * Encodes bytes or a binary string to standard base64 without line breaks
 *
 * @param data - Raw bytes, or a string holding one byte per code unit
 * @returns Base64 encoded string
 * @throws MxhrEncodingError if a string holds code units above 0xFF
 */
export function base64Encode(data: string | Uint8Array): string {
  const buffer = typeof data === 'string' ? binaryStringToBytes(data) : Buffer.from(data);
  return buffer.toString('base64');
}

/**
 * Decodes a base64 string to a Buffer
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 */
export function base64Decode(encoded: string): Buffer {
  // Remove any whitespace (MIME base64 can have line breaks)
  const cleaned = encoded.replace(/\s/g, '');
  return Buffer.from(cleaned, 'base64');
}
