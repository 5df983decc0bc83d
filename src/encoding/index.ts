/**
 * Content encoding utilities for MXHR parts
 *
 * Implements named text encodings, base64 and JSON serialization using only
 * Node.js built-in modules (zero dependencies).
 *
 * @packageDocumentation
 */

export { base64Encode, base64Decode } from './base64.js';
export {
  resolveCharset,
  isSupportedCharset,
  isUtf8,
  encodeText,
  decodeText,
  binaryStringToBytes
} from './charset.js';
export type { Charset } from './charset.js';
export { isStructuredData, escapeNonAscii, serializeJson } from './json.js';
