/**
 * JSON serialization for JSON parts
 */

import type { StructuredData } from '../types/part.js';
import { MxhrEncodingError, toError } from '../types/errors.js';
import { isUtf8 } from './charset.js';
import type { Charset } from './charset.js';

/**
 * Whether an inline value is structured data (a plain object or an array)
 * rather than text or bytes
 */
export function isStructuredData(value: unknown): value is StructuredData {
  if (Array.isArray(value)) return true;
  return typeof value === 'object' && value !== null && !(value instanceof Uint8Array);
}

/**
 * Escapes every non-ASCII UTF-16 code unit as \uXXXX
 */
export function escapeNonAscii(json: string): string {
  return json.replace(/[\u0080-\uFFFF]/g, (ch) =>
    '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0')
  );
}

/**
 * Serializes structured data to JSON text for the given output encoding
 *
 * UTF-8 output keeps non-ASCII characters literal; any other encoding gets
 * ASCII-only JSON so the text survives the output transform.
 *
 * @throws MxhrEncodingError if the value cannot be serialized (cycles, BigInt)
 */
export function serializeJson(value: StructuredData, charset: Charset): string {
  let json: string;
  try {
    json = JSON.stringify(value);
  } catch (err) {
    throw new MxhrEncodingError(
      `Cannot serialize value to JSON: ${toError(err).message}`,
      charset.name,
      undefined,
      toError(err)
    );
  }

  return isUtf8(charset) ? json : escapeNonAscii(json);
}
