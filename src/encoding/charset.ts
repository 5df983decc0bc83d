/**
 * Named character encodings for text parts
 *
 * Maps encoding names and their common aliases onto the encodings Node.js
 * Buffer supports, and encodes/decodes strictly: characters that the target
 * encoding cannot represent raise MxhrEncodingError instead of being
 * replaced.
 */

import { TextDecoder } from 'util';
import { MxhrArgumentError, MxhrEncodingError, toError } from '../types/errors.js';

/**
 * A resolved character encoding
 */
export interface Charset {
  /** Canonical name, e.g. 'utf-8' */
  readonly name: string;
  /** Node.js Buffer encoding used for the conversion */
  readonly bufferEncoding: BufferEncoding;
  /** Highest UTF-16 code unit representable, or undefined for Unicode encodings */
  readonly maxCodeUnit?: number;
}

const UTF8: Charset = { name: 'utf-8', bufferEncoding: 'utf8' };
const LATIN1: Charset = { name: 'iso-8859-1', bufferEncoding: 'latin1', maxCodeUnit: 0xFF };
const ASCII: Charset = { name: 'us-ascii', bufferEncoding: 'ascii', maxCodeUnit: 0x7F };
const UTF16LE: Charset = { name: 'utf-16le', bufferEncoding: 'utf16le' };

const CHARSETS: ReadonlyMap<string, Charset> = new Map([
  ['utf-8', UTF8],
  ['utf8', UTF8],
  ['iso-8859-1', LATIN1],
  ['iso8859-1', LATIN1],
  ['latin1', LATIN1],
  ['l1', LATIN1],
  ['us-ascii', ASCII],
  ['ascii', ASCII],
  ['utf-16le', UTF16LE],
  ['utf16le', UTF16LE],
  ['ucs-2', UTF16LE],
  ['ucs2', UTF16LE],
]);

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Resolves an encoding name (case-insensitive) to a Charset
 *
 * @param name - Encoding name or alias
 * @param argument - Argument name reported if the encoding is unsupported
 * @throws MxhrArgumentError if the encoding is not supported
 */
export function resolveCharset(name: string, argument = 'encoding'): Charset {
  const charset = CHARSETS.get(name.trim().toLowerCase());
  if (!charset) {
    throw new MxhrArgumentError(`Unsupported encoding '${name}'`, argument);
  }
  return charset;
}

/**
 * Whether an encoding name is supported
 */
export function isSupportedCharset(name: string): boolean {
  return CHARSETS.has(name.trim().toLowerCase());
}

/**
 * Whether a charset is UTF-8
 */
export function isUtf8(charset: Charset): boolean {
  return charset === UTF8;
}

/**
 * Encodes text into bytes
 *
 * @throws MxhrEncodingError if a character cannot be represented
 */
export function encodeText(text: string, charset: Charset): Buffer {
  const { maxCodeUnit } = charset;

  if (maxCodeUnit !== undefined) {
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code > maxCodeUnit) {
        throw new MxhrEncodingError(
          `"\\u${code.toString(16).padStart(4, '0')}" does not map to ${charset.name} at position ${i}`,
          charset.name,
          i
        );
      }
    }
  } else if (charset === UTF8) {
    const match = LONE_SURROGATE.exec(text);
    if (match) {
      throw new MxhrEncodingError(
        `Unpaired surrogate cannot be encoded as ${charset.name} at position ${match.index}`,
        charset.name,
        match.index
      );
    }
  }

  return Buffer.from(text, charset.bufferEncoding);
}

/**
 * Decodes bytes into text
 *
 * @throws MxhrEncodingError if the bytes are not valid in the encoding
 */
export function decodeText(bytes: Uint8Array, charset: Charset): string {
  const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes);

  if (charset === UTF8) {
    try {
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
    } catch (err) {
      throw new MxhrEncodingError(
        `Malformed ${charset.name} input`,
        charset.name,
        undefined,
        toError(err)
      );
    }
  }

  if (charset === ASCII) {
    const index = buffer.findIndex((byte) => byte > 0x7F);
    if (index !== -1) {
      throw new MxhrEncodingError(
        `Byte 0x${buffer[index].toString(16).toUpperCase()} is not valid ${charset.name} at position ${index}`,
        charset.name,
        index
      );
    }
  }

  if (charset === UTF16LE && buffer.length % 2 !== 0) {
    throw new MxhrEncodingError(
      `Truncated ${charset.name} input: odd byte count ${buffer.length}`,
      charset.name,
      buffer.length - 1
    );
  }

  return buffer.toString(charset.bufferEncoding);
}

/**
 * Converts a binary string (one byte per code unit) into bytes
 *
 * @throws MxhrEncodingError on code units above 0xFF
 */
export function binaryStringToBytes(text: string): Buffer {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0xFF) {
      throw new MxhrEncodingError(`Wide character at position ${i}`, 'binary', i);
    }
  }
  return Buffer.from(text, 'latin1');
}
