/**
 * Mimetype helpers
 *
 * @packageDocumentation
 */

import { MxhrArgumentError } from '../types/errors.js';

/**
 * Validates a mimetype for use on a part's Content-Type line
 *
 * The value is written verbatim into the stream, so it must be a single
 * line of printable ASCII.
 *
 * @throws MxhrArgumentError if the mimetype is missing or malformed
 */
export function assertMimetype(mimetype: unknown): asserts mimetype is string {
  if (typeof mimetype !== 'string' || mimetype.trim().length === 0) {
    throw new MxhrArgumentError('mimetype argument is required in push()', 'mimetype');
  }
  if (!/^[\x20-\x7E]+$/.test(mimetype)) {
    throw new MxhrArgumentError(
      `mimetype must be a single line of printable ASCII: ${JSON.stringify(mimetype)}`,
      'mimetype'
    );
  }
}

/**
 * Returns the dispatch key of a mimetype: parameters dropped, lowercased
 *
 * @example
 * mimetypeEssence('Text/HTML; charset=utf-8') // 'text/html'
 */
export function mimetypeEssence(mimetype: string): string {
  const semi = mimetype.indexOf(';');
  const essence = semi === -1 ? mimetype : mimetype.substring(0, semi);
  return essence.trim().toLowerCase();
}

/**
 * Returns the primary type of a mimetype (the part before '/')
 *
 * @example
 * primaryType('image/gif') // 'image'
 */
export function primaryType(mimetype: string): string {
  const essence = mimetypeEssence(mimetype);
  const slash = essence.indexOf('/');
  return slash === -1 ? essence : essence.substring(0, slash);
}
