/**
 * Encoding dispatch tables
 *
 * Two registries map a mimetype to the transform applied when a part is
 * pushed (input) and when it is pulled (output). Lookup is ordered: the
 * exact mimetype, then its primary type, then the table default.
 *
 * @packageDocumentation
 */

import { mimetypeEssence, primaryType } from './mimetype.js';

/**
 * Transform applied to a data source on push
 */
export type InputTransform =
  /** Serialize structured data to JSON, then treat as text */
  | { kind: 'json' }
  /** Decode named/descriptor sources with the part or buffer encoding */
  | { kind: 'text' }
  /** Read bytes as-is */
  | { kind: 'raw' };

/**
 * Transform applied to a stored payload on pull
 */
export type OutputTransform =
  /** Encode text with the buffer encoding */
  | { kind: 'text' }
  /** Base64-encode bytes */
  | { kind: 'base64' }
  /** Write the payload unchanged */
  | { kind: 'passthrough' };

/**
 * How a lookup was satisfied
 */
export type DispatchMatch = 'exact' | 'primary' | 'default';

/**
 * Result of a dispatch table lookup
 */
export interface Resolved<T> {
  transform: T;
  match: DispatchMatch;
  /** Table key that matched, undefined for the default */
  key?: string;
}

/**
 * Mimetype to transform registry with a fallback transform
 */
export interface DispatchTable<T> {
  readonly entries: ReadonlyMap<string, T>;
  readonly fallback: T;
}

const JSON_INPUT: InputTransform = { kind: 'json' };
const TEXT_INPUT: InputTransform = { kind: 'text' };
const RAW_INPUT: InputTransform = { kind: 'raw' };

const TEXT_OUTPUT: OutputTransform = { kind: 'text' };
const BASE64_OUTPUT: OutputTransform = { kind: 'base64' };
const PASSTHROUGH_OUTPUT: OutputTransform = { kind: 'passthrough' };

/**
 * JSON mimetypes, including the deprecated text/x-json
 */
export const JSON_MIMETYPES = ['application/json', 'text/x-json'] as const;

/**
 * Script mimetypes, including deprecated text/* and x- variants
 */
export const SCRIPT_MIMETYPES = [
  'application/javascript',
  'application/ecmascript',
  'application/x-javascript',
  'application/x-ecmascript',
  'text/javascript',
  'text/ecmascript',
  'text/x-javascript',
  'text/x-ecmascript'
] as const;

/**
 * Primary types whose payloads are sent as base64
 */
export const BINARY_PRIMARY_TYPES = ['image', 'video', 'audio'] as const;

export const INPUT_TRANSFORMS: DispatchTable<InputTransform> = {
  entries: new Map<string, InputTransform>([
    ...JSON_MIMETYPES.map((type): [string, InputTransform] => [type, JSON_INPUT]),
    ...SCRIPT_MIMETYPES.map((type): [string, InputTransform] => [type, TEXT_INPUT]),
    ['text', TEXT_INPUT]
  ]),
  fallback: RAW_INPUT
};

export const OUTPUT_TRANSFORMS: DispatchTable<OutputTransform> = {
  entries: new Map<string, OutputTransform>([
    ...JSON_MIMETYPES.map((type): [string, OutputTransform] => [type, TEXT_OUTPUT]),
    ...SCRIPT_MIMETYPES.map((type): [string, OutputTransform] => [type, TEXT_OUTPUT]),
    ...BINARY_PRIMARY_TYPES.map((type): [string, OutputTransform] => [type, BASE64_OUTPUT]),
    ['text', TEXT_OUTPUT]
  ]),
  fallback: PASSTHROUGH_OUTPUT
};

/**
 * Looks a mimetype up in a dispatch table: exact match, then primary type,
 * then the table fallback
 */
export function resolveTransform<T>(table: DispatchTable<T>, mimetype: string): Resolved<T> {
  const essence = mimetypeEssence(mimetype);
  const exact = table.entries.get(essence);
  if (exact !== undefined) {
    return { transform: exact, match: 'exact', key: essence };
  }

  const primary = primaryType(mimetype);
  const byPrimary = table.entries.get(primary);
  if (byPrimary !== undefined) {
    return { transform: byPrimary, match: 'primary', key: primary };
  }

  return { transform: table.fallback, match: 'default' };
}

/**
 * Resolves the input transform for a mimetype
 */
export function resolveInputTransform(mimetype: string): Resolved<InputTransform> {
  return resolveTransform(INPUT_TRANSFORMS, mimetype);
}

/**
 * Resolves the output transform for a mimetype
 */
export function resolveOutputTransform(mimetype: string): Resolved<OutputTransform> {
  return resolveTransform(OUTPUT_TRANSFORMS, mimetype);
}
