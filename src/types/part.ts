/**
 * Part and push option types for mxhr-buffer
 */

/**
 * A JSON-serializable structured value (object or array at the top level)
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Structured data accepted by JSON parts
 */
export type StructuredData = JsonValue[] | { [key: string]: JsonValue };

/**
 * Inline data accepted by push()
 */
export type PartData = string | Uint8Array | StructuredData;

/**
 * Materialized part payload: decoded text or raw bytes
 */
export type PartPayload = string | Buffer;

/**
 * One queued content unit
 */
export interface Part {
  /** Mimetype exactly as pushed, written to the part's Content-Type line */
  readonly mimetype: string;
  /** Payload after the input transform */
  readonly payload: PartPayload;
}

/**
 * Options for MxhrBuffer.push()
 *
 * Exactly one of `data`, `filename` or `fd` must be given.
 */
export interface PushOptions {
  /** Mimetype of the part (required) */
  mimetype: string;
  /** Inline data, used as-is (structured values only for JSON mimetypes) */
  data?: PartData;
  /** File to open, read to the end and close */
  filename?: string;
  /** Open file descriptor, read from its current position; never closed */
  fd?: number;
  /**
   * Encoding of a named or descriptor source. Defaults to the buffer's
   * encoding for JSON, script and text parts; binary parts are not decoded
   * unless this is set.
   */
  encoding?: string;
}
