/**
 * Type exports for mxhr-buffer
 */

// Configuration types
export type { MxhrBufferOptions, ResolvedBufferOptions } from './config.js';

// Part types
export type {
  JsonValue,
  StructuredData,
  PartData,
  PartPayload,
  Part,
  PushOptions
} from './part.js';

// Error types
export {
  MxhrError,
  MxhrArgumentError,
  MxhrResourceError,
  MxhrEncodingError,
  toError
} from './errors.js';

export type { ErrorKind } from './errors.js';
