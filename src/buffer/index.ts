/**
 * Buffer layer exports
 */

export { MxhrBuffer } from './mxhr-buffer.js';
export type { MxhrBufferEvents, SessionState } from './mxhr-buffer.js';
export { PartQueue, snapshotPart } from './part-queue.js';
export { generateBoundary, isValidBoundary } from './boundary.js';
export { selectSource, readDescriptor, readNamedFile, readSourceBytes } from './source.js';
export type { DataSource } from './source.js';
