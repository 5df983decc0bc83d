/**
 * Data sources for push()
 *
 * A part's data comes from exactly one of: an inline value, a named file
 * (opened, read to the end, closed) or an already-open descriptor (read
 * from its current position, left open).
 */

import { closeSync, openSync, readSync } from 'fs';
import type { PartData, PushOptions } from '../types/part.js';
import { MxhrArgumentError, MxhrResourceError, toError } from '../types/errors.js';

const READ_CHUNK_SIZE = 64 * 1024;

/**
 * The single data source selected from push options
 */
export type DataSource =
  | { type: 'data'; data: PartData }
  | { type: 'filename'; filename: string }
  | { type: 'fd'; fd: number };

/**
 * Picks the data source from push options
 *
 * @throws MxhrArgumentError if no source or more than one source is given
 */
export function selectSource(options: PushOptions): DataSource {
  const sources: DataSource[] = [];

  if (options.data !== undefined) {
    sources.push({ type: 'data', data: options.data });
  }
  if (options.filename !== undefined) {
    if (typeof options.filename !== 'string' || options.filename.length === 0) {
      throw new MxhrArgumentError('filename must be a non-empty string', 'filename');
    }
    sources.push({ type: 'filename', filename: options.filename });
  }
  if (options.fd !== undefined) {
    if (!Number.isInteger(options.fd) || options.fd < 0) {
      throw new MxhrArgumentError(`fd must be a non-negative integer, got ${options.fd}`, 'fd');
    }
    sources.push({ type: 'fd', fd: options.fd });
  }

  if (sources.length === 0) {
    throw new MxhrArgumentError('invalid or missing data source type', 'data');
  }
  if (sources.length > 1) {
    throw new MxhrArgumentError(
      `conflicting data sources: ${sources.map((s) => s.type).join(', ')}`,
      sources[1].type
    );
  }

  return sources[0];
}

/**
 * Reads an open descriptor from its current position to end of file
 *
 * @throws MxhrResourceError if the read fails
 */
export function readDescriptor(fd: number, resource: string | number = fd): Buffer {
  const chunks: Buffer[] = [];
  let total = 0;

  try {
    for (;;) {
      const chunk = Buffer.allocUnsafe(READ_CHUNK_SIZE);
      // position null reads from, and advances, the descriptor's file position
      const bytesRead = readSync(fd, chunk, 0, READ_CHUNK_SIZE, null);
      if (bytesRead === 0) break;
      chunks.push(chunk.subarray(0, bytesRead));
      total += bytesRead;
    }
  } catch (err) {
    throw new MxhrResourceError(
      `Can't read '${resource}': ${toError(err).message}`,
      resource,
      toError(err)
    );
  }

  return Buffer.concat(chunks, total);
}

/**
 * Opens a named file, reads all of it and closes it again
 *
 * The descriptor is closed on every path, including read errors.
 *
 * @throws MxhrResourceError if the file cannot be opened or read
 */
export function readNamedFile(filename: string): Buffer {
  let fd: number;
  try {
    fd = openSync(filename, 'r');
  } catch (err) {
    throw new MxhrResourceError(
      `Can't open '${filename}': ${toError(err).message}`,
      filename,
      toError(err)
    );
  }

  try {
    return readDescriptor(fd, filename);
  } finally {
    closeSync(fd);
  }
}

/**
 * Reads the bytes behind a file or descriptor source
 */
export function readSourceBytes(source: Exclude<DataSource, { type: 'data' }>): Buffer {
  return source.type === 'filename'
    ? readNamedFile(source.filename)
    : readDescriptor(source.fd);
}
