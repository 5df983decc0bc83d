/**
 * MXHR FIFO buffer
 *
 * Collects parts of mixed content types and assembles them into a single
 * multipart/mixed stream, one part per pull().
 */

import { EventEmitter } from 'events';
import type { MxhrBufferOptions, ResolvedBufferOptions } from '../types/config.js';
import type { Part, PartPayload, PushOptions } from '../types/part.js';
import { MxhrArgumentError } from '../types/errors.js';
import {
  resolveCharset,
  encodeText,
  decodeText,
  binaryStringToBytes
} from '../encoding/charset.js';
import type { Charset } from '../encoding/charset.js';
import { base64Encode } from '../encoding/base64.js';
import { isStructuredData, serializeJson } from '../encoding/json.js';
import { assertMimetype } from '../mime/mimetype.js';
import { resolveInputTransform, resolveOutputTransform } from '../mime/dispatch.js';
import { generateBoundary, isValidBoundary } from './boundary.js';
import { PartQueue, snapshotPart } from './part-queue.js';
import { readSourceBytes, selectSource } from './source.js';

const LF = 0x0A;

/**
 * A part's payload after its output transform
 */
interface EncodedBody {
  body: Buffer;
  endsWithLineFeed: boolean;
}

/**
 * Session phase
 *
 * A boundary exists for the whole of a started session; a fresh buffer
 * only has one once it has been read through the boundary accessor.
 */
export type SessionState =
  | { phase: 'fresh'; boundary: string | undefined }
  | { phase: 'started'; boundary: string };

/**
 * MxhrBuffer events interface for type safety
 */
export interface MxhrBufferEvents {
  push: (part: Part, count: number) => void;
  pull: (part: Part, count: number) => void;
  start: (boundary: string) => void;
  finish: (boundary: string) => void;
}

/**
 * MXHR FIFO buffer
 *
 * @example
 * ```typescript
 * const mxhr = new MxhrBuffer();
 * mxhr.push({ mimetype: 'image/gif', filename: 'avatar.gif' });
 * mxhr.push({ mimetype: 'application/json', data: { foo: 'bar' } });
 * socket.write(mxhr.flush());
 * ```
 */
export class MxhrBuffer extends EventEmitter {
  private readonly queue = new PartQueue();
  private readonly options: ResolvedBufferOptions;
  private charset: Charset;
  private session: SessionState = { phase: 'fresh', boundary: undefined };

  constructor(options: MxhrBufferOptions = {}) {
    super();
    this.options = {
      encoding: options.encoding ?? 'utf-8',
      boundaryGenerator: options.boundaryGenerator ?? generateBoundary
    };
    this.charset = resolveCharset(this.options.encoding);
  }

  /**
   * Boundary of the current session, without leading or trailing dashes
   *
   * Generated on first access and kept until finish().
   */
  get boundary(): string {
    const existing = this.session.boundary;
    if (existing !== undefined) {
      return existing;
    }

    const boundary = this.options.boundaryGenerator();
    if (!isValidBoundary(boundary)) {
      throw new MxhrArgumentError(
        `boundaryGenerator returned an invalid boundary: ${JSON.stringify(boundary)}`,
        'boundaryGenerator'
      );
    }
    this.session = { phase: 'fresh', boundary };
    return boundary;
  }

  /**
   * Whether a boundary currently exists
   */
  get hasBoundary(): boolean {
    return this.session.boundary !== undefined;
  }

  /**
   * Whether a session has been started by pull()
   */
  get started(): boolean {
    return this.session.phase === 'started';
  }

  /**
   * Canonical name of the encoding used for text parts
   */
  get encoding(): string {
    return this.charset.name;
  }

  /**
   * Changes the output encoding. Should not be changed between pushes.
   *
   * @throws MxhrArgumentError if the encoding is not supported
   */
  set encoding(name: string) {
    this.charset = resolveCharset(name);
  }

  /**
   * Read-only snapshot of the queued parts, head first
   */
  get parts(): readonly Part[] {
    return this.queue.toArray();
  }

  /**
   * Number of queued parts
   */
  count(): number {
    return this.queue.count();
  }

  /**
   * Appends a part to the buffer
   *
   * The data source is read and transformed immediately; nothing is queued
   * if any step fails.
   *
   * @returns Number of queued parts
   * @throws MxhrArgumentError on a missing mimetype or invalid data source
   * @throws MxhrResourceError if a file or descriptor cannot be read
   * @throws MxhrEncodingError if text cannot be decoded or serialized
   */
  push(options: PushOptions): number {
    assertMimetype(options.mimetype);
    const part: Part = {
      mimetype: options.mimetype,
      payload: this.materialize(options)
    };

    // Listeners see the part before it is queued
    const count = this.queue.count() + 1;
    this.emit('push', snapshotPart(part), count);
    this.queue.append(part);
    return count;
  }

  /**
   * Returns the next part framed for the stream, or an empty Buffer when
   * the queue is empty
   *
   * The first pull of a session is prefixed with the multipart header and
   * the opening boundary line. Every chunk ends with a boundary marker.
   * `start` and `pull` listeners run before the part is dequeued, so an
   * exception from a listener leaves the part queued.
   *
   * @throws MxhrEncodingError if the part cannot be encoded; the part stays queued
   */
  pull(): Buffer {
    const part = this.queue.peek();
    if (!part) {
      return Buffer.alloc(0);
    }

    const { body, endsWithLineFeed } = this.encodeOutput(part);
    const boundary = this.boundary;
    const starting = this.session.phase === 'fresh';

    if (starting) {
      this.emit('start', boundary);
    }
    this.emit('pull', snapshotPart(part), this.queue.count() - 1);

    this.queue.dequeue();
    let prefix = '\n';
    if (starting) {
      this.session = { phase: 'started', boundary };
      prefix =
        'MIME-Version: 1.0\n' +
        `Content-Type: multipart/mixed; boundary="${boundary}"\n` +
        '\n' +
        `--${boundary}\n`;
    }

    // Only add a line feed if the payload does not already end with one
    const closing = endsWithLineFeed ? '--' : '\n--';

    return Buffer.concat([
      Buffer.from(`${prefix}Content-Type: ${part.mimetype}\n`, 'ascii'),
      body,
      Buffer.from(`${closing}${boundary}`, 'ascii')
    ]);
  }

  /**
   * Ends the current session: clears the queue and the boundary
   *
   * @returns The final '--\n' marker, or an empty Buffer if nothing has
   * been pulled since the last finish
   */
  finish(): Buffer {
    if (this.session.phase !== 'started') {
      return Buffer.alloc(0);
    }

    const { boundary } = this.session;
    this.emit('finish', boundary);
    this.queue.clear();
    this.session = { phase: 'fresh', boundary: undefined };
    return Buffer.from('--\n', 'ascii');
  }

  /**
   * Pulls every queued part and finishes the session
   *
   * @returns The complete multipart stream, or an empty Buffer if the
   * buffer was empty and no session had been started
   */
  flush(): Buffer {
    const chunks: Buffer[] = [];

    for (let chunk = this.pull(); chunk.length > 0; chunk = this.pull()) {
      chunks.push(chunk);
    }
    chunks.push(this.finish());

    return Buffer.concat(chunks);
  }

  /**
   * Runs the input transform for the part's mimetype over its data source
   */
  private materialize(options: PushOptions): PartPayload {
    const { transform } = resolveInputTransform(options.mimetype);
    const override = options.encoding !== undefined
      ? resolveCharset(options.encoding)
      : undefined;
    const source = selectSource(options);

    if (source.type === 'data') {
      const { data } = source;
      if (isStructuredData(data)) {
        if (transform.kind !== 'json') {
          throw new MxhrArgumentError(
            `structured data requires a JSON mimetype, got '${options.mimetype}'`,
            'data'
          );
        }
        return serializeJson(data, this.charset);
      }
      // Inline data is used as-is; bytes are copied so the caller's array is not retained
      return typeof data === 'string' ? data : Buffer.from(data);
    }

    const bytes = readSourceBytes(source);

    switch (transform.kind) {
      case 'json':
      case 'text':
        return decodeText(bytes, override ?? this.charset);
      case 'raw':
        return override ? decodeText(bytes, override) : bytes;
    }
  }

  /**
   * Runs the output transform for the part's mimetype over its payload
   *
   * Whether the payload ends in a line feed is judged on the text, not on
   * the last encoded byte: in UTF-16LE a character such as U+0A95 also
   * ends in 0x0A.
   */
  private encodeOutput(part: Part): EncodedBody {
    const { transform } = resolveOutputTransform(part.mimetype);
    const { payload } = part;

    switch (transform.kind) {
      case 'text':
        return typeof payload === 'string'
          ? { body: encodeText(payload, this.charset), endsWithLineFeed: payload.endsWith('\n') }
          : bytesBody(payload);
      case 'base64':
        return { body: Buffer.from(base64Encode(payload), 'ascii'), endsWithLineFeed: false };
      case 'passthrough':
        return bytesBody(typeof payload === 'string' ? binaryStringToBytes(payload) : payload);
    }
  }
}

function bytesBody(body: Buffer): EncodedBody {
  return { body, endsWithLineFeed: body.length > 0 && body[body.length - 1] === LF };
}
