/**
 * Property-based tests for MxhrBuffer
 *
 * Property 3: FIFO Count Accounting
 * Property 4: Stream Framing
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { MxhrBuffer } from '../../src/buffer/mxhr-buffer.js';

const plainText = fc.stringMatching(/^[a-z0-9 ]{0,40}$/);

describe('Property 3: FIFO Count Accounting', () => {
  it('count equals pushes and drops by one per pull', () => {
    fc.assert(
      fc.property(
        fc.array(plainText, { maxLength: 30 }),
        (payloads) => {
          const mxhr = new MxhrBuffer();
          for (const data of payloads) {
            mxhr.push({ mimetype: 'text/plain', data });
          }
          expect(mxhr.count()).toBe(payloads.length);

          for (let remaining = payloads.length; remaining > 0; remaining--) {
            expect(mxhr.pull().length).toBeGreaterThan(0);
            expect(mxhr.count()).toBe(remaining - 1);
          }
          expect(mxhr.pull()).toHaveLength(0);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('parts come out in the order they were pushed', () => {
    fc.assert(
      fc.property(
        fc.array(plainText, { minLength: 1, maxLength: 20 }),
        (payloads) => {
          const mxhr = new MxhrBuffer({ boundaryGenerator: () => 'B' });
          for (const data of payloads) {
            mxhr.push({ mimetype: 'text/plain', data });
          }

          const pulled = payloads.map(() => mxhr.pull().toString('utf8'));
          const bodies = pulled.map((chunk) => {
            const start = chunk.indexOf('Content-Type: text/plain\n') + 'Content-Type: text/plain\n'.length;
            return chunk.slice(start, chunk.length - '\n--B'.length);
          });

          expect(bodies).toEqual(payloads);
        }
      ),
      { numRuns: 100 }
    );
  });
});

describe('Property 4: Stream Framing', () => {
  it('identical text parts produce identical segments', () => {
    fc.assert(
      fc.property(
        plainText,
        fc.constantFrom('utf-8', 'iso-8859-1', 'us-ascii'),
        (data, encoding) => {
          const mxhr = new MxhrBuffer({ encoding });
          mxhr.push({ mimetype: 'text/plain', data: 'first' });
          mxhr.push({ mimetype: 'text/plain', data });
          mxhr.push({ mimetype: 'text/plain', data });
          mxhr.pull();

          expect(mxhr.pull().equals(mxhr.pull())).toBe(true);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('binary parts are sent as one unwrapped base64 line', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ minLength: 1, maxLength: 2000 }),
        (bytes) => {
          const mxhr = new MxhrBuffer({ boundaryGenerator: () => 'B' });
          mxhr.push({ mimetype: 'image/gif', data: bytes });
          const chunk = mxhr.pull().toString('ascii');
          const body = chunk.slice(chunk.indexOf('Content-Type: image/gif\n') + 'Content-Type: image/gif\n'.length);

          expect(body).toBe(`${Buffer.from(bytes).toString('base64')}\n--B`);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('a flushed stream has one header, one delimiter per part and one terminator', () => {
    fc.assert(
      fc.property(
        fc.array(plainText, { minLength: 1, maxLength: 15 }),
        (payloads) => {
          const mxhr = new MxhrBuffer({ boundaryGenerator: () => 'B' });
          for (const data of payloads) {
            mxhr.push({ mimetype: 'text/plain', data });
          }
          const stream = mxhr.flush().toString('utf8');
          const lines = stream.split('\n');

          expect(lines.slice(0, 3)).toEqual([
            'MIME-Version: 1.0',
            'Content-Type: multipart/mixed; boundary="B"',
            ''
          ]);
          expect(lines.filter((line) => line === '--B')).toHaveLength(payloads.length);
          expect(lines.filter((line) => line === 'Content-Type: text/plain')).toHaveLength(payloads.length);
          expect(stream.endsWith('\n--B--\n')).toBe(true);
          expect(mxhr.count()).toBe(0);
        }
      ),
      { numRuns: 100 }
    );
  });
});
