/**
 * Property-based tests for boundary generation
 *
 * Property 2: Boundary Uniqueness
 */

import { describe, it, expect } from 'vitest';
import { generateBoundary, isValidBoundary } from '../../src/buffer/boundary.js';
import { MxhrBuffer } from '../../src/buffer/mxhr-buffer.js';

describe('Property 2: Boundary Uniqueness', () => {
  it('generated boundaries are valid and pairwise distinct', () => {
    const seen = new Set<string>();

    for (let i = 0; i < 10000; i++) {
      const boundary = generateBoundary();
      expect(isValidBoundary(boundary)).toBe(true);
      seen.add(boundary);
    }

    expect(seen.size).toBe(10000);
  });

  it('each session of a buffer gets a new boundary', () => {
    const mxhr = new MxhrBuffer();
    const seen = new Set<string>();

    for (let i = 0; i < 10000; i++) {
      seen.add(mxhr.boundary);
      mxhr.push({ mimetype: 'text/plain', data: 'x' });
      mxhr.flush();
    }

    expect(seen.size).toBe(10000);
  });

  it('concurrently existing buffers get distinct boundaries', () => {
    const buffers = Array.from({ length: 1000 }, () => new MxhrBuffer());
    const boundaries = new Set(buffers.map((mxhr) => mxhr.boundary));

    expect(boundaries.size).toBe(1000);
  });
});

describe('isValidBoundary', () => {
  it('enforces RFC 2046 boundary syntax', () => {
    expect(isValidBoundary('simple')).toBe(true);
    expect(isValidBoundary("a'()+_,-./:=?z")).toBe(true);
    expect(isValidBoundary('x'.repeat(70))).toBe(true);
    expect(isValidBoundary('x'.repeat(71))).toBe(false);
    expect(isValidBoundary('trailing ')).toBe(false);
    expect(isValidBoundary('with space')).toBe(true);
    expect(isValidBoundary('semi;colon')).toBe(false);
    expect(isValidBoundary('--leading')).toBe(false);
  });
});
