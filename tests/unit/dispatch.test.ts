/**
 * Mimetype validation and transform dispatch unit tests
 */

import { describe, it, expect } from 'vitest';
import { assertMimetype, mimetypeEssence, primaryType } from '../../src/mime/mimetype.js';
import {
  INPUT_TRANSFORMS,
  resolveTransform,
  resolveInputTransform,
  resolveOutputTransform
} from '../../src/mime/dispatch.js';
import type { DispatchTable } from '../../src/mime/dispatch.js';
import { MxhrArgumentError } from '../../src/types/errors.js';

describe('Mimetype helpers', () => {
  it('should strip parameters and lowercase the essence', () => {
    expect(mimetypeEssence('Text/HTML; charset=utf-8')).toBe('text/html');
    expect(mimetypeEssence(' image/gif ')).toBe('image/gif');
  });

  it('should extract the primary type', () => {
    expect(primaryType('image/gif')).toBe('image');
    expect(primaryType('Video/MP4')).toBe('video');
    expect(primaryType('multipart')).toBe('multipart');
  });

  it('should accept printable single-line mimetypes', () => {
    expect(() => assertMimetype('text/plain; charset=utf-8')).not.toThrow();
  });

  it('should reject missing or empty mimetypes', () => {
    expect(() => assertMimetype(undefined)).toThrow(MxhrArgumentError);
    expect(() => assertMimetype('')).toThrow('mimetype argument is required in push()');
    expect(() => assertMimetype('   ')).toThrow(MxhrArgumentError);
  });

  it('should reject mimetypes that would break the framing', () => {
    expect(() => assertMimetype('text/plain\r\nX-Injected: 1')).toThrow(MxhrArgumentError);
    expect(() => assertMimetype('text/plaïn')).toThrow(MxhrArgumentError);
  });
});

describe('Input dispatch', () => {
  it('should match JSON mimetypes exactly', () => {
    expect(resolveInputTransform('application/json')).toEqual({
      transform: { kind: 'json' },
      match: 'exact',
      key: 'application/json'
    });
  });

  it('should prefer the exact match over the primary type', () => {
    // text/x-json is both an exact entry and a text/* type
    expect(resolveInputTransform('text/x-json')).toEqual({
      transform: { kind: 'json' },
      match: 'exact',
      key: 'text/x-json'
    });
  });

  it('should treat script mimetypes as text', () => {
    for (const type of ['application/javascript', 'application/ecmascript', 'application/x-javascript', 'text/x-ecmascript']) {
      expect(resolveInputTransform(type).transform).toEqual({ kind: 'text' });
      expect(resolveInputTransform(type).match).toBe('exact');
    }
  });

  it('should fall back to the primary type for text/*', () => {
    expect(resolveInputTransform('text/html')).toEqual({
      transform: { kind: 'text' },
      match: 'primary',
      key: 'text'
    });
    expect(resolveInputTransform('Text/Plain; charset=iso-8859-1').match).toBe('primary');
  });

  it('should read everything else raw', () => {
    expect(resolveInputTransform('image/gif')).toEqual({
      transform: { kind: 'raw' },
      match: 'default'
    });
    expect(resolveInputTransform('application/octet-stream').transform).toEqual({ kind: 'raw' });
  });
});

describe('Output dispatch', () => {
  it('should encode JSON, script and text parts as text', () => {
    expect(resolveOutputTransform('application/json').transform).toEqual({ kind: 'text' });
    expect(resolveOutputTransform('text/javascript').transform).toEqual({ kind: 'text' });
    expect(resolveOutputTransform('text/css')).toEqual({
      transform: { kind: 'text' },
      match: 'primary',
      key: 'text'
    });
  });

  it('should base64-encode image, video and audio parts', () => {
    for (const type of ['image/png', 'video/webm', 'audio/ogg']) {
      expect(resolveOutputTransform(type).transform).toEqual({ kind: 'base64' });
      expect(resolveOutputTransform(type).match).toBe('primary');
    }
  });

  it('should pass other payloads through unchanged', () => {
    expect(resolveOutputTransform('application/octet-stream')).toEqual({
      transform: { kind: 'passthrough' },
      match: 'default'
    });
  });
});

describe('resolveTransform', () => {
  it('should work against any table', () => {
    const table: DispatchTable<string> = {
      entries: new Map([['model/gltf+json', 'exact-entry'], ['model', 'primary-entry']]),
      fallback: 'fallback-entry'
    };

    expect(resolveTransform(table, 'model/gltf+json').transform).toBe('exact-entry');
    expect(resolveTransform(table, 'model/stl').transform).toBe('primary-entry');
    expect(resolveTransform(table, 'font/woff2').transform).toBe('fallback-entry');
  });

  it('should expose the input table for inspection', () => {
    expect(INPUT_TRANSFORMS.fallback).toEqual({ kind: 'raw' });
    expect(INPUT_TRANSFORMS.entries.get('text')).toEqual({ kind: 'text' });
  });
});
