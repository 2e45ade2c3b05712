import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  classifyContent,
  isPdf,
  parseMimeType,
  safeTruncate,
  sliceHead,
} from '../src/content-guard.js';

const encoder = new TextEncoder();

function ascii(text: string): Uint8Array {
  return encoder.encode(text);
}

const PNG_HEAD = new Uint8Array([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00,
]);

describe('parseMimeType', () => {
  it('drops parameters and normalizes case', () => {
    assert.equal(parseMimeType(' Text/HTML ; charset=UTF-8'), 'text/html');
    assert.equal(parseMimeType(undefined), '');
  });
});

describe('classifyContent', () => {
  it('trusts a textual content type over binary-looking bytes', () => {
    assert.deepEqual(classifyContent('text/html; charset=utf-8', PNG_HEAD), {
      kind: 'text',
    });
    assert.deepEqual(classifyContent('application/json', PNG_HEAD), {
      kind: 'text',
    });
  });

  it('returns the same verdict for repeated calls', () => {
    const first = classifyContent('application/octet-stream', ascii('abc'));
    const second = classifyContent('application/octet-stream', ascii('abc'));
    assert.deepEqual(first, second);
  });

  it('reports binary MIME families with the normalized type', () => {
    assert.deepEqual(classifyContent('image/png', ascii('hello')), {
      kind: 'binary',
      contentType: 'image/png',
    });
    assert.deepEqual(classifyContent('Application/PDF', ascii('hello')), {
      kind: 'binary',
      contentType: 'application/pdf',
    });
    assert.deepEqual(
      classifyContent('application/vnd.ms-excel; name=a.xls', ascii('hello')),
      { kind: 'binary', contentType: 'application/vnd.ms-excel' }
    );
  });

  it('sniffs signatures when the content type is missing or unknown', () => {
    assert.deepEqual(classifyContent(undefined, PNG_HEAD), { kind: 'binary' });
    assert.deepEqual(
      classifyContent('application/unknown-type', ascii('%PDF-1.7\n')),
      { kind: 'binary' }
    );
    assert.deepEqual(classifyContent(undefined, new Uint8Array([0xff, 0xd8, 0xff, 0xe0])), {
      kind: 'binary',
    });
    assert.deepEqual(classifyContent(undefined, ascii('GIF89a')), { kind: 'binary' });
    assert.deepEqual(classifyContent(undefined, new Uint8Array([0x1f, 0x8b, 0x08])), {
      kind: 'binary',
    });
  });

  it('recognizes WEBP only with the marker at offset 8', () => {
    assert.deepEqual(classifyContent(undefined, ascii('RIFF\0\0\0\0WEBPVP8 ')), {
      kind: 'binary',
    });
    assert.deepEqual(classifyContent(undefined, ascii('RIFF\0\0\0\0WAVEfmt ')), {
      kind: 'text',
    });
  });

  it('finds ftyp within the first 64 bytes only', () => {
    const early = new Uint8Array(80);
    early.set(ascii('ftypisom'), 4);
    assert.deepEqual(classifyContent(undefined, early), { kind: 'binary' });

    const late = new Uint8Array(80);
    late.set(ascii('ftyp'), 70);
    assert.deepEqual(classifyContent(undefined, late), { kind: 'text' });
  });

  it('treats plain bytes as text', () => {
    assert.deepEqual(classifyContent(undefined, ascii('<html></html>')), {
      kind: 'text',
    });
    assert.deepEqual(classifyContent(undefined, new Uint8Array()), { kind: 'text' });
  });
});

describe('isPdf', () => {
  it('matches the content type or the %PDF- prefix', () => {
    assert.equal(isPdf('application/pdf; qs=0.5', new Uint8Array()), true);
    assert.equal(isPdf('APPLICATION/PDF', new Uint8Array()), true);
    assert.equal(isPdf(undefined, ascii('%PDF-1.4')), true);
    assert.equal(isPdf('text/html', ascii('<html>')), false);
    assert.equal(isPdf(undefined, ascii('%PDF')), false);
  });
});

describe('sliceHead', () => {
  it('returns at most 512 bytes', () => {
    assert.equal(sliceHead(new Uint8Array(1000)).byteLength, 512);
    assert.equal(sliceHead(new Uint8Array(10)).byteLength, 10);
  });
});

describe('safeTruncate', () => {
  it('returns short text unchanged', () => {
    assert.equal(safeTruncate('abc', 5, '...'), 'abc');
    assert.equal(safeTruncate('abcde', 5, '...'), 'abcde');
  });

  it('keeps the result within max including the suffix', () => {
    assert.equal(safeTruncate('hello world', 8, '...'), 'hello...');
  });

  it('never splits a surrogate pair', () => {
    assert.equal(safeTruncate('ab\u{1F600}cdef', 6, '...'), 'ab...');
  });

  it('drops the suffix when it does not fit', () => {
    assert.equal(safeTruncate('abcdef', 2, '...'), 'ab');
    assert.equal(safeTruncate('abcdef', 0, '...'), '');
  });
});
