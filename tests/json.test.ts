import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { stableStringify } from '../src/json.js';

function nest(levels: number): Record<string, unknown> {
  let deep: Record<string, unknown> = { value: 1 };
  for (let i = 0; i < levels; i++) {
    deep = { nested: deep };
  }
  return deep;
}

describe('stableStringify', () => {
  it('sorts keys regardless of insertion order', () => {
    assert.equal(
      stableStringify({ url: 'https://example.com/', tool: 'fetch-url' }),
      stableStringify({ tool: 'fetch-url', url: 'https://example.com/' })
    );
    assert.equal(stableStringify({ b: 2, a: 1, c: 3 }), '{"a":1,"b":2,"c":3}');
  });

  it('sorts nested keys and keeps array order', () => {
    assert.equal(
      stableStringify({ z: { b: 2, a: 1 }, a: [{ y: 3, x: 2 }, 1] }),
      '{"a":[{"x":2,"y":3},1],"z":{"a":1,"b":2}}'
    );
  });

  it('handles primitives', () => {
    assert.equal(stableStringify(42), '42');
    assert.equal(stableStringify('hello'), '"hello"');
    assert.equal(stableStringify(true), 'true');
    assert.equal(stableStringify(null), 'null');
  });

  it('allows the same object twice when it is not a cycle', () => {
    const shared = { k: 1 };
    assert.equal(stableStringify({ a: shared, b: shared }), '{"a":{"k":1},"b":{"k":1}}');
  });

  it('detects circular references', () => {
    const obj: Record<string, unknown> = { a: 1 };
    obj['self'] = obj;
    assert.throws(() => stableStringify(obj), /Circular reference detected/);

    const arr: unknown[] = [1, 2];
    arr.push(arr);
    assert.throws(() => stableStringify(arr), /Circular reference detected/);
  });

  it('rejects nesting deeper than 20 levels', () => {
    assert.throws(() => stableStringify(nest(25)), /Max depth \(20\) exceeded/);
    assert.ok(stableStringify(nest(19)).includes('"value":1'));
  });
});
