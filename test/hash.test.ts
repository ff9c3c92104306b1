/**
 * Hash Module Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { sha256, canonicalize, hashObject } from '../src/hash.js';

describe('sha256', () => {
  it('should hash the empty string', () => {
    assert.strictEqual(
      sha256(''),
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should produce 64 hex characters', () => {
    assert.match(sha256('checkpoint'), /^[0-9a-f]{64}$/);
  });
});

describe('canonicalize', () => {
  it('should sort keys at every depth', () => {
    const value = { b: 1, a: { d: [{ z: 1, y: 2 }], c: null } };
    assert.strictEqual(
      JSON.stringify(canonicalize(value)),
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}'
    );
  });

  it('should leave primitives alone', () => {
    assert.strictEqual(canonicalize(3), 3);
    assert.strictEqual(canonicalize('x'), 'x');
  });
});

describe('hashObject', () => {
  it('should ignore key order', () => {
    assert.strictEqual(hashObject({ a: 1, b: [1, 2] }), hashObject({ b: [1, 2], a: 1 }));
  });

  it('should change with any value', () => {
    assert.notStrictEqual(hashObject({ weights: [0.5] }), hashObject({ weights: [0.50001] }));
  });

  it('should equal the hash of the canonical JSON', () => {
    assert.strictEqual(hashObject({ b: 2, a: 1 }), sha256('{"a":1,"b":2}'));
  });
});
