/**
 * Unit tests for Hash Utilities
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createHash } from 'node:crypto';
import { computeContentHash } from '../../../src/lib/hash.js';

describe('computeContentHash', () => {
  it('should return a string of 8 characters', () => {
    const result = computeContentHash('test content');

    assert.strictEqual(typeof result, 'string');
    assert.strictEqual(result.length, 8);
  });

  it('should be deterministic - same input produces same output', () => {
    const content = 'deterministic test content';
    const hash1 = computeContentHash(content);
    const hash2 = computeContentHash(content);

    assert.strictEqual(hash1, hash2);
  });

  it('should produce different hashes for different inputs', () => {
    const hash1 = computeContentHash('content A');
    const hash2 = computeContentHash('content B');

    assert.notStrictEqual(hash1, hash2);
  });

  it('should be the leading characters of the SHA-256 digest', () => {
    const expected = createHash('sha256').update('Write-Output 1').digest('hex').slice(0, 8);

    assert.strictEqual(computeContentHash('Write-Output 1'), expected);
  });

  it('should produce valid hexadecimal characters', () => {
    const result = computeContentHash('hex test');

    assert.match(result, /^[0-9a-f]{8}$/);
  });

  it('should handle empty string', () => {
    const result = computeContentHash('');

    assert.strictEqual(typeof result, 'string');
    assert.strictEqual(result.length, 8);
    assert.match(result, /^[0-9a-f]{8}$/);
  });

  it('should handle special characters', () => {
    const result = computeContentHash('Special: !@#$%^&*()_+{}|:"<>?[]\\;\',./`~');

    assert.strictEqual(result.length, 8);
    assert.match(result, /^[0-9a-f]{8}$/);
  });

  it('should handle unicode content', () => {
    const result = computeContentHash('Unicode: 日本語 中文 émojis: 🎉');

    assert.strictEqual(result.length, 8);
    assert.match(result, /^[0-9a-f]{8}$/);
  });
});
