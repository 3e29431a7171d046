/**
 * Unit tests for best-effort results
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { VmControlError } from '../../../src/core/errors.js';
import { attempt, skipped } from '../../../src/core/outcome.js';

describe('attempt', () => {
  it('should wrap a value', async () => {
    assert.deepStrictEqual(await attempt(async () => 42), { ok: true, value: 42 });
  });

  it('should capture a failure with its message', async () => {
    const error = new VmControlError('vmrun deleteVM failed: locked', 'UNKNOWN', 'deleteVM');

    const result = await attempt(async () => {
      throw error;
    });

    assert.deepStrictEqual(result, { ok: false, diagnostic: 'vmrun deleteVM failed: locked', error });
  });

  it('should describe non-Error rejections', async () => {
    const result = await attempt(() => Promise.reject('plain text'));

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.strictEqual(result.diagnostic, 'plain text');
    }
  });
});

describe('skipped', () => {
  it('should carry the reason and no error', () => {
    assert.deepStrictEqual(skipped('no reservation service configured'), {
      ok: false,
      diagnostic: 'no reservation service configured',
      error: undefined,
    });
  });
});
