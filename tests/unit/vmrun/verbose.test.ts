/**
 * Unit tests for verbose output helpers
 *
 * Tests formatCommand(), formatCommandLine(), redactArgs() and supportsAnsi()
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  REDACTED,
  formatCommand,
  formatCommandLine,
  redactArgs,
  supportsAnsi,
} from '../../../src/vmrun/verbose.js';

const LIST_ARGV = ['-T', 'ws', 'list'];
const GUEST_ARGV = [
  '-T', 'ws',
  '-gu', 'Administrator',
  '-gp', 'test-secret',
  'getGuestIPAddress', 'C:\\VMs\\lab vm\\lab.vmx',
];

describe('redactArgs', () => {
  it('should replace the value after -gp', () => {
    const result = redactArgs(GUEST_ARGV);

    assert.strictEqual(result[5], REDACTED);
    assert.strictEqual(result[3], 'Administrator');
  });

  it('should leave argument vectors without credentials alone', () => {
    assert.deepStrictEqual(redactArgs(LIST_ARGV), LIST_ARGV);
  });

  it('should not mutate the input', () => {
    const argv = [...GUEST_ARGV];
    redactArgs(argv);

    assert.deepStrictEqual(argv, GUEST_ARGV);
  });
});

describe('formatCommandLine', () => {
  it('should quote arguments with spaces and hide the password', () => {
    const result = formatCommandLine('vmrun', GUEST_ARGV);

    assert.strictEqual(
      result,
      'vmrun -T ws -gu Administrator -gp ****** getGuestIPAddress "C:\\VMs\\lab vm\\lab.vmx"'
    );
  });

  it('should quote an empty argument', () => {
    assert.strictEqual(formatCommandLine('vmrun', ['-T', 'ws', 'x', '']), 'vmrun -T ws x ""');
  });

  it('should escape embedded double quotes', () => {
    assert.strictEqual(formatCommandLine('vmrun', ['say "hi"']), 'vmrun "say \\"hi\\""');
  });
});

describe('formatCommand', () => {
  it('should produce expected exact format', () => {
    const result = formatCommand('vmrun', LIST_ARGV, false);

    assert.strictEqual(result, '\n[vmrun] vmrun -T ws list\n\n');
  });

  it('should never print the guest password', () => {
    const result = formatCommand('vmrun', GUEST_ARGV, false);

    assert.strictEqual(result.includes('test-secret'), false);
  });

  describe('ANSI wrapping', () => {
    it('should start with ANSI gray and end with ANSI reset', () => {
      const result = formatCommand('vmrun', LIST_ARGV, true);

      assert.ok(result.startsWith('\x1b[90m'), 'should start with gray');
      assert.ok(result.endsWith('\x1b[0m'), 'should end with reset');
    });

    it('should produce identical content between ansi true and false (ignoring escapes)', () => {
      const plain = formatCommand('vmrun', LIST_ARGV, false);
      const ansi = formatCommand('vmrun', LIST_ARGV, true);
      const stripped = ansi.replace(/\x1b\[[0-9;]*m/g, '');

      assert.strictEqual(stripped, plain);
    });
  });
});

describe('supportsAnsi', () => {
  it('should follow whether stderr is a TTY', () => {
    assert.strictEqual(supportsAnsi(), Boolean(process.stderr.isTTY));
  });
});
