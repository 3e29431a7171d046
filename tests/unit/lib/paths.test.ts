/**
 * Unit tests for Path Utilities
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  expandPath,
  getDefaultDataDir,
  getRecordsPath,
  getScriptsDir,
  isInsideDir,
  isWindowsAbsolute,
  parentDir,
} from '../../../src/lib/paths.js';

describe('expandPath', () => {
  describe('tilde expansion', () => {
    it('should expand ~ to home directory', () => {
      const result = expandPath('~', '/base');

      assert.strictEqual(result, homedir());
    });

    it('should expand ~/path to home directory path', () => {
      const result = expandPath('~/some/path', '/base');

      assert.strictEqual(result, join(homedir(), 'some/path'));
    });

    it('should expand ~\\path on Windows-style paths', () => {
      const result = expandPath('~\\some\\path', '/base');

      const expected = join(homedir(), 'some\\path');
      assert.strictEqual(result, expected);
    });

    it('should expand ~/ to the home directory itself', () => {
      assert.strictEqual(expandPath('~/', '/base'), homedir());
    });
  });

  describe('relative path resolution', () => {
    it('should resolve relative path against base path', () => {
      const basePath = resolve('/project/config');
      const result = expandPath('relative/file.txt', basePath);

      assert.strictEqual(result, resolve(basePath, 'relative/file.txt'));
    });

    it('should keep Windows drive paths on any platform', () => {
      const result = expandPath('C:\\Virtual Machines\\Templates\\base.vmx', resolve('/base'));

      assert.strictEqual(result, 'C:\\Virtual Machines\\Templates\\base.vmx');
    });

    it('should preserve absolute paths', () => {
      // Use platform-appropriate absolute path
      const absolutePath = process.platform === 'win32'
        ? 'C:\\absolute\\path'
        : '/absolute/path';
      const result = expandPath(absolutePath, '/base');

      assert.strictEqual(result, absolutePath);
    });

    it('should resolve . as current directory', () => {
      const basePath = resolve('/project/config');
      const result = expandPath('.', basePath);

      assert.strictEqual(result, basePath);
    });

    it('should resolve .. as parent directory', () => {
      const basePath = resolve('/project/config');
      const result = expandPath('..', basePath);

      assert.strictEqual(result, resolve(basePath, '..'));
    });
  });

  describe('environment variable expansion', () => {
    const originalEnv: Record<string, string | undefined> = {};

    beforeEach(() => {
      // Save original values
      originalEnv['TEST_VAR'] = process.env['TEST_VAR'];
      originalEnv['ANOTHER_VAR'] = process.env['ANOTHER_VAR'];

      // Set test values
      process.env['TEST_VAR'] = 'test_value';
      process.env['ANOTHER_VAR'] = 'another_value';
    });

    afterEach(() => {
      // Restore original values
      if (originalEnv['TEST_VAR'] === undefined) {
        delete process.env['TEST_VAR'];
      } else {
        process.env['TEST_VAR'] = originalEnv['TEST_VAR'];
      }
      if (originalEnv['ANOTHER_VAR'] === undefined) {
        delete process.env['ANOTHER_VAR'];
      } else {
        process.env['ANOTHER_VAR'] = originalEnv['ANOTHER_VAR'];
      }
    });

    it('should expand Windows-style %VAR% environment variables', () => {
      const basePath = resolve('/base');
      const result = expandPath('%TEST_VAR%/path', basePath);

      assert.strictEqual(result, resolve(basePath, 'test_value/path'));
    });

    it('should expand Unix-style $VAR environment variables', () => {
      const basePath = resolve('/base');
      const result = expandPath('$TEST_VAR/path', basePath);

      assert.strictEqual(result, resolve(basePath, 'test_value/path'));
    });

    it('should expand multiple environment variables', () => {
      const basePath = resolve('/base');
      const result = expandPath('%TEST_VAR%/$ANOTHER_VAR/end', basePath);

      assert.strictEqual(result, resolve(basePath, 'test_value/another_value/end'));
    });

    it('should replace undefined env vars with empty string', () => {
      const basePath = resolve('/base');
      const result = expandPath('%UNDEFINED_VAR%/path', basePath);

      // After replacing undefined var with empty string, we get '/path'
      // '/path' is considered absolute by isAbsolute() on both platforms,
      // so it's returned unchanged
      assert.strictEqual(result, '/path');
    });
  });
});

describe('getDefaultDataDir', () => {
  it('should return .vmlease beside the config', () => {
    const configPath = resolve('/project/vmlease.yaml');
    const result = getDefaultDataDir(configPath);

    assert.strictEqual(result, join(resolve('/project'), '.vmlease'));
  });

  it('should handle config in subdirectory', () => {
    const configPath = resolve('/project/config/vmlease.yaml');
    const result = getDefaultDataDir(configPath);

    assert.strictEqual(result, join(resolve('/project/config'), '.vmlease'));
  });
});

describe('getRecordsPath / getScriptsDir', () => {
  it('should place records.json and scripts/ in the data directory', () => {
    const dataDir = resolve('/project/.vmlease');

    assert.strictEqual(getRecordsPath(dataDir), join(dataDir, 'records.json'));
    assert.strictEqual(getScriptsDir(dataDir), join(dataDir, 'scripts'));
  });
});

describe('isWindowsAbsolute', () => {
  it('should accept drive and UNC paths', () => {
    assert.strictEqual(isWindowsAbsolute('C:\\VMs'), true);
    assert.strictEqual(isWindowsAbsolute('d:/VMs'), true);
    assert.strictEqual(isWindowsAbsolute('\\\\host\\share'), true);
  });

  it('should reject POSIX and relative paths', () => {
    assert.strictEqual(isWindowsAbsolute('/srv/vms'), false);
    assert.strictEqual(isWindowsAbsolute('VMs\\a'), false);
  });
});

describe('parentDir', () => {
  it('should split Windows paths on backslashes on any platform', () => {
    assert.strictEqual(parentDir('C:\\Virtual Machines\\vm-7\\vm-7.vmx'), 'C:\\Virtual Machines\\vm-7');
  });

  it('should split POSIX paths', () => {
    assert.strictEqual(parentDir('/srv/vms/vm-7/vm-7.vmx'), '/srv/vms/vm-7');
  });
});

describe('isInsideDir', () => {
  it('should accept a folder below the parent regardless of case and separators', () => {
    assert.strictEqual(isInsideDir('C:\\Virtual Machines\\vm-7', 'c:/virtual machines/'), true);
  });

  it('should reject the parent itself', () => {
    assert.strictEqual(isInsideDir('C:\\Virtual Machines', 'C:\\Virtual Machines'), false);
  });

  it('should reject a sibling sharing a prefix', () => {
    assert.strictEqual(isInsideDir('C:\\Virtual Machines2\\vm-7', 'C:\\Virtual Machines'), false);
  });

  it('should reject everything for an empty parent', () => {
    assert.strictEqual(isInsideDir('/srv/vms', ''), false);
  });
});
