/**
 * Unit tests for the VM Record Store
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { access, mkdir, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import { StoreError, WorkflowError } from '../../../src/core/errors.js';
import { RecordStore } from '../../../src/state/store.js';
import type { RecordsFile, VmRecord } from '../../../src/state/types.js';

function record(id: string): Omit<VmRecord, 'task' | 'createdAt'> {
  return {
    id,
    name: `lab-${id}`,
    vmxPath: `C:\\VMs\\lab-${id}\\lab-${id}.vmx`,
    remoteAccess: { host: 'lab.example.test', port: 50007, username: 'Administrator' },
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/**
 * Store that stops after its first read until told to go on, standing in for
 * another process caught between reading and writing the file.
 */
class PausingStore extends RecordStore {
  private readonly paused = deferred();
  private readonly resumed = deferred();
  private pending = true;

  protected override async load(): Promise<RecordsFile> {
    const file = await super.load();
    if (this.pending) {
      this.pending = false;
      this.paused.resolve();
      await this.resumed.promise;
    }
    return file;
  }

  whenPaused(): Promise<void> {
    return this.paused.promise;
  }

  proceed(): void {
    this.resumed.resolve();
  }
}

describe('RecordStore', () => {
  let testDir: string;
  let recordsPath: string;
  let store: RecordStore;

  beforeEach(async () => {
    testDir = join(tmpdir(), `vmlease-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    recordsPath = join(testDir, 'data', 'records.json');
    store = new RecordStore(recordsPath);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('records', () => {
    it('should start empty when no file exists', async () => {
      assert.deepStrictEqual(await store.list(), []);
      assert.strictEqual(await store.get('vm-1'), undefined);
    });

    it('should create an idle record and persist it', async () => {
      await store.put(record('vm-1'));

      const reopened = new RecordStore(recordsPath);
      const stored = await reopened.require('vm-1');
      assert.strictEqual(stored.name, 'lab-vm-1');
      assert.deepStrictEqual(stored.task, {
        phase: 'idle',
        progress: 0,
        message: null,
        outcome: null,
        startedAt: null,
        updatedAt: null,
      });
    });

    it('should list records ordered by id', async () => {
      await store.put(record('vm-b'));
      await store.put(record('vm-a'));

      assert.deepStrictEqual((await store.list()).map((r) => r.id), ['vm-a', 'vm-b']);
    });

    it('should keep task state and creation time when re-registering', async () => {
      const first = await store.put(record('vm-1'));
      await store.tryAcquire('vm-1', 'Queued');

      const again = await store.put({ ...record('vm-1'), name: 'renamed' });

      assert.strictEqual(again.name, 'renamed');
      assert.strictEqual(again.createdAt, first.createdAt);
      assert.strictEqual(again.task.phase, 'running');
    });

    it('should throw VM_NOT_FOUND from require', async () => {
      await assert.rejects(
        () => store.require('missing'),
        (error: unknown) => error instanceof StoreError && error.code === 'VM_NOT_FOUND'
      );
    });

    it('should not let update change task state', async () => {
      await store.put(record('vm-1'));

      const updated = await store.update('vm-1', (r) => {
        r.ownerId = 'tenant-1';
        r.task = { ...r.task, phase: 'running' };
      });

      assert.strictEqual(updated.ownerId, 'tenant-1');
      assert.strictEqual(updated.task.phase, 'idle');
    });

    it('should refuse to remove a VM with a running workflow', async () => {
      await store.put(record('vm-1'));
      await store.tryAcquire('vm-1', 'Queued');

      await assert.rejects(
        () => store.remove('vm-1'),
        (error: unknown) => error instanceof WorkflowError && error.code === 'WORKFLOW_ACTIVE'
      );
    });

    it('should remove an idle VM', async () => {
      await store.put(record('vm-1'));

      assert.strictEqual(await store.remove('vm-1'), true);
      assert.strictEqual(await store.remove('vm-1'), false);
    });
  });

  describe('lease', () => {
    beforeEach(async () => {
      await store.put(record('vm-1'));
    });

    it('should move an idle VM to running', async () => {
      const result = await store.tryAcquire('vm-1', 'Queued');

      assert.strictEqual(result.acquired, true);
      const stored = await store.require('vm-1');
      assert.strictEqual(stored.task.phase, 'running');
      assert.strictEqual(stored.task.progress, 0);
      assert.strictEqual(stored.task.message, 'Queued');
      assert.strictEqual(stored.task.outcome, null);
    });

    it('should refuse a second lease', async () => {
      await store.tryAcquire('vm-1', 'Queued');

      assert.deepStrictEqual(await store.tryAcquire('vm-1', 'Queued'), {
        acquired: false,
        reason: 'already-running',
      });
    });

    it('should grant exactly one of two concurrent leases', async () => {
      const results = await Promise.all([store.tryAcquire('vm-1', 'A'), store.tryAcquire('vm-1', 'B')]);

      assert.deepStrictEqual(results.map((r) => r.acquired), [true, false]);
    });

    it('should report unknown VMs', async () => {
      assert.deepStrictEqual(await store.tryAcquire('missing', 'Queued'), {
        acquired: false,
        reason: 'not-found',
      });
    });

    it('should never move progress backwards', async () => {
      await store.tryAcquire('vm-1', 'Queued');
      await store.setProgress('vm-1', 40, 'Restored');

      const after = await store.setProgress('vm-1', 25, 'Late update');

      assert.strictEqual(after.task.progress, 40);
      assert.strictEqual(after.task.message, 'Late update');
    });

    it('should clamp progress to 100', async () => {
      await store.tryAcquire('vm-1', 'Queued');

      assert.strictEqual((await store.setProgress('vm-1', 250, 'x')).task.progress, 100);
    });

    it('should refuse progress without a lease', async () => {
      await assert.rejects(
        () => store.setProgress('vm-1', 10, 'Stopping VM'),
        (error: unknown) => error instanceof WorkflowError && error.code === 'LEASE_NOT_HELD'
      );
    });

    it('should release to idle with the outcome', async () => {
      await store.tryAcquire('vm-1', 'Queued');
      await store.setProgress('vm-1', 60, 'Waiting');

      const released = await store.release('vm-1', 'warning', 'Guest did not report an address');

      assert.strictEqual(released.task.phase, 'idle');
      assert.strictEqual(released.task.progress, 0);
      assert.strictEqual(released.task.outcome, 'warning');
      assert.strictEqual(released.task.message, 'Guest did not report an address');
    });

    it('should clear the message on success', async () => {
      await store.tryAcquire('vm-1', 'Queued');

      const released = await store.release('vm-1', 'success', 'ignored');

      assert.strictEqual(released.task.message, null);
      assert.strictEqual(released.task.outcome, 'success');
    });

    it('should reset abandoned workflows', async () => {
      await store.put(record('vm-2'));
      await store.tryAcquire('vm-1', 'Queued');
      await store.setProgress('vm-1', 45, 'Updating network reservation');

      const reset = await store.recoverAbandoned();

      assert.deepStrictEqual(reset, ['vm-1']);
      const stored = await store.require('vm-1');
      assert.strictEqual(stored.task.phase, 'idle');
      assert.strictEqual(stored.task.outcome, 'failure');
      assert.strictEqual(stored.task.message, 'Workflow abandoned at 45%: Updating network reservation');
    });
  });

  describe('other processes', () => {
    it('should not write back a task released while it was reading', async () => {
      await store.put(record('vm-1'));
      await store.tryAcquire('vm-1', 'Queued');

      const registering = new PausingStore(recordsPath);
      const registered = registering.put({ ...record('vm-1'), ownerId: 'tenant-2' });
      await registering.whenPaused();
      const released = store.release('vm-1', 'success', null);
      await new Promise((resolve) => setTimeout(resolve, 50));
      registering.proceed();
      await Promise.all([registered, released]);

      const stored = await store.require('vm-1');
      assert.strictEqual(stored.ownerId, 'tenant-2');
      assert.strictEqual(stored.task.phase, 'idle');
      assert.strictEqual(stored.task.outcome, 'success');
    });

    it('should remove its lock file after each operation', async () => {
      await store.put(record('vm-1'));

      await assert.rejects(() => access(`${recordsPath}.lock`), { code: 'ENOENT' });
    });

    it('should take over a lock left by a process that died', async () => {
      await mkdir(join(testDir, 'data'), { recursive: true });
      const lockPath = `${recordsPath}.lock`;
      await writeFile(lockPath, '', 'utf-8');
      const longAgo = new Date(Date.now() - 60000);
      await utimes(lockPath, longAgo, longAgo);

      await store.put(record('vm-1'));

      assert.strictEqual((await store.require('vm-1')).name, 'lab-vm-1');
    });
  });

  describe('file handling', () => {
    it('should write version 1 JSON', async () => {
      await store.put(record('vm-1'));

      const parsed: unknown = JSON.parse(await readFile(recordsPath, 'utf-8'));
      assert.ok(typeof parsed === 'object' && parsed !== null && 'version' in parsed);
      assert.strictEqual(parsed.version, 1);
    });

    it('should report invalid JSON as STORE_CORRUPTED', async () => {
      await mkdir(join(testDir, 'data'), { recursive: true });
      await writeFile(recordsPath, '{ not json', 'utf-8');

      await assert.rejects(
        () => store.list(),
        (error: unknown) => {
          assert.ok(error instanceof StoreError);
          assert.strictEqual(error.code, 'STORE_CORRUPTED');
          assert.strictEqual(error.message, `Records file ${recordsPath} is not valid JSON`);
          return true;
        }
      );
    });

    it('should report an unknown layout as STORE_CORRUPTED', async () => {
      await mkdir(join(testDir, 'data'), { recursive: true });
      await writeFile(recordsPath, JSON.stringify({ version: 2, vms: {} }), 'utf-8');

      await assert.rejects(
        () => store.list(),
        (error: unknown) => error instanceof StoreError && error.message.endsWith('has an unsupported layout')
      );
    });
  });
});
