/**
 * VM Record Store
 *
 * Persists VM records, and the task state workflows report through, in a
 * single JSON document. Uses atomic writes to prevent corruption.
 */

import { mkdir, open, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { StoreError, WorkflowError } from '../core/errors.js';
import type { RecordsFile, TaskOutcome, VmRecord } from './types.js';
import { idleTask } from './types.js';

/**
 * Result of trying to take the workflow lease for a VM
 */
export type AcquireResult =
  | { acquired: true; record: VmRecord }
  | { acquired: false; reason: 'already-running' | 'not-found' };

function isRecordsFile(value: unknown): value is RecordsFile {
  if (typeof value !== 'object' || value === null) return false;
  if (!('version' in value) || value.version !== 1) return false;
  if (!('vms' in value)) return false;
  return typeof value.vms === 'object' && value.vms !== null;
}

/**
 * How long to wait for another process to release the records file
 */
const LOCK_TIMEOUT_MS = 10000;

const LOCK_RETRY_MS = 25;

/**
 * A lock file older than this belongs to a process that died holding it
 */
const LOCK_STALE_MS = 30000;

function isErrnoError(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

const pause = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function clampProgress(progress: number): number {
  return Math.min(100, Math.max(0, Math.round(progress)));
}

/**
 * File-backed store of VM records.
 *
 * Every operation re-reads the file, so edits made by other tools between
 * operations are picked up. Operations issued through one store instance are
 * serialized, and each holds `<records>.lock` from its read to its write, so
 * stores in other processes (a `register` beside a running `reinstall`) never
 * write back a stale copy. The `idle → running` transition in
 * {@link tryAcquire} is the lease that keeps two workflows off the same VM.
 */
export class RecordStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly recordsPath: string) {}

  /**
   * Get the records file path.
   */
  getRecordsPath(): string {
    return this.recordsPath;
  }

  /**
   * Get a record by VM id.
   */
  async get(id: string): Promise<VmRecord | undefined> {
    return this.exclusive(async () => {
      const file = await this.load();
      return file.vms[id];
    });
  }

  /**
   * Get a record by VM id.
   *
   * @throws StoreError with code VM_NOT_FOUND if there is none
   */
  async require(id: string): Promise<VmRecord> {
    const record = await this.get(id);
    if (!record) {
      throw this.notFound(id);
    }
    return record;
  }

  /**
   * List all records, ordered by id.
   */
  async list(): Promise<VmRecord[]> {
    return this.exclusive(async () => {
      const file = await this.load();
      return Object.values(file.vms).sort((a, b) => a.id.localeCompare(b.id));
    });
  }

  /**
   * Insert or replace a record.
   *
   * The task state of an existing record is kept, so re-registering a VM
   * never clears a running workflow's lease.
   */
  async put(record: Omit<VmRecord, 'task' | 'createdAt'>): Promise<VmRecord> {
    return this.exclusive(async () => {
      const file = await this.load();
      const existing = file.vms[record.id];
      const stored: VmRecord = {
        ...record,
        createdAt: existing?.createdAt ?? new Date().toISOString(),
        task: existing?.task ?? idleTask(),
      };
      file.vms[record.id] = stored;
      await this.save(file);
      return stored;
    });
  }

  /**
   * Remove a record.
   *
   * @returns false if there was no record
   * @throws WorkflowError if a workflow is running on the VM
   */
  async remove(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const file = await this.load();
      const record = file.vms[id];
      if (!record) return false;
      if (record.task.phase !== 'idle') {
        throw new WorkflowError(
          `VM '${id}' has a running workflow and cannot be removed`,
          'WORKFLOW_ACTIVE',
          id,
          'Wait for the workflow to finish, or run `vmlease recover` if it was abandoned.'
        );
      }
      delete file.vms[id];
      await this.save(file);
      return true;
    });
  }

  /**
   * Apply a change to the identity fields of a record.
   *
   * Task state is owned by the lease methods and cannot be changed here.
   */
  async update(id: string, mutate: (record: VmRecord) => void): Promise<VmRecord> {
    return this.exclusive(async () => {
      const file = await this.load();
      const record = file.vms[id];
      if (!record) {
        throw this.notFound(id);
      }
      const task = record.task;
      mutate(record);
      record.task = task;
      await this.save(file);
      return record;
    });
  }

  /**
   * Take the workflow lease: move the VM from idle to running.
   *
   * Refuses when the VM is already running a workflow.
   */
  async tryAcquire(id: string, message: string): Promise<AcquireResult> {
    return this.exclusive(async () => {
      const file = await this.load();
      const record = file.vms[id];
      if (!record) {
        return { acquired: false, reason: 'not-found' };
      }
      if (record.task.phase !== 'idle') {
        return { acquired: false, reason: 'already-running' };
      }
      const now = new Date().toISOString();
      record.task = {
        phase: 'running',
        progress: 0,
        message,
        outcome: null,
        startedAt: now,
        updatedAt: now,
      };
      await this.save(file);
      return { acquired: true, record };
    });
  }

  /**
   * Report progress of the running workflow.
   *
   * Progress never moves backwards within a run: a lower value keeps the
   * stored one and only replaces the message.
   *
   * @throws WorkflowError if the VM is not running a workflow
   */
  async setProgress(id: string, progress: number, message: string): Promise<VmRecord> {
    return this.exclusive(async () => {
      const file = await this.load();
      const record = file.vms[id];
      if (!record) {
        throw this.notFound(id);
      }
      if (record.task.phase !== 'running') {
        throw new WorkflowError(
          `VM '${id}' has no running workflow to report progress for`,
          'LEASE_NOT_HELD',
          id
        );
      }
      record.task = {
        ...record.task,
        progress: Math.max(record.task.progress, clampProgress(progress)),
        message,
        updatedAt: new Date().toISOString(),
      };
      await this.save(file);
      return record;
    });
  }

  /**
   * Release the workflow lease and record the run's outcome.
   *
   * @param message - Warning or error text; ignored for a success
   */
  async release(id: string, outcome: TaskOutcome, message: string | null): Promise<VmRecord> {
    return this.exclusive(async () => {
      const file = await this.load();
      const record = file.vms[id];
      if (!record) {
        throw this.notFound(id);
      }
      record.task = {
        phase: 'idle',
        progress: 0,
        message: outcome === 'success' ? null : message,
        outcome,
        startedAt: record.task.startedAt,
        updatedAt: new Date().toISOString(),
      };
      await this.save(file);
      return record;
    });
  }

  /**
   * Force every record left running back to idle.
   *
   * Only call this when no workflow can be running, e.g. at process start:
   * a running phase then means the process that held the lease died.
   *
   * @returns ids of the records that were reset
   */
  async recoverAbandoned(): Promise<string[]> {
    return this.exclusive(async () => {
      const file = await this.load();
      const reset: string[] = [];
      const now = new Date().toISOString();
      for (const record of Object.values(file.vms)) {
        if (record.task.phase === 'idle') continue;
        record.task = {
          phase: 'idle',
          progress: 0,
          message: `Workflow abandoned at ${record.task.progress}%: ${record.task.message ?? 'no progress message'}`,
          outcome: 'failure',
          startedAt: record.task.startedAt,
          updatedAt: now,
        };
        reset.push(record.id);
      }
      if (reset.length > 0) {
        await this.save(file);
      }
      return reset;
    });
  }

  /**
   * Run an operation after every previously issued one has finished.
   */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const locked = (): Promise<T> => this.withFileLock(operation);
    const next = this.queue.then(locked, locked);
    this.queue = next.catch(() => undefined);
    return next;
  }

  /**
   * Hold the lock file beside the records file while `operation` runs.
   */
  private async withFileLock<T>(operation: () => Promise<T>): Promise<T> {
    const lockPath = `${this.recordsPath}.lock`;
    await mkdir(dirname(lockPath), { recursive: true });
    const deadline = Date.now() + LOCK_TIMEOUT_MS;

    for (;;) {
      try {
        const handle = await open(lockPath, 'wx');
        await handle.close();
        break;
      } catch (error) {
        if (!isErrnoError(error, 'EEXIST')) {
          throw error;
        }
      }
      if (await this.isStaleLock(lockPath)) {
        await rm(lockPath, { force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new StoreError(
          `Records file ${this.recordsPath} is locked by another process`,
          'STORE_LOCKED',
          `Retry shortly, or remove ${lockPath} if no vmlease process is running.`,
          this.recordsPath
        );
      }
      await pause(LOCK_RETRY_MS);
    }

    try {
      return await operation();
    } finally {
      await rm(lockPath, { force: true });
    }
  }

  private async isStaleLock(lockPath: string): Promise<boolean> {
    try {
      const info = await stat(lockPath);
      return Date.now() - info.mtimeMs > LOCK_STALE_MS;
    } catch (error) {
      // Released between our open and stat
      if (isErrnoError(error, 'ENOENT')) return false;
      throw error;
    }
  }

  protected async load(): Promise<RecordsFile> {
    let content: string;
    try {
      content = await readFile(this.recordsPath, 'utf-8');
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) {
        return { version: 1, updatedAt: new Date().toISOString(), vms: {} };
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw this.corrupted('is not valid JSON');
    }
    if (!isRecordsFile(parsed)) {
      throw this.corrupted('has an unsupported layout');
    }
    return parsed;
  }

  /**
   * Write to a temp file first, then rename over the records file.
   */
  private async save(file: RecordsFile): Promise<void> {
    file.updatedAt = new Date().toISOString();
    await mkdir(dirname(this.recordsPath), { recursive: true });
    const tempPath = `${this.recordsPath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(file, null, 2), 'utf-8');
    await rename(tempPath, this.recordsPath);
  }

  private notFound(id: string): StoreError {
    return new StoreError(
      `VM '${id}' not found`,
      'VM_NOT_FOUND',
      'Register the VM first with `vmlease register`.',
      this.recordsPath
    );
  }

  private corrupted(reason: string): StoreError {
    return new StoreError(
      `Records file ${this.recordsPath} ${reason}`,
      'STORE_CORRUPTED',
      'Restore the file from a backup or remove it to start over.',
      this.recordsPath
    );
  }
}
