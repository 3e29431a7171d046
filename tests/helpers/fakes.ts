/**
 * In-process stand-ins for the hypervisor, host network, webhooks and
 * record store used by the workflow tests.
 */

import { mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import { VmControlError } from '../../src/core/errors.js';
import { ReinstallOrchestrator, type WorkflowConfig } from '../../src/core/orchestrator.js';
import { Logger } from '../../src/lib/logger.js';
import { getRecordsPath } from '../../src/lib/paths.js';
import type { NetworkIdentityService } from '../../src/network/reservation.js';
import type { NotificationEvent, NotificationSink } from '../../src/notify/types.js';
import { RecordStore } from '../../src/state/store.js';
import type { VmRecord } from '../../src/state/types.js';
import type {
  CloneParams,
  GuestCredentials,
  GuestExecOptions,
  RemoteDisplaySettings,
  VmControl,
  VmSpecs,
} from '../../src/vmrun/types.js';

/**
 * A VM operation as seen by the fake, e.g. `revertSnapshot Base-v2`.
 */
export type ControlCall = string;

type Operation = keyof VmControl;

export interface FakeVmControlOptions {
  running?: boolean;
  snapshots?: string[];
  specs?: VmSpecs;
  /** Specs reported once the VM has been re-cloned */
  clonedSpecs?: VmSpecs;
  /**
   * Answers to successive guestIp calls. An Error is thrown, a string is
   * returned. Once used up, every call fails with NOT_READY.
   */
  guestIps?: Array<string | Error>;
  /** Operations that reject with the given error */
  failures?: Partial<Record<Operation, Error>>;
}

/**
 * Scriptable VmControl that records every call in order.
 */
export class FakeVmControl implements VmControl {
  readonly calls: ControlCall[] = [];
  readonly credentialsUsed: GuestCredentials[] = [];
  running: boolean;
  snapshots: string[];
  private specs: VmSpecs;
  private readonly clonedSpecs: VmSpecs | undefined;
  private readonly guestIps: Array<string | Error>;
  private readonly failures: Partial<Record<Operation, Error>>;

  constructor(options: FakeVmControlOptions = {}) {
    this.running = options.running ?? true;
    this.snapshots = options.snapshots ?? ['Base-v2'];
    this.specs = options.specs ?? { cpuCount: 2, memoryMb: 4096, hardwareAddress: '00:0c:29:aa:bb:cc' };
    this.clonedSpecs = options.clonedSpecs;
    this.guestIps = [...(options.guestIps ?? ['192.168.119.50'])];
    this.failures = options.failures ?? {};
  }

  /** Calls of one operation, without arguments */
  count(operation: Operation): number {
    return this.calls.filter((call) => call.split(' ')[0] === operation).length;
  }

  private record(operation: Operation, ...args: Array<string | number | boolean>): void {
    this.calls.push([operation, ...args.map(String)].join(' '));
    const failure = this.failures[operation];
    if (failure) {
      throw failure;
    }
  }

  async isRunning(_vmxPath: string): Promise<boolean> {
    this.record('isRunning');
    return this.running;
  }

  async stop(_vmxPath: string, forced: boolean): Promise<void> {
    this.record('stop', forced ? 'hard' : 'soft');
    this.running = false;
  }

  async start(_vmxPath: string): Promise<void> {
    this.record('start');
    this.running = true;
  }

  async reset(_vmxPath: string, forced: boolean): Promise<void> {
    this.record('reset', forced ? 'hard' : 'soft');
  }

  async listSnapshots(_vmxPath: string): Promise<string[]> {
    this.record('listSnapshots');
    return [...this.snapshots];
  }

  async revertSnapshot(_vmxPath: string, name: string): Promise<void> {
    this.record('revertSnapshot', name);
  }

  async createSnapshot(_vmxPath: string, name: string): Promise<void> {
    this.record('createSnapshot', name);
    this.snapshots.push(name);
  }

  async deleteSnapshot(_vmxPath: string, name: string): Promise<void> {
    this.record('deleteSnapshot', name);
    this.snapshots = this.snapshots.filter((snapshot) => snapshot !== name);
  }

  async delete(_vmxPath: string): Promise<void> {
    this.record('delete');
    this.snapshots = [];
  }

  async clone(params: CloneParams): Promise<void> {
    this.record('clone', params.mode, params.baseSnapshot);
    if (this.clonedSpecs) {
      this.specs = this.clonedSpecs;
    }
  }

  async readSpecs(_vmxPath: string): Promise<VmSpecs> {
    this.record('readSpecs');
    return { ...this.specs };
  }

  async applySpecs(_vmxPath: string, cpuCount: number, memoryMb: number): Promise<void> {
    this.record('applySpecs', cpuCount, memoryMb);
    this.specs = { ...this.specs, cpuCount, memoryMb };
  }

  async guestIp(_vmxPath: string, _credentials?: GuestCredentials): Promise<string> {
    this.record('guestIp');
    const next = this.guestIps.shift();
    if (next === undefined) {
      throw new VmControlError('Guest did not report an IPv4 address (got \'unknown\')', 'NOT_READY', 'getGuestIPAddress');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async copyToGuest(
    _vmxPath: string,
    _hostPath: string,
    guestPath: string,
    credentials: GuestCredentials
  ): Promise<void> {
    this.record('copyToGuest', guestPath);
    this.credentialsUsed.push(credentials);
  }

  async execInGuest(
    _vmxPath: string,
    program: string,
    args: string[],
    credentials: GuestCredentials,
    _options?: GuestExecOptions
  ): Promise<void> {
    this.record('execInGuest', args[args.length - 1] ?? program);
    this.credentialsUsed.push(credentials);
  }

  async setRemoteDisplay(_vmxPath: string, settings: RemoteDisplaySettings): Promise<void> {
    this.record('setRemoteDisplay', settings.port);
  }
}

/**
 * NotificationSink that keeps every event; optionally fails delivery.
 */
export class RecordingSink implements NotificationSink {
  readonly events: NotificationEvent[] = [];

  constructor(private readonly failure?: Error) {}

  async notify(event: NotificationEvent): Promise<void> {
    this.events.push(event);
    if (this.failure) {
      throw this.failure;
    }
  }

  outcomes(): string[] {
    return this.events.map((event) => event.outcome);
  }
}

/**
 * Reservation service that records upserts.
 */
export class RecordingReservation implements NetworkIdentityService {
  readonly reservations: Array<{ vmName: string; hardwareAddress: string; address: string }> = [];

  constructor(private readonly failure?: Error) {}

  async reserve(vmName: string, hardwareAddress: string, address: string): Promise<void> {
    this.reservations.push({ vmName, hardwareAddress, address });
    if (this.failure) {
      throw this.failure;
    }
  }
}

/**
 * RecordStore that remembers every progress value it accepted.
 */
export class ProgressRecordingStore extends RecordStore {
  readonly progress: Array<{ progress: number; message: string }> = [];

  override async setProgress(id: string, progress: number, message: string): Promise<VmRecord> {
    const record = await super.setProgress(id, progress, message);
    this.progress.push({ progress: record.task.progress, message });
    return record;
  }
}

/**
 * Store whose next read or write of a record fails once.
 */
export class FlakyRecordStore extends ProgressRecordingStore {
  failNextRequire: Error | undefined;
  failNextUpdate: Error | undefined;

  override async require(id: string): Promise<VmRecord> {
    const failure = this.failNextRequire;
    if (failure) {
      this.failNextRequire = undefined;
      throw failure;
    }
    return super.require(id);
  }

  override async update(id: string, mutate: (record: VmRecord) => void): Promise<VmRecord> {
    const failure = this.failNextUpdate;
    if (failure) {
      this.failNextUpdate = undefined;
      throw failure;
    }
    return super.update(id, mutate);
  }
}

/**
 * Sleep that returns at once and remembers the requested pauses.
 */
export function instantSleep(): { sleep: (ms: number) => Promise<void>; pauses: number[] } {
  const pauses: number[] = [];
  return {
    pauses,
    sleep: async (ms: number) => {
      pauses.push(ms);
    },
  };
}

export function silentLogger(): Logger {
  return new Logger({ mode: 'silent', verbose: true });
}

export function testWorkflowConfig(storagePath = 'C:\\VMs'): WorkflowConfig {
  return {
    template: {
      vmxPath: 'C:\\VMs\\Templates\\win11\\win11.vmx',
      snapshot: 'Base-v2',
      cloneMode: 'linked',
      storagePath,
    },
    baseline: { username: 'Administrator', password: 'test-secret' },
    network: {
      gateway: '192.168.119.2',
      subnetMask: '255.255.255.0',
      dns: ['1.1.1.1', '1.0.0.1'],
      reserveCommand: null,
    },
    workflow: {
      guestIpAttempts: 60,
      guestIpIntervalMs: 5000,
      stopSettleMs: 5000,
      guestScriptDir: 'C:\\Windows\\Temp',
    },
  };
}

export function testRecord(overrides: Partial<Omit<VmRecord, 'task' | 'createdAt'>> = {}): Omit<VmRecord, 'task' | 'createdAt'> {
  return {
    id: 'vm-7',
    name: 'lab-vm-7',
    vmxPath: 'C:\\VMs\\lab-vm-7\\lab-vm-7.vmx',
    remoteAccess: { host: 'lab.example.test', port: 50007, username: 'Administrator' },
    ...overrides,
  };
}

/**
 * Temporary data directory that is removed after the test.
 */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = join(tmpdir(), `vmlease-test-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export function storeIn(dir: string): ProgressRecordingStore {
  return new ProgressRecordingStore(getRecordsPath(dir));
}

export interface HarnessOptions {
  /** Store to register the VM in; a fresh one under `dir` when omitted */
  store?: ProgressRecordingStore;
  control?: FakeVmControlOptions;
  record?: Partial<Omit<VmRecord, 'task' | 'createdAt'>>;
  sink?: RecordingSink;
  /** Reservation service; none when omitted */
  reservation?: RecordingReservation;
  config?: WorkflowConfig;
}

/**
 * An orchestrator wired to fakes, with one registered VM.
 */
export interface Harness {
  store: ProgressRecordingStore;
  control: FakeVmControl;
  sink: RecordingSink;
  reservation: RecordingReservation | undefined;
  orchestrator: ReinstallOrchestrator;
  pauses: number[];
  removedDirectories: string[];
  scriptsDir: string;
  vmId: string;
}

export async function createHarness(dir: string, options: HarnessOptions = {}): Promise<Harness> {
  const store = options.store ?? storeIn(dir);
  const record = testRecord(options.record);
  await store.put(record);

  const control = new FakeVmControl(options.control);
  const sink = options.sink ?? new RecordingSink();
  const { sleep, pauses } = instantSleep();
  const removedDirectories: string[] = [];
  const scriptsDir = join(dir, 'scripts');

  const orchestrator = new ReinstallOrchestrator({
    store,
    control,
    ...(options.reservation ? { network: options.reservation } : {}),
    sink,
    config: options.config ?? testWorkflowConfig(),
    scriptsDir,
    logger: silentLogger(),
    sleep,
    removeDirectory: async (path) => {
      removedDirectories.push(path);
    },
  });

  return {
    store,
    control,
    sink,
    reservation: options.reservation,
    orchestrator,
    pauses,
    removedDirectories,
    scriptsDir,
    vmId: record.id,
  };
}
