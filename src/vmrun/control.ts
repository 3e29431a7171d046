/**
 * vmrun VM Control
 *
 * Implements the VmControl capability on top of VMware's vmrun tool and the
 * VM's `.vmx` definition file.
 */

import { readFile, rename, writeFile } from 'node:fs/promises';

import { VmControlError, errorMessage } from '../core/errors.js';
import type { VmrunExecutor } from './executor.js';
import type {
  CloneParams,
  GuestCredentials,
  GuestExecOptions,
  RemoteDisplaySettings,
  VmControl,
  VmSpecs,
} from './types.js';
import {
  buildCloneArgs,
  buildCopyToGuestArgs,
  buildDeleteSnapshotArgs,
  buildDeleteVMArgs,
  buildGetGuestIPArgs,
  buildListArgs,
  buildListSnapshotsArgs,
  buildResetArgs,
  buildRevertSnapshotArgs,
  buildRunProgramArgs,
  buildSnapshotArgs,
  buildStartArgs,
  buildStopArgs,
  type StartMode,
} from './commands.js';
import { isIPv4Address, normalizeVmxPath, parseRunningList, parseSnapshotList } from './queries.js';
import { readVmxSpecs, remoteDisplayEntries, specsEntries, updateVmx } from './vmx.js';

/**
 * Options for constructing a VmrunControl
 */
export interface VmrunControlOptions {
  /** Window mode for started VMs (default: 'nogui') */
  startMode?: StartMode;
  /** Timeout for clone operations in milliseconds (default: 30 minutes) */
  cloneTimeout?: number;
  /** Timeout for guest program execution in milliseconds (default: 10 minutes) */
  guestExecTimeout?: number;
}

/**
 * VmControl backed by vmrun.
 */
export class VmrunControl implements VmControl {
  private readonly startMode: StartMode;
  private readonly cloneTimeout: number;
  private readonly guestExecTimeout: number;

  constructor(
    private readonly executor: VmrunExecutor,
    options: VmrunControlOptions = {}
  ) {
    this.startMode = options.startMode ?? 'nogui';
    this.cloneTimeout = options.cloneTimeout ?? 30 * 60 * 1000;
    this.guestExecTimeout = options.guestExecTimeout ?? 10 * 60 * 1000;
  }

  async listRunning(): Promise<string[]> {
    const output = await this.executor.execute(buildListArgs());
    return parseRunningList(output);
  }

  async isRunning(vmxPath: string): Promise<boolean> {
    const running = await this.listRunning();
    return running.includes(normalizeVmxPath(vmxPath));
  }

  async stop(vmxPath: string, forced: boolean): Promise<void> {
    await this.executor.executeVoid(buildStopArgs(vmxPath, forced));
  }

  async start(vmxPath: string): Promise<void> {
    await this.executor.executeVoid(buildStartArgs(vmxPath, this.startMode));
  }

  async reset(vmxPath: string, forced: boolean): Promise<void> {
    await this.executor.executeVoid(buildResetArgs(vmxPath, forced));
  }

  async listSnapshots(vmxPath: string): Promise<string[]> {
    const output = await this.executor.execute(buildListSnapshotsArgs(vmxPath));
    return parseSnapshotList(output);
  }

  async revertSnapshot(vmxPath: string, name: string): Promise<void> {
    await this.executor.executeVoid(buildRevertSnapshotArgs(vmxPath, name));
  }

  async createSnapshot(vmxPath: string, name: string): Promise<void> {
    await this.executor.executeVoid(buildSnapshotArgs(vmxPath, name));
  }

  async deleteSnapshot(vmxPath: string, name: string): Promise<void> {
    await this.executor.executeVoid(buildDeleteSnapshotArgs(vmxPath, name));
  }

  async delete(vmxPath: string): Promise<void> {
    await this.executor.executeVoid(buildDeleteVMArgs(vmxPath));
  }

  async clone(params: CloneParams): Promise<void> {
    await this.executor.executeVoid(buildCloneArgs(params), { timeout: this.cloneTimeout });
  }

  async readSpecs(vmxPath: string): Promise<VmSpecs> {
    const content = await this.readDefinition(vmxPath, 'readSpecs');
    try {
      return readVmxSpecs(content);
    } catch (error) {
      throw new VmControlError(`Invalid VM definition ${vmxPath}: ${errorMessage(error)}`, 'UNKNOWN', 'readSpecs');
    }
  }

  async applySpecs(vmxPath: string, cpuCount: number, memoryMb: number): Promise<void> {
    await this.editDefinition(vmxPath, 'applySpecs', specsEntries(cpuCount, memoryMb));
  }

  async guestIp(vmxPath: string, credentials?: GuestCredentials): Promise<string> {
    const output = await this.executor.execute(buildGetGuestIPArgs(vmxPath), { credentials });
    const address = output.split('\n')[0]?.trim() ?? '';
    if (!isIPv4Address(address)) {
      throw new VmControlError(
        `Guest did not report an IPv4 address (got '${address}')`,
        'NOT_READY',
        'getGuestIPAddress'
      );
    }
    return address;
  }

  async copyToGuest(
    vmxPath: string,
    hostPath: string,
    guestPath: string,
    credentials: GuestCredentials
  ): Promise<void> {
    await this.executor.executeVoid(buildCopyToGuestArgs(vmxPath, hostPath, guestPath), {
      credentials,
    });
  }

  async execInGuest(
    vmxPath: string,
    program: string,
    args: string[],
    credentials: GuestCredentials,
    options: GuestExecOptions = {}
  ): Promise<void> {
    await this.executor.executeVoid(buildRunProgramArgs(vmxPath, program, args, options), {
      credentials,
      timeout: this.guestExecTimeout,
    });
  }

  async setRemoteDisplay(vmxPath: string, settings: RemoteDisplaySettings): Promise<void> {
    await this.editDefinition(vmxPath, 'setRemoteDisplay', remoteDisplayEntries(settings));
  }

  private async readDefinition(vmxPath: string, operation: string): Promise<string> {
    try {
      return await readFile(vmxPath, 'utf-8');
    } catch (error) {
      throw new VmControlError(
        `Cannot read VM definition ${vmxPath}: ${errorMessage(error)}`,
        'UNKNOWN',
        operation
      );
    }
  }

  /**
   * Rewrite entries of a `.vmx` file through a temp file and rename.
   */
  private async editDefinition(
    vmxPath: string,
    operation: string,
    entries: Record<string, string>
  ): Promise<void> {
    const content = await this.readDefinition(vmxPath, operation);
    const tempPath = `${vmxPath}.tmp`;
    try {
      await writeFile(tempPath, updateVmx(content, entries), 'utf-8');
      await rename(tempPath, vmxPath);
    } catch (error) {
      throw new VmControlError(
        `Cannot update VM definition ${vmxPath}: ${errorMessage(error)}`,
        'UNKNOWN',
        operation
      );
    }
  }
}
