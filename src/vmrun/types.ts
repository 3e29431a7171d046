/**
 * VM Control Types
 *
 * The capability the reinstall workflow needs from the hypervisor, plus the
 * value types passed across it. Every VM is addressed by its `.vmx` path.
 */

/**
 * Account used for guest operations (program execution, file copy, IP query)
 */
export interface GuestCredentials {
  username: string;
  password: string;
}

/**
 * Hardware settings read from a VM definition
 */
export interface VmSpecs {
  /** Virtual CPU count */
  cpuCount: number;
  /** Memory in MB */
  memoryMb: number;
  /** MAC address of the first network adapter, when one is assigned */
  hardwareAddress?: string;
}

/**
 * Clone strategy: linked clones share the template's disk at a snapshot
 */
export type CloneMode = 'full' | 'linked';

/**
 * Parameters for cloning a VM from a template
 */
export interface CloneParams {
  /** Template `.vmx` path */
  source: string;
  /** `.vmx` path of the new VM */
  destination: string;
  /** Display name of the new VM */
  name: string;
  mode: CloneMode;
  /** Template snapshot the clone is based on */
  baseSnapshot: string;
}

/**
 * Options for running a program inside the guest
 */
export interface GuestExecOptions {
  /** Run in the interactive user session (default: false) */
  interactive?: boolean;
  /** Return as soon as the program has started (default: false) */
  noWait?: boolean;
}

/**
 * VNC console settings stored in the VM definition
 */
export interface RemoteDisplaySettings {
  port: number;
  password?: string;
}

/**
 * Operations the orchestrator consumes from the hypervisor.
 *
 * Each call may reject with a VmControlError whose `kind` classifies the
 * failure; callers must not inspect the message text.
 */
export interface VmControl {
  isRunning(vmxPath: string): Promise<boolean>;
  stop(vmxPath: string, forced: boolean): Promise<void>;
  start(vmxPath: string): Promise<void>;
  reset(vmxPath: string, forced: boolean): Promise<void>;
  listSnapshots(vmxPath: string): Promise<string[]>;
  revertSnapshot(vmxPath: string, name: string): Promise<void>;
  createSnapshot(vmxPath: string, name: string): Promise<void>;
  deleteSnapshot(vmxPath: string, name: string): Promise<void>;
  /** Unregister the VM and remove its files known to the hypervisor */
  delete(vmxPath: string): Promise<void>;
  clone(params: CloneParams): Promise<void>;
  readSpecs(vmxPath: string): Promise<VmSpecs>;
  applySpecs(vmxPath: string, cpuCount: number, memoryMb: number): Promise<void>;
  /** Rejects with kind NOT_READY while the guest has no address */
  guestIp(vmxPath: string, credentials?: GuestCredentials): Promise<string>;
  copyToGuest(
    vmxPath: string,
    hostPath: string,
    guestPath: string,
    credentials: GuestCredentials
  ): Promise<void>;
  execInGuest(
    vmxPath: string,
    program: string,
    args: string[],
    credentials: GuestCredentials,
    options?: GuestExecOptions
  ): Promise<void>;
  setRemoteDisplay(vmxPath: string, settings: RemoteDisplaySettings): Promise<void>;
}
