/**
 * vmrun Command Builders
 *
 * Builds argument vectors for `vmrun` commands. Host type and guest
 * credentials are prepended by the executor.
 */

import type { CloneParams, GuestExecOptions } from './types.js';

/**
 * Window mode passed to `vmrun start`
 */
export type StartMode = 'gui' | 'nogui';

/**
 * Build args to list running VMs.
 *
 * Output: "Total running VMs: N" followed by one `.vmx` path per line.
 */
export function buildListArgs(): string[] {
  return ['list'];
}

/**
 * Build args to start a VM.
 *
 * @param vmxPath - VM definition path
 * @param mode - `gui` opens a console window on the host, `nogui` runs headless
 */
export function buildStartArgs(vmxPath: string, mode: StartMode = 'nogui'): string[] {
  return ['start', vmxPath, mode];
}

/**
 * Build args to stop a VM.
 *
 * @param vmxPath - VM definition path
 * @param forced - `hard` powers off immediately, `soft` asks the guest to shut down
 */
export function buildStopArgs(vmxPath: string, forced: boolean): string[] {
  return ['stop', vmxPath, forced ? 'hard' : 'soft'];
}

/**
 * Build args to reset (power-cycle) a VM.
 */
export function buildResetArgs(vmxPath: string, forced: boolean): string[] {
  return ['reset', vmxPath, forced ? 'hard' : 'soft'];
}

/**
 * Build args to list snapshots.
 *
 * Output: "Total snapshots: N" followed by one name per line.
 */
export function buildListSnapshotsArgs(vmxPath: string): string[] {
  return ['listSnapshots', vmxPath];
}

export function buildSnapshotArgs(vmxPath: string, name: string): string[] {
  return ['snapshot', vmxPath, name];
}

export function buildRevertSnapshotArgs(vmxPath: string, name: string): string[] {
  return ['revertToSnapshot', vmxPath, name];
}

export function buildDeleteSnapshotArgs(vmxPath: string, name: string): string[] {
  return ['deleteSnapshot', vmxPath, name];
}

/**
 * Build args to unregister a VM and delete its files.
 */
export function buildDeleteVMArgs(vmxPath: string): string[] {
  return ['deleteVM', vmxPath];
}

/**
 * Build args to clone a VM from a template snapshot.
 */
export function buildCloneArgs(params: CloneParams): string[] {
  return [
    'clone',
    params.source,
    params.destination,
    params.mode,
    `-snapshot=${params.baseSnapshot}`,
    `-cloneName=${params.name}`,
  ];
}

/**
 * Build args to query the guest's IP address.
 *
 * Without `wait` the call returns immediately, failing when guest tools
 * have not reported an address yet.
 */
export function buildGetGuestIPArgs(vmxPath: string, wait: boolean = false): string[] {
  const args = ['getGuestIPAddress', vmxPath];
  if (wait) args.push('-wait');
  return args;
}

export function buildCopyToGuestArgs(vmxPath: string, hostPath: string, guestPath: string): string[] {
  return ['CopyFileFromHostToGuest', vmxPath, hostPath, guestPath];
}

/**
 * Build args to run a program inside the guest.
 *
 * Flags must precede the program path.
 */
export function buildRunProgramArgs(
  vmxPath: string,
  program: string,
  programArgs: string[],
  options: GuestExecOptions = {}
): string[] {
  const args = ['runProgramInGuest', vmxPath];
  if (options.noWait) args.push('-noWait');
  if (options.interactive) args.push('-activeWindow', '-interactive');
  args.push(program, ...programArgs);
  return args;
}
