/**
 * VM Record Types
 *
 * These types represent the persisted records of leased VMs, including the
 * task state a running workflow reports through.
 */

/**
 * Whether a workflow currently holds the VM
 */
export type TaskPhase = 'idle' | 'running';

/**
 * Result of the last completed workflow
 */
export type TaskOutcome = 'success' | 'warning' | 'failure';

/**
 * Task state embedded in a VM record.
 *
 * While `phase` is `running`, `progress` and `message` describe the current
 * step. Once idle, `progress` is 0 and `message` holds the warning or error of
 * the last run, or null after a clean success.
 */
export interface TaskState {
  phase: TaskPhase;
  /** 0-100, non-decreasing within one run */
  progress: number;
  message: string | null;
  outcome: TaskOutcome | null;
  /** ISO timestamp at which the current or last run took the lease */
  startedAt: string | null;
  /** ISO timestamp of the last task state write */
  updatedAt: string | null;
}

/**
 * Hardware address and reserved IP address of a VM
 */
export interface NetworkIdentity {
  /** MAC address of the VM's first adapter */
  hardwareAddress?: string;
  address: string;
}

/**
 * Endpoint tenants use to log in to their VM
 */
export interface RemoteAccessEndpoint {
  host: string;
  port: number;
  username: string;
}

/**
 * VNC console settings for the VM
 */
export interface RemoteDisplayConfig {
  enabled: boolean;
  port: number;
  password?: string;
}

/**
 * A leased VM
 */
export interface VmRecord {
  /** Stable identifier, never changes */
  id: string;
  /** Display name; also keys the VM's network reservation */
  name: string;
  /** Absolute path to the VM's .vmx definition */
  vmxPath: string;
  /** Template .vmx to re-clone from; the configured template when absent */
  templateOrigin?: string;
  /** Tenant leasing the VM */
  ownerId?: string;
  networkIdentity?: NetworkIdentity;
  /** Account used for guest operations */
  guestCredentials?: {
    username: string;
    password: string;
  };
  remoteAccess: RemoteAccessEndpoint;
  remoteDisplay?: RemoteDisplayConfig;
  /** ISO timestamp at which the lease ends */
  expiresAt?: string;
  /** ISO timestamp of the last expiry notification */
  expiryNotifiedAt?: string;
  /** ISO timestamp of record creation */
  createdAt: string;
  task: TaskState;
}

/**
 * Root structure persisted as records.json
 */
export interface RecordsFile {
  /** Schema version for migrations */
  version: 1;
  /** ISO timestamp of last modification */
  updatedAt: string;
  /** Records keyed by VM id */
  vms: Record<string, VmRecord>;
}

/**
 * Task state of a VM no workflow has touched.
 */
export function idleTask(): TaskState {
  return {
    phase: 'idle',
    progress: 0,
    message: null,
    outcome: null,
    startedAt: null,
    updatedAt: null,
  };
}
