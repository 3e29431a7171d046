/**
 * Core Types for vmlease
 *
 * Types for the reinstall workflow, its stages, and preflight checks.
 */

import type { TaskOutcome } from '../state/types.js';

/**
 * Stages of a reinstall run, in execution order
 */
export type WorkflowStage =
  | 'init'              // Learn the guest address while the VM still runs
  | 'stopping'          // Power off
  | 'restoring'         // Revert the baseline snapshot, or re-clone
  | 'networking'        // Push the host address reservation
  | 'booting'           // Power on
  | 'waiting_for_guest' // Poll for the guest address
  | 'bootstrapping'     // Reconfigure remote access inside the guest
  | 'finalizing';       // Release the lease and notify

/**
 * Progress checkpoints written on entry to each stage.
 *
 * Values are lower bounds; stages that report sub-steps move between
 * their entry value and the next stage's.
 */
export const STAGE_PROGRESS = {
  init: 5,
  stopping: 10,
  restoring: 20,
  restored: 40,
  networking: 45,
  booting: 50,
  waiting_for_guest: 60,
  guest_ready: 80,
  bootstrapping: 85,
  bootstrapped: 90,
  finalizing: 100,
} as const;

/**
 * Which path `restoring` took
 */
export type RestoreBranch = 'revert' | 'reclone';

/**
 * Outcome of one reinstall run, as recorded on the VM and reported to the sink
 */
export interface WorkflowResult {
  vmId: string;
  outcome: TaskOutcome;
  /** Warning or error text; null after a clean success */
  message: string | null;
  /** Restore path taken, when the run got that far */
  branch?: RestoreBranch;
  /** Guest address known at the end of the run */
  address?: string;
}

/**
 * Result of a preflight check
 */
export interface PreflightResult {
  /** Whether the check passed */
  passed: boolean;
  /** Error message if failed */
  message?: string;
  /** Suggested fix if failed */
  suggestion?: string;
}

/**
 * Aggregate result of all preflight checks
 */
export interface PreflightCheckResults {
  /** Whether all checks passed */
  allPassed: boolean;
  /** Individual check results */
  vmrunAvailable: PreflightResult;
  templateExists: PreflightResult;
  storageExists: PreflightResult;
}
