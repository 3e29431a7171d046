/**
 * Error Types for vmlease
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all vmlease errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_ARGUMENT'
  | 'VM_NOT_FOUND'
  | 'STORE_CORRUPTED'
  | 'STORE_LOCKED'
  | 'WORKFLOW_ACTIVE'
  | 'LEASE_NOT_HELD'
  | 'PREFLIGHT_FAILED'
  | 'OPERATION_FAILED'
  | 'RESERVATION_FAILED'
  | 'NOTIFICATION_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_ARGUMENT: 1,
  VM_NOT_FOUND: 1,
  STORE_CORRUPTED: 2,
  STORE_LOCKED: 2,
  WORKFLOW_ACTIVE: 1,
  LEASE_NOT_HELD: 2,
  PREFLIGHT_FAILED: 2,
  OPERATION_FAILED: 2,
  RESERVATION_FAILED: 2,
  NOTIFICATION_FAILED: 2,
};

/**
 * Base error class for all vmlease errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class VmleaseError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'VmleaseError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, VmleaseError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends VmleaseError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for VM record store issues.
 */
export class StoreError extends VmleaseError {
  constructor(
    message: string,
    code: 'STORE_CORRUPTED' | 'STORE_LOCKED' | 'VM_NOT_FOUND',
    suggestion?: string,
    public readonly storePath?: string
  ) {
    super(message, code, suggestion);
    this.name = 'StoreError';
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

/**
 * Error raised when a workflow cannot be started for a VM.
 */
export class WorkflowError extends VmleaseError {
  constructor(
    message: string,
    code: 'WORKFLOW_ACTIVE' | 'LEASE_NOT_HELD' | 'VM_NOT_FOUND',
    public readonly vmId: string,
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'WorkflowError';
    Object.setPrototypeOf(this, WorkflowError.prototype);
  }
}

/**
 * Error for preflight check failures.
 */
export class PreflightError extends VmleaseError {
  constructor(
    message: string,
    suggestion?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message, 'PREFLIGHT_FAILED', suggestion);
    this.name = 'PreflightError';
    Object.setPrototypeOf(this, PreflightError.prototype);
  }
}

/**
 * Failure classes reported by the VM control capability.
 *
 * - AUTH_REJECTED: guest credentials were refused by the guest
 * - NOT_READY: guest tools are not running yet (no IP, no guest operations)
 * - UNAVAILABLE: the hypervisor tool itself could not be run
 * - UNKNOWN: anything else
 */
export type VmControlErrorKind = 'AUTH_REJECTED' | 'NOT_READY' | 'UNAVAILABLE' | 'UNKNOWN';

/**
 * OperationFailed: the single failure type of every VM control call.
 */
export class VmControlError extends VmleaseError {
  constructor(
    message: string,
    public readonly kind: VmControlErrorKind,
    public readonly operation: string
  ) {
    super(message, 'OPERATION_FAILED', suggestionForKind(kind));
    this.name = 'VmControlError';
    Object.setPrototypeOf(this, VmControlError.prototype);
  }
}

/**
 * ReservationFailed: the network identity service could not upsert or
 * activate a reservation.
 */
export class ReservationError extends VmleaseError {
  constructor(
    message: string,
    public readonly vmName: string,
    public override readonly cause?: Error
  ) {
    super(message, 'RESERVATION_FAILED');
    this.name = 'ReservationError';
    Object.setPrototypeOf(this, ReservationError.prototype);
  }
}

/**
 * Error raised by a notification sink when delivery fails.
 */
export class NotificationError extends VmleaseError {
  constructor(
    message: string,
    public readonly destination: string
  ) {
    super(message, 'NOTIFICATION_FAILED');
    this.name = 'NotificationError';
    Object.setPrototypeOf(this, NotificationError.prototype);
  }
}

/**
 * User-facing hint for a VM control failure kind.
 */
export function suggestionForKind(kind: VmControlErrorKind): string | undefined {
  switch (kind) {
    case 'AUTH_REJECTED':
      return 'Guest credentials were rejected. Verify the guest username and password.';
    case 'NOT_READY':
      return 'VMware Tools are not running in the guest yet. Wait for the guest to finish booting.';
    case 'UNAVAILABLE':
      return 'Check that vmrun is installed and hypervisor.vmrun_path points to it.';
    case 'UNKNOWN':
      return undefined;
  }
}

/**
 * Check if an error is a VmleaseError.
 */
export function isVmleaseError(error: unknown): error is VmleaseError {
  return error instanceof VmleaseError;
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isVmleaseError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
