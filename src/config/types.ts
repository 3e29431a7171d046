/**
 * Configuration Types for vmlease
 *
 * These types represent the YAML configuration structure and the resolved
 * configuration with defaults applied.
 */

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from vmlease.yaml
 */
export interface VmleaseConfig {
  hypervisor?: HypervisorConfig;
  template: TemplateConfig;
  baseline: BaselineConfig;
  network?: NetworkConfig;
  workflow?: WorkflowConfig;
  notifications?: NotificationsConfig;
  settings?: SettingsConfig;
}

/**
 * How vmrun is invoked
 */
export interface HypervisorConfig {
  /** Path to vmrun. Default: vmrun on PATH */
  vmrun_path?: string;
  /** Host type passed with -T. Default: ws */
  host_type?: string;
  /** Window mode for started VMs. Default: nogui */
  start_mode?: 'gui' | 'nogui';
}

/**
 * Template VMs are re-cloned from when their baseline snapshot is gone
 */
export interface TemplateConfig {
  /** Path to the template .vmx */
  vmx_path: string;
  /** Baseline snapshot name, on the template and on every leased VM */
  snapshot: string;
  /** Clone strategy. Default: linked */
  clone_mode?: 'linked' | 'full';
  /** Directory holding leased VM folders */
  storage_path?: string;
}

/**
 * Account that exists on the baseline snapshot
 */
export interface BaselineConfig {
  username: string;
  password: string;
}

/**
 * Host network defaults
 */
export interface NetworkConfig {
  gateway?: string;
  /** Dotted mask, e.g. 255.255.255.0 */
  subnet_mask?: string;
  dns?: string[];
  /** Command run as `<command...> <vm-name> <mac> <ip>` to upsert a reservation */
  reserve_command?: string[];
}

/**
 * Timing of the reinstall workflow
 */
export interface WorkflowConfig {
  /** Guest IP polls before giving up. Default: 60 */
  guest_ip_attempts?: number;
  /** Seconds between guest IP polls. Default: 5 */
  guest_ip_interval_seconds?: number;
  /** Seconds to wait after a forced stop. Default: 5 */
  stop_settle_seconds?: number;
  /** Guest directory generated scripts are copied to. Default: C:\Windows\Temp */
  guest_script_dir?: string;
}

/**
 * Webhook destinations
 */
export interface NotificationsConfig {
  operator_webhook?: string;
  owners?: Record<string, OwnerNotificationConfig>;
}

export interface OwnerNotificationConfig {
  public_webhook?: string;
  private_webhook?: string;
}

/**
 * Optional global settings
 */
export interface SettingsConfig {
  /** Directory for records and staged scripts. Default: .vmlease beside the config */
  data_dir?: string;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Fully resolved configuration ready for execution
 */
export interface ResolvedConfig {
  hypervisor: {
    vmrunPath: string;
    hostType: string;
    startMode: 'gui' | 'nogui';
  };
  template: {
    vmxPath: string;
    snapshot: string;
    cloneMode: 'linked' | 'full';
    storagePath: string;
  };
  baseline: {
    username: string;
    password: string;
  };
  network: {
    gateway: string;
    subnetMask: string;
    dns: string[];
    reserveCommand: string[] | null;
  };
  workflow: {
    guestIpAttempts: number;
    guestIpIntervalMs: number;
    stopSettleMs: number;
    guestScriptDir: string;
  };
  notifications: {
    operatorWebhook?: string;
    owners: Record<string, { publicWebhook?: string; privateWebhook?: string }>;
  };
  /** Absolute path of the data directory */
  dataDir: string;
  /** Absolute path to the YAML config file */
  configPath: string;
}
