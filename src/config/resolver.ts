/**
 * Configuration Resolver
 *
 * Applies defaults and expands paths to produce a fully resolved
 * configuration ready for execution.
 */

import { dirname, resolve } from 'node:path';

import { expandPath, getDefaultDataDir, parentDir } from '../lib/paths.js';
import type { OwnerNotificationConfig, ResolvedConfig, VmleaseConfig } from './types.js';

/**
 * Default values when not specified in config
 */
export const DEFAULTS = {
  vmrunPath: 'vmrun',
  hostType: 'ws',
  startMode: 'nogui' as const,
  cloneMode: 'linked' as const,
  gateway: '192.168.119.2',
  subnetMask: '255.255.255.0',
  dns: ['1.1.1.1', '1.0.0.1'],
  guestIpAttempts: 60,
  guestIpIntervalSeconds: 5,
  stopSettleSeconds: 5,
  guestScriptDir: 'C:\\Windows\\Temp',
};

function resolveOwners(
  owners: Record<string, OwnerNotificationConfig> | undefined
): ResolvedConfig['notifications']['owners'] {
  const resolved: ResolvedConfig['notifications']['owners'] = {};
  for (const [ownerId, owner] of Object.entries(owners ?? {})) {
    resolved[ownerId] = {
      publicWebhook: owner.public_webhook,
      privateWebhook: owner.private_webhook,
    };
  }
  return resolved;
}

/**
 * Resolve a configuration with all defaults applied and paths expanded.
 *
 * Storage defaults to the folder two levels above the template, matching
 * the usual `<storage>/<template>/<template>.vmx` layout.
 *
 * @param config - Validated configuration from YAML
 * @param configPath - Path to the configuration file
 * @returns Fully resolved configuration ready for execution
 */
export function resolveConfig(config: VmleaseConfig, configPath: string): ResolvedConfig {
  const absoluteConfigPath = resolve(configPath);
  const basePath = dirname(absoluteConfigPath);

  const templateVmx = expandPath(config.template.vmx_path, basePath);
  const storagePath = config.template.storage_path
    ? expandPath(config.template.storage_path, basePath)
    : parentDir(parentDir(templateVmx));

  const vmrunRaw = config.hypervisor?.vmrun_path;
  // A bare command name is looked up on PATH, not next to the config file
  const vmrunPath = vmrunRaw === undefined
    ? DEFAULTS.vmrunPath
    : /[\\/]/.test(vmrunRaw) ? expandPath(vmrunRaw, basePath) : vmrunRaw;

  const workflow = config.workflow ?? {};

  return {
    hypervisor: {
      vmrunPath,
      hostType: config.hypervisor?.host_type ?? DEFAULTS.hostType,
      startMode: config.hypervisor?.start_mode ?? DEFAULTS.startMode,
    },
    template: {
      vmxPath: templateVmx,
      snapshot: config.template.snapshot,
      cloneMode: config.template.clone_mode ?? DEFAULTS.cloneMode,
      storagePath,
    },
    baseline: {
      username: config.baseline.username,
      password: config.baseline.password,
    },
    network: {
      gateway: config.network?.gateway ?? DEFAULTS.gateway,
      subnetMask: config.network?.subnet_mask ?? DEFAULTS.subnetMask,
      dns: config.network?.dns ?? [...DEFAULTS.dns],
      reserveCommand: config.network?.reserve_command ?? null,
    },
    workflow: {
      guestIpAttempts: workflow.guest_ip_attempts ?? DEFAULTS.guestIpAttempts,
      guestIpIntervalMs: (workflow.guest_ip_interval_seconds ?? DEFAULTS.guestIpIntervalSeconds) * 1000,
      stopSettleMs: (workflow.stop_settle_seconds ?? DEFAULTS.stopSettleSeconds) * 1000,
      guestScriptDir: workflow.guest_script_dir ?? DEFAULTS.guestScriptDir,
    },
    notifications: {
      operatorWebhook: config.notifications?.operator_webhook,
      owners: resolveOwners(config.notifications?.owners),
    },
    dataDir: config.settings?.data_dir
      ? expandPath(config.settings.data_dir, basePath)
      : getDefaultDataDir(absoluteConfigPath),
    configPath: absoluteConfigPath,
  };
}
