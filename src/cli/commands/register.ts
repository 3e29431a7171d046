/**
 * Register Command Handler
 *
 * Adds a VM to the record store, or updates the identity fields of one
 * already registered. A running workflow's task state is never touched.
 */

import { resolve } from 'node:path';

import { loadConfig } from '../../config/loader.js';
import { VmleaseError } from '../../core/errors.js';
import { getRecordsPath } from '../../lib/paths.js';
import { isIPv4Address } from '../../vmrun/queries.js';
import { RecordStore } from '../../state/store.js';
import type { VmRecord } from '../../state/types.js';
import { createOutput, handleError, toVmInfo } from '../output.js';

/**
 * Options for the register command
 */
export interface RegisterCommandOptions {
  json?: boolean;
  id: string;
  name?: string;
  vmx?: string;
  owner?: string;
  template?: string;
  remoteHost?: string;
  remotePort?: string;
  remoteUser?: string;
  address?: string;
  mac?: string;
  vncPort?: string;
  vncPassword?: string;
  expiresAt?: string;
}

function invalid(message: string): VmleaseError {
  return new VmleaseError(message, 'INVALID_ARGUMENT', 'Run `vmlease register --help` for the expected values.');
}

/**
 * Parse a TCP port argument.
 */
export function parsePort(value: string, option: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw invalid(`${option} must be a port number between 1 and 65535, got '${value}'`);
  }
  return port;
}

/**
 * Build the record to store from options and the existing record, if any.
 *
 * Options that are not given keep the existing value.
 */
export function buildRecord(
  options: RegisterCommandOptions,
  existing: VmRecord | undefined,
  defaults: { username: string }
): Omit<VmRecord, 'task' | 'createdAt'> {
  const name = options.name ?? existing?.name;
  const vmxPath = options.vmx !== undefined ? resolve(options.vmx) : existing?.vmxPath;
  const host = options.remoteHost ?? existing?.remoteAccess.host;
  if (!name) throw invalid('--name is required for a new VM');
  if (!vmxPath) throw invalid('--vmx is required for a new VM');
  if (!host) throw invalid('--remote-host is required for a new VM');

  const record: Omit<VmRecord, 'task' | 'createdAt'> = {
    id: options.id,
    name,
    vmxPath,
    remoteAccess: {
      host,
      port: options.remotePort !== undefined
        ? parsePort(options.remotePort, '--remote-port')
        : existing?.remoteAccess.port ?? 3389,
      username: options.remoteUser ?? existing?.remoteAccess.username ?? defaults.username,
    },
  };

  const templateOrigin = options.template !== undefined ? resolve(options.template) : existing?.templateOrigin;
  if (templateOrigin) record.templateOrigin = templateOrigin;

  const ownerId = options.owner ?? existing?.ownerId;
  if (ownerId) record.ownerId = ownerId;

  if (existing?.guestCredentials) record.guestCredentials = existing.guestCredentials;

  if (options.address !== undefined) {
    if (!isIPv4Address(options.address)) {
      throw invalid(`--address must be an IPv4 address, got '${options.address}'`);
    }
    const mac = options.mac?.toLowerCase() ?? existing?.networkIdentity?.hardwareAddress;
    record.networkIdentity = mac ? { address: options.address, hardwareAddress: mac } : { address: options.address };
  } else if (existing?.networkIdentity) {
    record.networkIdentity = options.mac
      ? { ...existing.networkIdentity, hardwareAddress: options.mac.toLowerCase() }
      : existing.networkIdentity;
  }

  if (options.vncPort !== undefined) {
    record.remoteDisplay = {
      enabled: true,
      port: parsePort(options.vncPort, '--vnc-port'),
      ...(options.vncPassword !== undefined ? { password: options.vncPassword } : {}),
    };
  } else if (existing?.remoteDisplay) {
    record.remoteDisplay = existing.remoteDisplay;
  }

  if (options.expiresAt !== undefined) {
    const expires = new Date(options.expiresAt);
    if (Number.isNaN(expires.getTime())) {
      throw invalid(`--expires-at must be a date, got '${options.expiresAt}'`);
    }
    record.expiresAt = expires.toISOString();
  } else if (existing?.expiresAt) {
    record.expiresAt = existing.expiresAt;
    if (existing.expiryNotifiedAt) record.expiryNotifiedAt = existing.expiryNotifiedAt;
  }

  return record;
}

/**
 * Execute the register command.
 *
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function registerCommand(
  file: string,
  options: RegisterCommandOptions
): Promise<void> {
  const output = createOutput('register', options);

  try {
    const config = await loadConfig(file);
    const store = new RecordStore(getRecordsPath(config.dataDir));

    const existing = await store.get(options.id);
    const stored = await store.put(buildRecord(options, existing, { username: config.baseline.username }));

    output.success(`${existing ? 'Updated' : 'Registered'} VM ${stored.id} (${stored.name})`);
    output.setData('vm', toVmInfo(stored));

    output.flush();
    process.exit(0);

  } catch (error) {
    handleError(output, error);
  }
}
