/**
 * Preflight Checks for vmlease
 *
 * Validates host requirements before a workflow is started:
 * - vmrun can be run
 * - Template .vmx exists
 * - Storage directory exists
 */

import { access, stat } from 'node:fs/promises';

import type { ResolvedConfig } from '../config/types.js';
import { PreflightError, errorMessage } from './errors.js';
import type { PreflightCheckResults, PreflightResult } from './types.js';

/**
 * The part of the VM control the checks need
 */
export interface RunningVmLister {
  listRunning(): Promise<string[]>;
}

/**
 * Run all preflight checks before an operation.
 *
 * @param control - Lists running VMs, proving vmrun works
 * @param config - Resolved configuration
 * @returns Aggregate preflight check results
 */
export async function runPreflightChecks(
  control: RunningVmLister,
  config: ResolvedConfig
): Promise<PreflightCheckResults> {
  const [vmrunResult, templateResult, storageResult] = await Promise.all([
    checkVmrunAvailable(control, config.hypervisor.vmrunPath),
    checkTemplateExists(config.template.vmxPath),
    checkStorageExists(config.template.storagePath),
  ]);

  return {
    allPassed: vmrunResult.passed && templateResult.passed && storageResult.passed,
    vmrunAvailable: vmrunResult,
    templateExists: templateResult,
    storageExists: storageResult,
  };
}

/**
 * Check that vmrun answers a `list` command.
 */
export async function checkVmrunAvailable(
  control: RunningVmLister,
  vmrunPath: string
): Promise<PreflightResult> {
  try {
    await control.listRunning();
    return { passed: true };
  } catch (error) {
    return {
      passed: false,
      message: errorMessage(error),
      suggestion: `Install VMware Workstation or set hypervisor.vmrun_path (currently '${vmrunPath}').`,
    };
  }
}

/**
 * Check that the template definition can be read.
 */
export async function checkTemplateExists(vmxPath: string): Promise<PreflightResult> {
  try {
    await access(vmxPath);
    return { passed: true };
  } catch {
    return {
      passed: false,
      message: `Template not found: ${vmxPath}`,
      suggestion: 'Point template.vmx_path at the .vmx file of the template VM.',
    };
  }
}

/**
 * Check that the directory holding VM folders exists.
 */
export async function checkStorageExists(storagePath: string): Promise<PreflightResult> {
  try {
    const info = await stat(storagePath);
    if (info.isDirectory()) {
      return { passed: true };
    }
    return {
      passed: false,
      message: `Storage path is not a directory: ${storagePath}`,
      suggestion: 'Set template.storage_path to the folder that holds the VM folders.',
    };
  } catch {
    return {
      passed: false,
      message: `Storage directory not found: ${storagePath}`,
      suggestion: 'Create the folder or set template.storage_path.',
    };
  }
}

/**
 * Throw a PreflightError if checks failed.
 *
 * @param results - Preflight check results
 * @throws PreflightError for the first failing check
 */
export function assertPreflightPassed(results: PreflightCheckResults): void {
  if (results.allPassed) {
    return;
  }

  const checks: Array<[string, PreflightResult]> = [
    ['vmrun', results.vmrunAvailable],
    ['template', results.templateExists],
    ['storage', results.storageExists],
  ];
  for (const [check, result] of checks) {
    if (!result.passed) {
      throw new PreflightError(result.message ?? `Preflight check '${check}' failed`, result.suggestion, { check });
    }
  }
}
