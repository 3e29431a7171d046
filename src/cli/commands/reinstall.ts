/**
 * Reinstall Command Handler
 *
 * Restores a VM to its baseline snapshot, or rebuilds it from the template
 * when the snapshot is gone. The workflow runs in this process; with
 * `--wait` the command follows its progress until it finishes.
 */

import { loadConfig } from '../../config/loader.js';
import { WorkflowError } from '../../core/errors.js';
import { assertPreflightPassed, runPreflightChecks } from '../../core/preflight.js';
import { sleep } from '../../core/retry.js';
import type { WorkflowResult } from '../../core/types.js';
import type { RecordStore } from '../../state/store.js';
import { createOutput, handleError, toVmInfo, type OutputFormatter } from '../output.js';
import { createRuntime } from '../runtime.js';

/**
 * Options for the reinstall command
 */
export interface ReinstallCommandOptions {
  json?: boolean;
  verbose?: boolean;
  wait?: boolean;
  preflight?: boolean;
}

/**
 * Interval between progress reads while waiting
 */
const POLL_INTERVAL_MS = 2000;

/**
 * Execute the reinstall command.
 *
 * This command:
 * 1. Loads and validates the YAML configuration
 * 2. Runs preflight checks (vmrun, template, storage)
 * 3. Takes the VM's workflow lease and schedules the workflow
 * 4. With --wait, prints progress until the VM is idle again
 *
 * @param file - Path to the configuration file
 * @param vmId - VM to reinstall
 * @param options - Command options
 */
export async function reinstallCommand(
  file: string,
  vmId: string,
  options: ReinstallCommandOptions
): Promise<void> {
  const output = createOutput('reinstall', options);

  try {
    const config = await loadConfig(file);
    const runtime = createRuntime(config, options);

    if (options.preflight !== false) {
      output.info('Running preflight checks...');
      assertPreflightPassed(await runPreflightChecks(runtime.control, config));
      output.success('Preflight checks passed');
    }

    const begin = await runtime.trigger.begin(vmId);
    if (!begin.accepted) {
      throw begin.reason === 'already-running'
        ? new WorkflowError(
            `A workflow is already running for VM '${vmId}'`,
            'WORKFLOW_ACTIVE',
            vmId,
            'Follow it with `vmlease status`, or run `vmlease recover` if its process died.'
          )
        : new WorkflowError(`VM '${vmId}' not found`, 'VM_NOT_FOUND', vmId, 'Register the VM first with `vmlease register`.');
    }
    output.success(`Reinstall of ${vmId} started`);

    if (!options.wait) {
      // The workflow keeps this process alive until it finishes
      output.flush();
      return;
    }

    const result = await followProgress(output, runtime.store, vmId, runtime.trigger.settled(vmId));
    const record = await runtime.store.require(vmId);
    output.setData('vm', toVmInfo(record));
    output.setData('log', runtime.logger.getEntries());

    if (!result || result.outcome === 'failure') {
      output.error(result?.message ?? record.task.message ?? 'Workflow failed');
    } else if (result.outcome === 'warning') {
      output.warning(result.message ?? 'Finished with warnings');
    } else {
      output.success(`Reinstall of ${vmId} complete`);
    }

    output.flush();
    process.exit(output.getExitCode());

  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Print progress changes until the run settles.
 */
async function followProgress(
  output: OutputFormatter,
  store: RecordStore,
  vmId: string,
  settled: Promise<WorkflowResult | undefined>
): Promise<WorkflowResult | undefined> {
  let done = false;
  const outcome = settled.finally(() => {
    done = true;
  });

  let last = '';
  while (!done) {
    const record = await store.require(vmId);
    const line = `[${record.task.progress}%] ${record.task.message ?? ''}`;
    if (record.task.phase === 'running' && line !== last) {
      output.info(line);
      last = line;
    }
    await Promise.race([outcome, sleep(POLL_INTERVAL_MS)]);
  }
  return outcome;
}
