/**
 * Status Command Handler
 *
 * Shows the task state of registered VMs. This is the polling surface for
 * a running reinstall and makes no changes.
 */

import { loadConfig } from '../../config/loader.js';
import { RecordStore } from '../../state/store.js';
import { getRecordsPath } from '../../lib/paths.js';
import { createOutput, handleError } from '../output.js';

/**
 * Options for the status command
 */
export interface StatusCommandOptions {
  json?: boolean;
}

/**
 * Execute the status command.
 *
 * @param file - Path to the configuration file
 * @param vmId - Show only this VM
 * @param options - Command options
 */
export async function statusCommand(
  file: string,
  vmId: string | undefined,
  options: StatusCommandOptions
): Promise<void> {
  const output = createOutput('status', options);

  try {
    const config = await loadConfig(file);
    const store = new RecordStore(getRecordsPath(config.dataDir));

    const records = vmId !== undefined ? [await store.require(vmId)] : await store.list();
    output.statusTable(records);

    output.flush();
    process.exit(0);

  } catch (error) {
    handleError(output, error);
  }
}
