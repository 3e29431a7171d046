/**
 * Recover Command Handler
 *
 * Resets VMs left `running` by a process that died mid-workflow. Only run
 * it when no vmlease process is working on this data directory.
 */

import { loadConfig } from '../../config/loader.js';
import { getRecordsPath } from '../../lib/paths.js';
import { RecordStore } from '../../state/store.js';
import { createOutput, handleError } from '../output.js';

export interface RecoverCommandOptions {
  json?: boolean;
}

export async function recoverCommand(
  file: string,
  options: RecoverCommandOptions
): Promise<void> {
  const output = createOutput('recover', options);

  try {
    const config = await loadConfig(file);
    const store = new RecordStore(getRecordsPath(config.dataDir));

    const reset = await store.recoverAbandoned();
    if (reset.length === 0) {
      output.info('No abandoned workflows.');
    } else {
      for (const id of reset) {
        output.warning(`Abandoned workflow reset: ${id}`);
      }
    }
    output.setData('recovered', reset);
    output.getResult().summary = { recovered: reset.length };

    output.flush();
    process.exit(0);

  } catch (error) {
    handleError(output, error);
  }
}
