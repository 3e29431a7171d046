/**
 * Expiry Check Command Handler
 *
 * Notifies owners whose VM lease has ended. Meant to run on a schedule;
 * each expiry is announced once.
 */

import { loadConfig } from '../../config/loader.js';
import { checkExpirations } from '../../core/expiry.js';
import { createOutput, handleError } from '../output.js';
import { createRuntime } from '../runtime.js';

export interface ExpiryCheckCommandOptions {
  json?: boolean;
  verbose?: boolean;
}

export async function expiryCheckCommand(
  file: string,
  options: ExpiryCheckCommandOptions
): Promise<void> {
  const output = createOutput('expiry-check', options);

  try {
    const config = await loadConfig(file);
    const { store, sink, logger } = createRuntime(config, options);

    const result = await checkExpirations(store, sink, new Date(), logger);

    output.info(
      `${result.notified.length} notified, ${result.alreadyNotified.length} already notified, ${result.failed.length} failed`
    );
    output.setData('expiry', result);
    output.getResult().summary = {
      notified: result.notified.length,
      alreadyNotified: result.alreadyNotified.length,
      failed: result.failed.length,
    };
    if (result.failed.length > 0) {
      output.setSuccess(false);
    }

    output.flush();
    process.exit(output.getExitCode());

  } catch (error) {
    handleError(output, error);
  }
}
