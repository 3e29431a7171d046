/**
 * Best-Effort Results
 *
 * Side steps whose failure must not stop a workflow return a BestEffort
 * value instead of throwing, so the caller decides what to log.
 */

import { errorMessage } from './errors.js';

export type BestEffort<T> =
  | { ok: true; value: T }
  | { ok: false; diagnostic: string; error: unknown };

/**
 * Run a step and capture its failure as a diagnostic.
 */
export async function attempt<T>(step: () => Promise<T>): Promise<BestEffort<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    return { ok: false, diagnostic: errorMessage(error), error };
  }
}

/**
 * A step that was not attempted because its preconditions were not met.
 */
export function skipped(reason: string): BestEffort<never> {
  return { ok: false, diagnostic: reason, error: undefined };
}
