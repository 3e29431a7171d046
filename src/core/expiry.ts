/**
 * Lease Expiry Check
 *
 * Tells owners once that their VM's lease has ended. The time of the last
 * notice is stored on the record, so restarting the check does not repeat it.
 */

import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import type { NotificationSink } from '../notify/types.js';
import type { RecordStore } from '../state/store.js';
import type { VmRecord } from '../state/types.js';
import { errorMessage } from './errors.js';
import { expiredEvent } from './notifications.js';

export interface ExpiryCheckResult {
  /** VMs notified during this check */
  notified: string[];
  /** Expired VMs that were notified by an earlier check */
  alreadyNotified: string[];
  /** Expired VMs whose notification could not be delivered */
  failed: string[];
}

/**
 * Whether the lease has ended and no notice covers the current expiry.
 *
 * A notice given before the lease was extended does not count.
 */
export function needsExpiryNotice(record: VmRecord, now: Date): boolean {
  if (!record.expiresAt) return false;
  const expiresAt = Date.parse(record.expiresAt);
  if (Number.isNaN(expiresAt) || expiresAt > now.getTime()) return false;
  if (!record.expiryNotifiedAt) return true;
  return Date.parse(record.expiryNotifiedAt) < expiresAt;
}

/**
 * Notify the owners of every expired lease that has not been notified.
 *
 * Delivery failures leave the marker unset, so the next check retries.
 */
export async function checkExpirations(
  store: RecordStore,
  sink: NotificationSink,
  now: Date = new Date(),
  logger: Logger = defaultLogger
): Promise<ExpiryCheckResult> {
  const result: ExpiryCheckResult = { notified: [], alreadyNotified: [], failed: [] };

  for (const record of await store.list()) {
    if (!record.expiresAt) continue;
    if (!needsExpiryNotice(record, now)) {
      if (record.expiryNotifiedAt && Date.parse(record.expiresAt) <= now.getTime()) {
        result.alreadyNotified.push(record.id);
      }
      continue;
    }

    try {
      await sink.notify(expiredEvent(record, record.expiresAt));
    } catch (error) {
      logger.warning(`Expiry notice for ${record.id} not delivered: ${errorMessage(error)}`);
      result.failed.push(record.id);
      continue;
    }

    const notifiedAt = now.toISOString();
    await store.update(record.id, (stored) => {
      stored.expiryNotifiedAt = notifiedAt;
    });
    logger.info(`Lease of ${record.id} expired at ${record.expiresAt}; owner notified`);
    result.notified.push(record.id);
  }

  return result;
}
