/**
 * Workflow Notifications
 *
 * Builds the status events a reinstall run emits and decides their audience.
 */

import type {
  NotificationAudience,
  NotificationEvent,
  NotificationField,
  NotificationOutcome,
} from '../notify/types.js';
import type { VmRecord } from '../state/types.js';
import type { GuestCredentials } from '../vmrun/types.js';

/**
 * Decide who may see an event.
 *
 * Lifecycle news is public. Errors, warnings and anything carrying
 * credentials stay private.
 */
export function audienceFor(outcome: NotificationOutcome, sensitive: boolean): NotificationAudience {
  if (sensitive) return 'private';
  return outcome === 'started' || outcome === 'success' ? 'public' : 'private';
}

function event(
  record: VmRecord,
  outcome: NotificationOutcome,
  subject: string,
  summary: string,
  fields: NotificationField[],
  sensitive: boolean
): NotificationEvent {
  return {
    subject,
    outcome,
    summary,
    fields,
    routing: {
      audience: audienceFor(outcome, sensitive),
      ...(record.ownerId !== undefined ? { ownerId: record.ownerId } : {}),
    },
  };
}

function endpointFields(record: VmRecord): NotificationField[] {
  return [
    { name: 'VM', value: record.name, inline: true },
    { name: 'Remote access', value: `${record.remoteAccess.host}:${record.remoteAccess.port}`, inline: true },
  ];
}

export function startedEvent(record: VmRecord): NotificationEvent {
  return event(
    record,
    'started',
    `Reinstall started: ${record.name}`,
    `${record.name} is being restored to its baseline. Remote access is unavailable until it finishes.`,
    [{ name: 'VM', value: record.name, inline: true }],
    false
  );
}

/**
 * Final event of a clean run.
 *
 * Carries the baseline password in clear text so the tenant can log in
 * straight away.
 */
export function successEvent(
  record: VmRecord,
  credentials: GuestCredentials,
  address?: string
): NotificationEvent {
  const fields: NotificationField[] = [
    ...endpointFields(record),
    { name: 'Username', value: credentials.username, inline: true },
    { name: 'Password', value: credentials.password, inline: true },
  ];
  if (address) {
    fields.push({ name: 'Guest address', value: address, inline: false });
  }
  return event(
    record,
    'success',
    `Reinstall complete: ${record.name}`,
    `${record.name} was reinstalled and is ready.`,
    fields,
    true
  );
}

export function warningEvent(record: VmRecord, message: string): NotificationEvent {
  return event(
    record,
    'warning',
    `Reinstall finished with warnings: ${record.name}`,
    message,
    endpointFields(record),
    false
  );
}

export function failureEvent(record: VmRecord, message: string): NotificationEvent {
  return event(
    record,
    'failure',
    `Reinstall failed: ${record.name}`,
    message,
    [{ name: 'VM', value: record.name, inline: true }],
    false
  );
}

/**
 * Event sent once when a VM's lease has run out.
 */
export function expiredEvent(record: VmRecord, expiresAt: string): NotificationEvent {
  return event(
    record,
    'warning',
    `Lease expired: ${record.name}`,
    `The lease on ${record.name} ended at ${expiresAt}.`,
    [
      { name: 'VM', value: record.name, inline: true },
      { name: 'Expired at', value: expiresAt, inline: true },
    ],
    false
  );
}
