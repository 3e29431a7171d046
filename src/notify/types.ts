/**
 * Notification Types
 *
 * Structured status events emitted by workflows, and the sink contract that
 * delivers them.
 */

/**
 * Workflow boundary an event reports
 */
export type NotificationOutcome = 'started' | 'success' | 'warning' | 'failure';

/**
 * Who may see an event.
 *
 * Public events are lifecycle news for the tenant's shared channel; private
 * events carry errors or secrets and go to the tenant's private channel and
 * the operators.
 */
export type NotificationAudience = 'public' | 'private';

/**
 * A name/value line rendered in the notification
 */
export interface NotificationField {
  name: string;
  value: string;
  /** Render beside the previous field when the destination supports it */
  inline: boolean;
}

/**
 * Routing hint the sink turns into concrete destinations
 */
export interface NotificationRouting {
  audience: NotificationAudience;
  /** Tenant that owns the VM, if any */
  ownerId?: string;
}

/**
 * Structured status event
 */
export interface NotificationEvent {
  subject: string;
  outcome: NotificationOutcome;
  summary: string;
  fields: NotificationField[];
  routing: NotificationRouting;
}

/**
 * Delivers status events.
 *
 * Implementations resolve destinations from the routing hint; callers never
 * address a transport directly.
 */
export interface NotificationSink {
  notify(event: NotificationEvent): Promise<void>;
}
