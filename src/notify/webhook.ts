/**
 * Webhook Notification Sink
 *
 * Posts status events as JSON to per-tenant and operator webhooks.
 */

import { NotificationError, errorMessage } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import type {
  NotificationEvent,
  NotificationField,
  NotificationOutcome,
  NotificationRouting,
  NotificationSink,
} from './types.js';

/**
 * Embed colors per outcome (RGB as integer)
 */
export const OUTCOME_COLORS: Record<NotificationOutcome, number> = {
  started: 0x3498db,
  success: 0x2ecc71,
  warning: 0xf1c40f,
  failure: 0xe74c3c,
};

/**
 * Webhooks of one tenant
 */
export interface OwnerWebhooks {
  publicWebhook?: string;
  privateWebhook?: string;
}

/**
 * JSON body posted to each destination
 */
export interface WebhookPayload {
  title: string;
  description: string;
  color: number;
  fields: NotificationField[];
  routing: NotificationRouting;
}

/**
 * Options for constructing a WebhookNotificationSink
 */
export interface WebhookSinkOptions {
  /** Receives every private event */
  operatorWebhook?: string;
  /** Tenant webhooks keyed by owner id */
  owners?: Record<string, OwnerWebhooks>;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
  fetchFn?: typeof fetch;
  logger?: Logger;
}

/**
 * Build the JSON body for an event.
 */
export function toPayload(event: NotificationEvent): WebhookPayload {
  return {
    title: event.subject,
    description: event.summary,
    color: OUTCOME_COLORS[event.outcome],
    fields: event.fields,
    routing: event.routing,
  };
}

/**
 * NotificationSink that posts to webhooks.
 */
export class WebhookNotificationSink implements NotificationSink {
  private readonly operatorWebhook: string | undefined;
  private readonly owners: Record<string, OwnerWebhooks>;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: WebhookSinkOptions = {}) {
    this.operatorWebhook = options.operatorWebhook;
    this.owners = options.owners ?? {};
    this.timeout = options.timeout ?? 10000;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Resolve the webhook URLs an event goes to.
   *
   * Public events reach only the owner's public webhook. Private events reach
   * the owner's private webhook and the operator webhook.
   */
  resolveDestinations(routing: NotificationRouting): string[] {
    const owner = routing.ownerId !== undefined ? this.owners[routing.ownerId] : undefined;
    const destinations: string[] = [];

    if (routing.audience === 'public') {
      if (owner?.publicWebhook) destinations.push(owner.publicWebhook);
    } else {
      if (owner?.privateWebhook) destinations.push(owner.privateWebhook);
      if (this.operatorWebhook) destinations.push(this.operatorWebhook);
    }

    return [...new Set(destinations)];
  }

  /**
   * Post an event to every resolved destination.
   *
   * All destinations are attempted even when one fails.
   *
   * @throws NotificationError naming the first destination that failed
   */
  async notify(event: NotificationEvent): Promise<void> {
    const destinations = this.resolveDestinations(event.routing);
    if (destinations.length === 0) {
      this.logger.debug(`No webhook configured for ${event.routing.audience} event '${event.subject}'`);
      return;
    }

    const body = JSON.stringify(toPayload(event));
    const results = await Promise.allSettled(destinations.map((url) => this.post(url, body)));

    const failures: NotificationError[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        failures.push(new NotificationError(errorMessage(result.reason), destinations[i] ?? 'unknown'));
      }
    });

    const [first] = failures;
    if (first) {
      throw first;
    }
  }

  private async post(url: string, body: string): Promise<void> {
    const response = await this.fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal: AbortSignal.timeout(this.timeout),
    });
    if (!response.ok) {
      throw new Error(`Webhook responded with HTTP ${response.status}`);
    }
  }
}
