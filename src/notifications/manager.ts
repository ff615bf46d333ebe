/**
 * NotificationManager: Delivers one notification to each registered adapter,
 * strictly in registration order (Slack first, then the desktop).
 *
 * Every adapter is initialized and sent to inside its own try/catch, so one
 * channel's failure never suppresses another. No retries, no queueing: each
 * channel is attempted exactly once per dispatch. Never throws.
 */

import type {
  DeliveryChannel,
  DeliveryOutcome,
  Notification,
  NotificationAdapter,
  NotificationManagerOptions,
} from './types.js';
import { describeError } from '../orchestrator/errors.js';

const CHANNEL_LABELS: Record<DeliveryChannel, string> = {
  slack: 'Slack',
  system: 'Desktop notification',
};

export class NotificationManager {
  private readonly adapters: NotificationAdapter[] = [];
  private readonly logger: NotificationManagerOptions['logger'];

  constructor(options: NotificationManagerOptions) {
    this.logger = options.logger;
  }

  /** Add an adapter. Adapters are delivered to in the order they were added. */
  addAdapter(adapter: NotificationAdapter): void {
    this.adapters.push(adapter);
  }

  /**
   * Send the notification through every adapter, one after another.
   * Logs one attempt entry and one outcome entry per channel.
   */
  async dispatch(notification: Notification): Promise<DeliveryOutcome[]> {
    const outcomes: DeliveryOutcome[] = [];
    for (const adapter of this.adapters) {
      outcomes.push(await this.deliver(adapter, notification));
    }
    return outcomes;
  }

  /** Close all adapters, best-effort. */
  async close(): Promise<void> {
    const results = await Promise.allSettled(this.adapters.map((adapter) => adapter.close()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.log('warn', 'notifications', `Adapter "${this.adapters[i]?.name}" failed to close`, {
          error: describeError(result.reason),
        });
      }
    });
  }

  private async deliver(adapter: NotificationAdapter, notification: Notification): Promise<DeliveryOutcome> {
    const label = CHANNEL_LABELS[adapter.name];
    this.logger.log('info', adapter.name, `${label}: sending`);
    try {
      await adapter.init();
      await adapter.send(notification);
    } catch (err) {
      const error = describeError(err);
      this.logger.log('error', adapter.name, `${label}: delivery failed (${error})`);
      return { channel: adapter.name, ok: false, error };
    }
    this.logger.log('info', adapter.name, `${label}: delivered`);
    return { channel: adapter.name, ok: true };
  }
}
