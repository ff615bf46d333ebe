/**
 * SystemAdapter: Sends OS-native toast notifications via node-notifier.
 *
 * node-notifier is CJS-only and requires the createRequire workaround in
 * this ESM project. A missing module or a notifier callback error becomes a
 * DesktopError; the manager logs it and carries on.
 */

import { createRequire } from 'node:module';
import type { Notification, NotificationAdapter } from '../types.js';
import { DesktopError } from '../../orchestrator/errors.js';

const require = createRequire(import.meta.url);

export interface NodeNotifier {
  notify(opts: Record<string, unknown>, cb?: (err: Error | null) => void): void;
}

export interface SystemAdapterOptions {
  /** Loads the notifier. Default: require('node-notifier'). */
  loadNotifier?: () => NodeNotifier;
}

function requireNodeNotifier(): NodeNotifier {
  const nn: NodeNotifier = require('node-notifier');
  return nn;
}

export class SystemAdapter implements NotificationAdapter {
  readonly name = 'system' as const;

  private readonly loadNotifier: () => NodeNotifier;
  private notifier: NodeNotifier | null = null;

  constructor(options: SystemAdapterOptions = {}) {
    this.loadNotifier = options.loadNotifier ?? requireNodeNotifier;
  }

  /** Load node-notifier. Throws DesktopError when it cannot be loaded. */
  async init(): Promise<void> {
    try {
      this.notifier = this.loadNotifier();
    } catch (err) {
      throw new DesktopError(
        `node-notifier unavailable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }

  /** Send OS-native toast notification; failed jobs play a sound. */
  async send(notification: Notification): Promise<void> {
    if (!this.notifier) {
      throw new DesktopError('SystemAdapter not initialized -- call init() first');
    }

    const notifier = this.notifier;
    return new Promise<void>((resolve, reject) => {
      notifier.notify(
        {
          title: notification.title,
          message: notification.body,
          sound: notification.severity === 'critical',
          wait: false,
        },
        (err) => {
          if (err) reject(new DesktopError(`Desktop notification failed: ${err.message}`, { cause: err }));
          else resolve();
        },
      );
    });
  }

  /** Release the notifier reference. */
  async close(): Promise<void> {
    this.notifier = null;
  }
}
