// Notification type definitions with full lifecycle adapter contract

import type { RenderJobResult } from './job.js';

export type NotificationSeverity = 'info' | 'critical';

export type DeliveryChannel = 'slack' | 'system';

export interface Notification {
  title: string;
  body: string;            // Composed single-line status message
  severity: NotificationSeverity;
  job: RenderJobResult;
}

export interface NotificationAdapter {
  readonly name: DeliveryChannel;
  init(): Promise<void>;
  send(notification: Notification): Promise<void>;
  close(): Promise<void>;
}

export type DeliveryOutcome =
  | { channel: DeliveryChannel; ok: true }
  | { channel: DeliveryChannel; ok: false; error: string };
