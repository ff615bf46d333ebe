// Internal types for the notifications module.
// Re-exports shared types and defines manager-specific types.

export type {
  Notification,
  NotificationAdapter,
  NotificationSeverity,
  DeliveryChannel,
  DeliveryOutcome,
} from '../types/notification.js';

import type { NotifierLogger } from '../logger/index.js';

export interface NotificationManagerOptions {
  logger: Pick<NotifierLogger, 'log'>;
}
