// Barrel export for all type definitions
export { NotifierConfigSchema, CONFIG_PLACEHOLDERS } from './config.js';
export type { NotifierConfig } from './config.js';

export { RenderJobResultSchema, RenderJobStatusSchema } from './job.js';
export type { RenderJobResult, RenderJobStatus } from './job.js';

export type {
  LogLevel,
  LogEntry,
} from './log.js';

export type {
  NotificationSeverity,
  DeliveryChannel,
  Notification,
  NotificationAdapter,
  DeliveryOutcome,
} from './notification.js';
