export { NotificationManager } from './manager.js';
export { SlackAdapter, slackErrorCode } from './adapters/slack.js';
export type { SlackPoster, SlackAdapterOptions } from './adapters/slack.js';
export { SystemAdapter } from './adapters/system.js';
export type { NodeNotifier, SystemAdapterOptions } from './adapters/system.js';
export type { NotificationManagerOptions } from './types.js';
