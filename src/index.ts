// Package entry point - re-exports public API
export {
  NotifierConfigSchema,
  RenderJobResultSchema,
  RenderJobStatusSchema,
  CONFIG_PLACEHOLDERS,
} from './types/index.js';

export type {
  NotifierConfig,
  RenderJobResult,
  RenderJobStatus,
  LogLevel,
  LogEntry,
  NotificationSeverity,
  DeliveryChannel,
  Notification,
  NotificationAdapter,
  DeliveryOutcome,
} from './types/index.js';

export {
  loadOrBootstrapConfig,
  resolveSettingsPath,
  writeConfigTemplate,
  expandHome,
} from './config/index.js';
export type { ConfigLoadResult, LoadConfigOptions } from './config/index.js';

export { ensureDependency, importInstalled, npmInstaller } from './dependency/index.js';
export type { DependencyCheck, Installer, InstallResult } from './dependency/index.js';

export { NotifierLogger, logFileName } from './logger/index.js';
export type { NotifierLoggerOptions } from './logger/index.js';

export { composeMessage } from './message/index.js';

export { NotificationManager, SlackAdapter, SystemAdapter } from './notifications/index.js';
export type { SlackPoster, NodeNotifier } from './notifications/index.js';

export {
  Orchestrator,
  runNotifier,
  createSlackClientFactory,
  importSlackClient,
  importInstalledSlackClient,
  EXIT_CODES,
} from './orchestrator/index.js';
export type { OrchestratorOptions, RunOutcome, RunState, SlackClientFactory } from './orchestrator/index.js';
export {
  ConfigInvalidError,
  DependencyUnavailableError,
  ChannelError,
  DesktopError,
} from './orchestrator/errors.js';
