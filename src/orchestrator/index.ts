// Orchestrator - runs one render-job notification end to end:
// config (load or bootstrap) > logger > dependency check > compose > deliver.
// Uses dependency injection for testability. run() never rejects: every
// failure ends in a logged terminal state with an exit code.

import { hostname, platform, release } from 'node:os';
import { dirname } from 'node:path';
import type { LogLevel as SlackLogLevel, WebClient } from '@slack/web-api';
import { loadOrBootstrapConfig } from '../config/index.js';
import type { ConfigLoadResult } from '../config/index.js';
import { ensureDependency, importInstalled, npmInstaller, PACKAGE_ROOT } from '../dependency/index.js';
import type { Installer } from '../dependency/index.js';
import { NotifierLogger } from '../logger/index.js';
import type { WritableOutput } from '../logger/index.js';
import { composeMessage } from '../message/index.js';
import { NotificationManager, SlackAdapter, SystemAdapter } from '../notifications/index.js';
import type { NodeNotifier, SlackPoster } from '../notifications/index.js';
import { RenderJobResultSchema } from '../types/index.js';
import type { DeliveryOutcome, LogLevel, NotifierConfig, RenderJobResult } from '../types/index.js';
import { ConfigInvalidError, DependencyUnavailableError, describeError } from './errors.js';

export const SLACK_PACKAGE = '@slack/web-api';

const COMPONENT = 'orchestrator';

export type RunState =
  | 'Bootstrapped'
  | 'ConfigError'
  | 'DependencyFatal'
  | 'Delivered'
  | 'DeliveryPartialFailure'
  | 'Fault';

/** Process exit code for each terminal state. Channel failures never fail the process. */
export const EXIT_CODES: Record<RunState, 0 | 1> = {
  Bootstrapped: 1,
  ConfigError: 1,
  DependencyFatal: 1,
  Delivered: 0,
  DeliveryPartialFailure: 0,
  Fault: 1,
};

export interface RunOutcome {
  state: RunState;
  exitCode: 0 | 1;
  deliveries: DeliveryOutcome[];
  message?: string;
  reason?: string;
  logFile?: string;
}

/** Builds a Slack client for a token; returned by the dependency probe. */
export type SlackClientFactory = (token: string, options: { timeoutMs: number }) => SlackPoster;

export interface OrchestratorOptions {
  settingsPath: string;
  /** Raw job descriptor from the host; validated before composing. */
  job: unknown;
  env?: NodeJS.ProcessEnv;
  verbose?: boolean;
  /** Console echo target; null silences it. */
  output?: WritableOutput | null;
  now?: () => Date;
  /** Imports @slack/web-api and returns a client factory. */
  probeSlack?: () => Promise<SlackClientFactory>;
  /** Probe used after installing. Default: load from <packageRoot>/node_modules by path. */
  reprobeSlack?: () => Promise<SlackClientFactory>;
  /** Directory npm installs into. Default: PACKAGE_ROOT. */
  packageRoot?: string;
  install?: Installer;
  loadNotifier?: () => NodeNotifier;
}

interface SlackWebApi {
  WebClient: typeof WebClient;
  LogLevel: typeof SlackLogLevel;
}

function isSlackWebApi(value: unknown): value is SlackWebApi {
  return (
    typeof value === 'object' &&
    value !== null &&
    'WebClient' in value &&
    typeof value.WebClient === 'function' &&
    'LogLevel' in value &&
    typeof value.LogLevel === 'object' &&
    value.LogLevel !== null
  );
}

/**
 * Client factory from a loaded @slack/web-api module. A CommonJS module
 * imported by path may only expose its exports on `default`.
 *
 * The client's own logger is held at ERROR so request failures reach the
 * run log through ChannelError instead of the console.
 */
export function createSlackClientFactory(loaded: unknown): SlackClientFactory {
  const fallback = typeof loaded === 'object' && loaded !== null && 'default' in loaded ? loaded.default : undefined;
  const api = isSlackWebApi(loaded) ? loaded : isSlackWebApi(fallback) ? fallback : null;
  if (!api) {
    throw new Error(`${SLACK_PACKAGE} does not export WebClient`);
  }
  const { WebClient: Client, LogLevel: SlackLevels } = api;
  return (token, { timeoutMs }) =>
    new Client(token, {
      timeout: timeoutMs,
      retryConfig: { retries: 0 },
      logLevel: SlackLevels.ERROR,
    });
}

/** Default probe: dynamic import so a missing package is a recoverable state, not a crash. */
export async function importSlackClient(): Promise<SlackClientFactory> {
  return createSlackClientFactory(await import('@slack/web-api'));
}

/** Post-install probe: loads the freshly installed package by file path. */
export async function importInstalledSlackClient(root: string = PACKAGE_ROOT): Promise<SlackClientFactory> {
  return createSlackClientFactory(await importInstalled(root, SLACK_PACKAGE));
}

/**
 * Sequences one notifier run through its states:
 *
 *   Start -> ConfigLoaded | Bootstrapped | ConfigError
 *         -> DependencyReady | DependencyFatal
 *         -> Delivered | DeliveryPartialFailure
 *
 * Any exception that escapes a stage ends the run in Fault.
 */
export class Orchestrator {
  private readonly options: OrchestratorOptions;
  private logger: NotifierLogger | null = null;

  constructor(options: OrchestratorOptions) {
    this.options = options;
  }

  async run(): Promise<RunOutcome> {
    try {
      return await this.runStages();
    } catch (err) {
      return this.fault(err);
    } finally {
      this.logger?.close();
    }
  }

  private async runStages(): Promise<RunOutcome> {
    const { settingsPath } = this.options;

    // Stage 1: configuration
    let loaded: ConfigLoadResult;
    try {
      loaded = await loadOrBootstrapConfig(settingsPath, { env: this.options.env });
    } catch (err) {
      if (!(err instanceof ConfigInvalidError)) throw err;
      this.logBeforeConfig('error', `Config error: ${err.message}`);
      return this.finish('ConfigError', { reason: err.message });
    }

    if (loaded.kind === 'bootstrapped') {
      this.logBeforeConfig('warn', `Config created at ${loaded.path}. Edit it and relaunch the render.`);
      return this.finish('Bootstrapped', { reason: 'settings file created from template' });
    }

    const { config } = loaded;
    try {
      this.logger = this.createLogger(config.log_directory, config.log_prefix);
    } catch (err) {
      const reason = `cannot open log directory ${config.log_directory}: ${describeError(err)}`;
      this.logBeforeConfig('error', `Config error: ${reason}`);
      return this.finish('ConfigError', { reason });
    }
    const logger = this.requireLogger();
    logger.log('info', COMPONENT, `Config loaded from ${loaded.path}`);
    this.logDiagnostics(logger);

    // Stage 2: Slack client dependency
    const packageRoot = this.options.packageRoot ?? PACKAGE_ROOT;
    const dependency = await ensureDependency({
      name: SLACK_PACKAGE,
      probe: this.options.probeSlack ?? importSlackClient,
      reprobe: this.options.reprobeSlack ?? (() => importInstalledSlackClient(packageRoot)),
      install: this.options.install ?? npmInstaller(packageRoot),
      logger,
    });
    if (dependency.status === 'fatal') {
      // The ensurer has already logged the failure; the finish entry closes the run.
      const error = new DependencyUnavailableError(SLACK_PACKAGE, dependency.reason);
      return this.finish('DependencyFatal', { reason: error.message });
    }

    // Stage 3: compose
    const job = this.parseJob();
    const message = composeMessage(job);
    logger.log('info', COMPONENT, `Message: ${message}`);

    // Stage 4: deliver (Slack, then desktop)
    const deliveries = await this.deliver(config, job, message, dependency.module);
    const state = deliveries.every((d) => d.ok) ? 'Delivered' : 'DeliveryPartialFailure';
    return this.finish(state, { message, deliveries });
  }

  private async deliver(
    config: Readonly<NotifierConfig>,
    job: RenderJobResult,
    message: string,
    createSlackClient: SlackClientFactory,
  ): Promise<DeliveryOutcome[]> {
    const logger = this.requireLogger();
    const manager = new NotificationManager({ logger });
    manager.addAdapter(
      new SlackAdapter({
        channel: config.channel_name,
        createClient: () => createSlackClient(config.slack_token, { timeoutMs: config.timeout_ms }),
      }),
    );
    manager.addAdapter(new SystemAdapter({ loadNotifier: this.options.loadNotifier }));

    try {
      return await manager.dispatch({
        title: config.notification_title,
        body: message,
        severity: job.status === 'Failed' ? 'critical' : 'info',
        job,
      });
    } finally {
      await manager.close();
    }
  }

  private parseJob(): RenderJobResult {
    const result = RenderJobResultSchema.safeParse(this.options.job);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'job'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid render job input (${issues})`);
    }
    return result.data;
  }

  private logDiagnostics(logger: NotifierLogger): void {
    logger.log('debug', COMPONENT, `Node: ${process.version} (${process.execPath})`);
    logger.log('debug', COMPONENT, `Host: ${hostname()} | OS: ${platform()} ${release()}`);
    logger.log('debug', COMPONENT, `Config path: ${this.options.settingsPath}`);
    logger.log('debug', COMPONENT, `Log path: ${logger.filePath}`);
    logger.log('debug', COMPONENT, 'Trigger input', { job: this.options.job });
  }

  private createLogger(directory: string, prefix?: string): NotifierLogger {
    return new NotifierLogger({
      directory,
      prefix,
      level: this.options.verbose ? 'debug' : 'info',
      now: this.options.now,
      output: this.options.output,
    });
  }

  /** Logger beside the settings file, for runs that end before the config is usable. */
  private useFallbackLogger(): NotifierLogger {
    if (!this.logger) {
      this.logger = this.createLogger(dirname(this.options.settingsPath));
    }
    return this.logger;
  }

  /** Log before the configured logger exists; echo to the console if even the fallback cannot open. */
  private logBeforeConfig(level: LogLevel, message: string): void {
    let logger: NotifierLogger;
    try {
      logger = this.useFallbackLogger();
    } catch (err) {
      this.consoleOutput()?.write(`${message} (log file unavailable: ${describeError(err)})\n`);
      return;
    }
    logger.log(level, COMPONENT, message);
  }

  private consoleOutput(): WritableOutput | null {
    return this.options.output === undefined ? process.stderr : this.options.output;
  }

  private requireLogger(): NotifierLogger {
    if (!this.logger) {
      throw new Error('Logger not initialized');
    }
    return this.logger;
  }

  private finish(
    state: RunState,
    details: Pick<RunOutcome, 'message' | 'reason'> & { deliveries?: DeliveryOutcome[] },
  ): RunOutcome {
    const logger = this.logger;
    const level: LogLevel =
      state === 'Delivered' ? 'info' : state === 'DeliveryPartialFailure' || state === 'Bootstrapped' ? 'warn' : 'error';
    logger?.log(level, COMPONENT, `Run finished: ${state}`, details.reason ? { reason: details.reason } : undefined);
    return {
      state,
      exitCode: EXIT_CODES[state],
      deliveries: details.deliveries ?? [],
      message: details.message,
      reason: details.reason,
      logFile: logger?.filePath,
    };
  }

  /** Last line of defence: log the fault wherever possible and report it. */
  private fault(err: unknown): RunOutcome {
    const reason = describeError(err);
    const stack = err instanceof Error ? err.stack : undefined;
    let logger: NotifierLogger | null = this.logger;
    if (!logger) {
      try {
        logger = this.useFallbackLogger();
      } catch (loggerErr) {
        this.consoleOutput()?.write(
          `Unexpected fault: ${reason} (log file unavailable: ${describeError(loggerErr)})\n`,
        );
      }
    }
    logger?.log('fatal', COMPONENT, `Unexpected fault: ${reason}`, { stack });
    logger?.log('error', COMPONENT, 'Run finished: Fault');
    return {
      state: 'Fault',
      exitCode: EXIT_CODES.Fault,
      deliveries: [],
      reason,
      logFile: logger?.filePath,
    };
  }
}

/** Run the notifier once. Never rejects. */
export function runNotifier(options: OrchestratorOptions): Promise<RunOutcome> {
  return new Orchestrator(options).run();
}
