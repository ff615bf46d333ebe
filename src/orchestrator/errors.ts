// Error taxonomy for a notifier run.
// Bootstrap is not an error: loadOrBootstrapConfig returns it as a result.
// Anything thrown that is not one of these is treated as an unexpected fault.

/** Settings file unreadable, malformed, or missing a required field. Halts the run. */
export class ConfigInvalidError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigInvalidError';
  }
}

/** Chat client library missing and could not be installed. Halts the run. */
export class DependencyUnavailableError extends Error {
  constructor(readonly dependency: string, reason: string) {
    super(`${dependency} unavailable: ${reason}`);
    this.name = 'DependencyUnavailableError';
  }
}

/** Slack rejected the post or could not be reached. Logged, run continues. */
export class ChannelError extends Error {
  constructor(message: string, readonly slackError?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChannelError';
  }
}

/** Native desktop notification failed. Logged, run continues. */
export class DesktopError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DesktopError';
  }
}

/** Best-effort message extraction for logging unknown thrown values. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
