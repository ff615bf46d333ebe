/**
 * SlackAdapter: Posts the status line to a channel with chat.postMessage.
 *
 * The client is built by a factory handed in by the orchestrator (backed by
 * the WebClient the dependency ensurer loaded), so this module never loads
 * @slack/web-api itself. Plain `text` only: the message is one line and
 * doubles as the push preview.
 */

import type { Notification, NotificationAdapter } from '../types.js';
import { ChannelError } from '../../orchestrator/errors.js';

/** The slice of @slack/web-api's WebClient this adapter calls. */
export interface SlackPoster {
  chat: {
    postMessage(args: { channel: string; text: string }): Promise<{ ok?: boolean; error?: string }>;
  };
}

export interface SlackAdapterOptions {
  createClient: () => SlackPoster;
  channel: string;
}

/** Slack API error code (e.g. "channel_not_found") carried by a WebClient platform error. */
export function slackErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('data' in err)) return undefined;
  const data = err.data;
  if (typeof data !== 'object' || data === null || !('error' in data)) return undefined;
  return typeof data.error === 'string' ? data.error : undefined;
}

export class SlackAdapter implements NotificationAdapter {
  readonly name = 'slack' as const;

  private readonly createClient: () => SlackPoster;
  private readonly channel: string;
  private client: SlackPoster | null = null;

  constructor(options: SlackAdapterOptions) {
    this.createClient = options.createClient;
    this.channel = options.channel;
  }

  /** Build the Slack client. A factory failure surfaces as ChannelError. */
  async init(): Promise<void> {
    try {
      this.client = this.createClient();
    } catch (err) {
      throw new ChannelError(
        `Slack client could not be created: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        { cause: err },
      );
    }
  }

  /** Drop the client reference. */
  async close(): Promise<void> {
    this.client = null;
  }

  /** Single post, no retry. Any failure surfaces as ChannelError. */
  async send(notification: Notification): Promise<void> {
    if (!this.client) {
      throw new ChannelError('SlackAdapter not initialized -- call init() first');
    }

    let response: { ok?: boolean; error?: string };
    try {
      response = await this.client.chat.postMessage({
        channel: this.channel,
        text: notification.body,
      });
    } catch (err) {
      const code = slackErrorCode(err);
      const detail = code ?? (err instanceof Error ? err.message : String(err));
      throw new ChannelError(`Slack post to ${this.channel} failed: ${detail}`, code, { cause: err });
    }

    if (response.ok === false) {
      throw new ChannelError(
        `Slack post to ${this.channel} rejected: ${response.error ?? 'unknown error'}`,
        response.error,
      );
    }
  }
}
