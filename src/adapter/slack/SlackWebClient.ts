import type { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import {
  ApiEnvelopeSchema,
  ConnectionsOpenResponseSchema,
  ConversationsInfoResponseSchema,
  UsersInfoResponseSchema,
  type SlackChannel,
  type SlackUser,
  type UserDirectory,
} from './types.js';

/**
 * Slack Web API failure. `code` is Slack's `error` string (e.g. `user_not_found`,
 * `channel_not_found`, `missing_scope`) or `http_<status>` / `invalid_response`.
 */
export class SlackApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly code: string,
  ) {
    super(`${method} failed: ${code}`);
    this.name = 'SlackApiError';
  }
}

export interface SlackWebClientOptions {
  botToken: string;
  appToken: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Minimal Slack Web API client covering the three methods the recorder calls.
 */
export class SlackWebClient implements UserDirectory {
  private botToken: string;
  private appToken: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(
    private logger: Logger,
    options: SlackWebClientOptions,
  ) {
    this.botToken = options.botToken;
    this.appToken = options.appToken;
    this.baseUrl = (options.baseUrl ?? 'https://slack.com/api').replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async usersInfo(userId: string): Promise<SlackUser> {
    const data = await this.call(
      'users.info',
      this.botToken,
      { user: userId },
      UsersInfoResponseSchema,
    );
    return data.user;
  }

  async conversationsInfo(channelId: string): Promise<SlackChannel> {
    const data = await this.call(
      'conversations.info',
      this.botToken,
      { channel: channelId },
      ConversationsInfoResponseSchema,
    );
    return data.channel;
  }

  /** Request a fresh Socket Mode WebSocket URL (app-level token). */
  async openConnection(): Promise<string> {
    const data = await this.call(
      'apps.connections.open',
      this.appToken,
      {},
      ConnectionsOpenResponseSchema,
    );
    return data.url;
  }

  private async call<T extends z.ZodTypeAny>(
    method: string,
    token: string,
    params: Record<string, string>,
    schema: T,
  ): Promise<z.infer<T>> {
    this.logger.debug('slack-web', `POST ${method}`);

    const response = await this.fetchImpl(`${this.baseUrl}/${method}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8',
        Authorization: `Bearer ${token}`,
      },
      body: new URLSearchParams(params).toString(),
    });

    if (!response.ok) {
      throw new SlackApiError(method, `http_${response.status}`);
    }

    const body: unknown = await response.json();
    const envelope = ApiEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new SlackApiError(method, 'invalid_response');
    }
    if (!envelope.data.ok) {
      throw new SlackApiError(method, envelope.data.error ?? 'unknown_error');
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SlackApiError(method, 'invalid_response');
    }
    return parsed.data;
  }
}
