/**
 * Webhook endpoints.
 *
 * Token routes (`/webhooks/:id/:token/...`) authenticate with the webhook
 * token instead of the bot token, so they also work for a client configured
 * with only a webhook URL.
 */

import { ApiResource } from './base.js';
import {
  MessageContentParams,
  assertValid,
  checkLength,
  checkSnowflake,
  toMessageBody,
  validateMessageContent,
} from './validation.js';
import { parseWebhookUrl } from '../config/index.js';
import { NoWebhookConfiguredError } from '../errors/index.js';
import { Logger } from '../observability/index.js';
import { Routes } from '../routes/index.js';
import { DiscordTransport } from '../transport/index.js';
import {
  Message,
  Snowflake,
  Webhook,
  WebhookCredentials,
  MAX_WEBHOOK_NAME_LENGTH,
  MIN_WEBHOOK_NAME_LENGTH,
} from '../types/index.js';

/**
 * Identifies a webhook for token routes: explicit credentials or a webhook
 * URL. Omitted means the configured default webhook.
 */
export type WebhookTarget = WebhookCredentials | string;

export interface CreateWebhookParams {
  /** 1-80 characters, may not contain "clyde" */
  name: string;
  /** Image data URI */
  avatar?: string | null;
}

export interface ModifyWebhookParams {
  name?: string;
  avatar?: string | null;
  /** Moves the webhook; bot-token route only */
  channelId?: Snowflake;
}

export interface ExecuteWebhookParams extends MessageContentParams {
  /** Overrides the webhook's name for this message */
  username?: string;
  avatarUrl?: string;
  /** Post into this thread of the webhook's channel */
  threadId?: Snowflake;
  /** Forum channels: create a post with this name */
  threadName?: string;
  appliedTags?: Snowflake[];
  /** Wait for the message to be created and return it */
  wait?: boolean;
}

export interface WebhookMessageOptions {
  threadId?: Snowflake;
}

export interface ExecuteCompatibleOptions {
  threadId?: Snowflake;
  wait?: boolean;
}

/**
 * Checks a webhook name against Discord's rules.
 */
export function validateWebhookName(errors: string[], name: string | undefined, field: string = 'name'): void {
  if (name === undefined) return;
  checkLength(errors, field, name, MIN_WEBHOOK_NAME_LENGTH, MAX_WEBHOOK_NAME_LENGTH);
  if (name.toLowerCase().includes('clyde')) {
    errors.push(`${field} cannot contain "clyde"`);
  }
}

export class WebhooksApi extends ApiResource {
  private readonly defaultWebhookUrl?: string;

  constructor(transport: DiscordTransport, logger: Logger, defaultWebhookUrl?: string) {
    super(transport, logger);
    this.defaultWebhookUrl = defaultWebhookUrl;
  }

  async create(channelId: Snowflake, params: CreateWebhookParams, reason?: string): Promise<Webhook> {
    const errors: string[] = [];
    validateWebhookName(errors, params.name);
    assertValid(errors);

    const body: Record<string, unknown> = { name: params.name };
    if (params.avatar !== undefined) body.avatar = params.avatar;

    const webhook = await this.transport.execute<Webhook>({
      method: 'POST',
      route: Routes.channelWebhooks,
      params: { channel_id: channelId },
      body,
      reason,
      operation: 'webhooks.create',
    });
    this.logger.info('Webhook created', { channelId, webhookId: webhook.id });
    return webhook;
  }

  async getForChannel(channelId: Snowflake): Promise<Webhook[]> {
    return this.transport.execute<Webhook[]>({
      method: 'GET',
      route: Routes.channelWebhooks,
      params: { channel_id: channelId },
      operation: 'webhooks.getForChannel',
    });
  }

  async getForGuild(guildId: Snowflake): Promise<Webhook[]> {
    return this.transport.execute<Webhook[]>({
      method: 'GET',
      route: Routes.guildWebhooks,
      params: { guild_id: guildId },
      operation: 'webhooks.getForGuild',
    });
  }

  async get(webhookId: Snowflake): Promise<Webhook> {
    return this.transport.execute<Webhook>({
      method: 'GET',
      route: Routes.webhook,
      params: { webhook_id: webhookId },
      operation: 'webhooks.get',
    });
  }

  /**
   * Fetches a webhook with its token. The result has no `user`.
   */
  async getWithToken(target?: WebhookTarget): Promise<Webhook> {
    return this.transport.execute<Webhook>({
      method: 'GET',
      route: Routes.webhookWithToken,
      params: this.tokenParams(target),
      operation: 'webhooks.getWithToken',
    });
  }

  async modify(webhookId: Snowflake, params: ModifyWebhookParams, reason?: string): Promise<Webhook> {
    const errors: string[] = [];
    validateWebhookName(errors, params.name);
    checkSnowflake(errors, 'channelId', params.channelId);
    assertValid(errors);

    const body: Record<string, unknown> = {};
    if (params.name !== undefined) body.name = params.name;
    if (params.avatar !== undefined) body.avatar = params.avatar;
    if (params.channelId !== undefined) body.channel_id = params.channelId;

    return this.transport.execute<Webhook>({
      method: 'PATCH',
      route: Routes.webhook,
      params: { webhook_id: webhookId },
      body,
      reason,
      operation: 'webhooks.modify',
    });
  }

  async modifyWithToken(
    params: Omit<ModifyWebhookParams, 'channelId'>,
    target?: WebhookTarget,
    reason?: string
  ): Promise<Webhook> {
    const errors: string[] = [];
    validateWebhookName(errors, params.name);
    assertValid(errors);

    const body: Record<string, unknown> = {};
    if (params.name !== undefined) body.name = params.name;
    if (params.avatar !== undefined) body.avatar = params.avatar;

    return this.transport.execute<Webhook>({
      method: 'PATCH',
      route: Routes.webhookWithToken,
      params: this.tokenParams(target),
      body,
      reason,
      operation: 'webhooks.modifyWithToken',
    });
  }

  async delete(webhookId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.webhook,
      params: { webhook_id: webhookId },
      reason,
      operation: 'webhooks.delete',
    });
    this.logger.info('Webhook deleted', { webhookId });
  }

  async deleteWithToken(target?: WebhookTarget, reason?: string): Promise<void> {
    const params = this.tokenParams(target);
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.webhookWithToken,
      params,
      reason,
      operation: 'webhooks.deleteWithToken',
    });
    this.logger.info('Webhook deleted', { webhookId: params.webhook_id });
  }

  /**
   * Posts a message through a webhook. Resolves to the message when `wait`
   * is set, otherwise to `undefined`.
   */
  async execute(params: ExecuteWebhookParams, target?: WebhookTarget): Promise<Message | undefined> {
    const errors: string[] = [];
    validateMessageContent(errors, params, { requireContent: true });
    validateWebhookName(errors, params.username, 'username');
    checkSnowflake(errors, 'threadId', params.threadId);
    if (params.threadId !== undefined && params.threadName !== undefined) {
      errors.push('threadId and threadName cannot both be given');
    }
    assertValid(errors);

    const routeParams = this.tokenParams(target);
    const body = toMessageBody(params);
    if (params.username !== undefined) body.username = params.username;
    if (params.avatarUrl !== undefined) body.avatar_url = params.avatarUrl;
    if (params.threadName !== undefined) body.thread_name = params.threadName;
    if (params.appliedTags !== undefined) body.applied_tags = params.appliedTags;

    const message = await this.transport.executeOptional<Message>({
      method: 'POST',
      route: Routes.webhookWithToken,
      params: routeParams,
      query: { wait: params.wait, thread_id: params.threadId },
      body,
      files: params.files,
      operation: 'webhooks.execute',
    });

    this.logger.info('Webhook executed', { webhookId: routeParams.webhook_id, wait: params.wait === true });
    return message;
  }

  /**
   * Executes with a Slack-formatted payload.
   */
  async executeSlack(
    payload: Record<string, unknown>,
    options: ExecuteCompatibleOptions = {},
    target?: WebhookTarget
  ): Promise<Message | undefined> {
    return this.executeCompatible(Routes.webhookSlack, 'webhooks.executeSlack', payload, options, target);
  }

  /**
   * Executes with a GitHub webhook event payload.
   */
  async executeGitHub(
    payload: Record<string, unknown>,
    options: ExecuteCompatibleOptions = {},
    target?: WebhookTarget
  ): Promise<Message | undefined> {
    return this.executeCompatible(Routes.webhookGitHub, 'webhooks.executeGitHub', payload, options, target);
  }

  async getMessage(
    messageId: Snowflake,
    options: WebhookMessageOptions = {},
    target?: WebhookTarget
  ): Promise<Message> {
    return this.transport.execute<Message>({
      method: 'GET',
      route: Routes.webhookMessage,
      params: { ...this.tokenParams(target), message_id: messageId },
      query: { thread_id: options.threadId },
      operation: 'webhooks.getMessage',
    });
  }

  async editMessage(
    messageId: Snowflake,
    params: MessageContentParams & WebhookMessageOptions,
    target?: WebhookTarget
  ): Promise<Message> {
    const errors: string[] = [];
    validateMessageContent(errors, params, { requireContent: false });
    assertValid(errors);

    return this.transport.execute<Message>({
      method: 'PATCH',
      route: Routes.webhookMessage,
      params: { ...this.tokenParams(target), message_id: messageId },
      query: { thread_id: params.threadId },
      body: toMessageBody(params),
      files: params.files,
      operation: 'webhooks.editMessage',
    });
  }

  async deleteMessage(
    messageId: Snowflake,
    options: WebhookMessageOptions = {},
    target?: WebhookTarget
  ): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.webhookMessage,
      params: { ...this.tokenParams(target), message_id: messageId },
      query: { thread_id: options.threadId },
      operation: 'webhooks.deleteMessage',
    });
  }

  private async executeCompatible(
    route: string,
    operation: string,
    payload: Record<string, unknown>,
    options: ExecuteCompatibleOptions,
    target?: WebhookTarget
  ): Promise<Message | undefined> {
    const errors: string[] = [];
    checkSnowflake(errors, 'threadId', options.threadId);
    assertValid(errors);

    return this.transport.executeOptional<Message>({
      method: 'POST',
      route,
      params: this.tokenParams(target),
      query: { wait: options.wait, thread_id: options.threadId },
      body: payload,
      operation,
    });
  }

  /**
   * Resolves a target to route parameters.
   * @throws NoWebhookConfiguredError when no target is given and no default is configured
   */
  private tokenParams(target?: WebhookTarget): { webhook_id: Snowflake; webhook_token: string } {
    const resolved = target ?? this.defaultWebhookUrl;
    if (resolved === undefined) {
      throw new NoWebhookConfiguredError();
    }
    if (typeof resolved === 'string') {
      const { webhookId, webhookToken } = parseWebhookUrl(resolved);
      return { webhook_id: webhookId, webhook_token: webhookToken };
    }
    return { webhook_id: resolved.id, webhook_token: resolved.token };
  }
}
