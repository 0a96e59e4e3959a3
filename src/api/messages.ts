/**
 * Channel message endpoints.
 */

import { ApiResource } from './base.js';
import {
  MessageContentParams,
  assertValid,
  checkExclusive,
  checkRange,
  checkSnowflake,
  toMessageBody,
  validateMessageContent,
} from './validation.js';
import { Routes } from '../routes/index.js';
import {
  Message,
  MessageFlags,
  Snowflake,
  getSnowflakeTimestamp,
  isValidSnowflake,
} from '../types/index.js';

/** Messages older than this cannot be bulk deleted */
export const BULK_DELETE_MAX_AGE_MS = 14 * 24 * 60 * 60 * 1000;
export const MIN_BULK_DELETE = 2;
export const MAX_BULK_DELETE = 100;

export interface ListMessagesParams {
  /** 1-100, Discord defaults to 50 */
  limit?: number;
  before?: Snowflake;
  after?: Snowflake;
  around?: Snowflake;
}

export interface CreateMessageParams extends MessageContentParams {
  /** Message to reply to */
  replyTo?: Snowflake;
  /** Defaults to false, so replying to a deleted message still sends */
  failIfNotExists?: boolean;
  /** Whether the reply pings its author */
  mentionRepliedUser?: boolean;
  stickerIds?: Snowflake[];
  nonce?: string | number;
  suppressEmbeds?: boolean;
  /** Send without push and desktop notifications */
  suppressNotifications?: boolean;
}

export type EditMessageParams = MessageContentParams;

export class MessagesApi extends ApiResource {
  /**
   * Lists messages in a channel, newest first.
   */
  async list(channelId: Snowflake, params: ListMessagesParams = {}): Promise<Message[]> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 100);
    checkExclusive(errors, { before: params.before, after: params.after, around: params.around });
    checkSnowflake(errors, 'before', params.before);
    checkSnowflake(errors, 'after', params.after);
    checkSnowflake(errors, 'around', params.around);
    assertValid(errors);

    return this.transport.execute<Message[]>({
      method: 'GET',
      route: Routes.channelMessages,
      params: { channel_id: channelId },
      query: {
        limit: params.limit,
        before: params.before,
        after: params.after,
        around: params.around,
      },
      operation: 'messages.list',
    });
  }

  async get(channelId: Snowflake, messageId: Snowflake): Promise<Message> {
    return this.transport.execute<Message>({
      method: 'GET',
      route: Routes.channelMessage,
      params: { channel_id: channelId, message_id: messageId },
      operation: 'messages.get',
    });
  }

  /**
   * Sends a message to a channel, thread or DM.
   */
  async create(channelId: Snowflake, params: CreateMessageParams): Promise<Message> {
    const errors: string[] = [];
    validateMessageContent(errors, params, {
      requireContent: true,
      extraSource: params.stickerIds !== undefined && params.stickerIds.length > 0,
    });
    if (params.stickerIds && params.stickerIds.length > 3) {
      errors.push('Too many stickers (max 3)');
    }
    checkSnowflake(errors, 'replyTo', params.replyTo);
    assertValid(errors);

    const body = toMessageBody(params);
    if (params.stickerIds?.length) body.sticker_ids = params.stickerIds;
    if (params.nonce !== undefined) body.nonce = params.nonce;

    let flags = params.flags ?? 0;
    if (params.suppressEmbeds) flags |= MessageFlags.SuppressEmbeds;
    if (params.suppressNotifications) flags |= MessageFlags.SuppressNotifications;
    if (flags !== 0) body.flags = flags;

    if (params.replyTo) {
      body.message_reference = {
        message_id: params.replyTo,
        fail_if_not_exists: params.failIfNotExists ?? false,
      };
      if (params.mentionRepliedUser !== undefined) {
        body.allowed_mentions = {
          ...(params.allowedMentions ?? {}),
          replied_user: params.mentionRepliedUser,
        };
      }
    }

    const message = await this.transport.execute<Message>({
      method: 'POST',
      route: Routes.channelMessages,
      params: { channel_id: channelId },
      body,
      files: params.files,
      operation: 'messages.create',
    });

    this.logger.info('Message sent', { channelId, messageId: message.id });
    return message;
  }

  /**
   * Edits a message. Fields left undefined are unchanged.
   */
  async edit(channelId: Snowflake, messageId: Snowflake, params: EditMessageParams): Promise<Message> {
    const errors: string[] = [];
    validateMessageContent(errors, params, { requireContent: false });
    assertValid(errors);

    return this.transport.execute<Message>({
      method: 'PATCH',
      route: Routes.channelMessage,
      params: { channel_id: channelId, message_id: messageId },
      body: toMessageBody(params),
      files: params.files,
      operation: 'messages.edit',
    });
  }

  async delete(channelId: Snowflake, messageId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.channelMessage,
      params: { channel_id: channelId, message_id: messageId },
      reason,
      operation: 'messages.delete',
    });
    this.logger.info('Message deleted', { channelId, messageId });
  }

  /**
   * Deletes 2-100 messages at once. Duplicate IDs are collapsed; messages
   * older than two weeks are refused before sending.
   */
  async bulkDelete(channelId: Snowflake, messageIds: Snowflake[], reason?: string): Promise<void> {
    const errors: string[] = [];
    const unique = [...new Set(messageIds)];

    if (unique.length < MIN_BULK_DELETE || unique.length > MAX_BULK_DELETE) {
      errors.push(`Bulk delete takes between ${MIN_BULK_DELETE} and ${MAX_BULK_DELETE} unique messages`);
    }

    const cutoff = Date.now() - BULK_DELETE_MAX_AGE_MS;
    for (const id of unique) {
      if (!isValidSnowflake(id)) {
        errors.push(`${id} is not a snowflake`);
      } else if (getSnowflakeTimestamp(id) < cutoff) {
        errors.push(`Message ${id} is older than 14 days`);
      }
    }
    assertValid(errors);

    await this.transport.executeVoid({
      method: 'POST',
      route: Routes.channelBulkDelete,
      params: { channel_id: channelId },
      body: { messages: unique },
      reason,
      operation: 'messages.bulkDelete',
    });
    this.logger.info('Messages bulk deleted', { channelId, count: unique.length });
  }

  /**
   * Publishes a message in an announcement channel to following channels.
   */
  async crosspost(channelId: Snowflake, messageId: Snowflake): Promise<Message> {
    return this.transport.execute<Message>({
      method: 'POST',
      route: Routes.channelMessageCrosspost,
      params: { channel_id: channelId, message_id: messageId },
      operation: 'messages.crosspost',
    });
  }
}
