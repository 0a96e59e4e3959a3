/**
 * Message reaction endpoints.
 */

import { ApiResource } from './base.js';
import { assertValid, checkRange, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import { Snowflake, User } from '../types/index.js';

export enum ReactionType {
  Normal = 0,
  Burst = 1,
}

export interface ListReactionsParams {
  /** 1-100 */
  limit?: number;
  after?: Snowflake;
  type?: ReactionType;
}

const CUSTOM_EMOJI_MENTION = /^<a?:(\w+):(\d+)>$/;

/**
 * Normalizes an emoji to the form Discord takes in reaction routes: the
 * unicode character, or `name:id` for custom emojis (mentions such as
 * `<:name:id>` are unwrapped).
 */
export function toReactionEmoji(emoji: string): string {
  const trimmed = emoji.trim();
  const mention = CUSTOM_EMOJI_MENTION.exec(trimmed);
  if (mention) {
    return `${mention[1]}:${mention[2]}`;
  }
  return trimmed;
}

export class ReactionsApi extends ApiResource {
  async add(channelId: Snowflake, messageId: Snowflake, emoji: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.messageOwnReaction,
      params: { channel_id: channelId, message_id: messageId, emoji: toReactionEmoji(emoji) },
      operation: 'reactions.add',
    });
    this.logger.debug('Reaction added', { channelId, messageId, emoji });
  }

  async removeOwn(channelId: Snowflake, messageId: Snowflake, emoji: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.messageOwnReaction,
      params: { channel_id: channelId, message_id: messageId, emoji: toReactionEmoji(emoji) },
      operation: 'reactions.removeOwn',
    });
  }

  async removeUser(
    channelId: Snowflake,
    messageId: Snowflake,
    emoji: string,
    userId: Snowflake
  ): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.messageUserReaction,
      params: {
        channel_id: channelId,
        message_id: messageId,
        emoji: toReactionEmoji(emoji),
        user_id: userId,
      },
      operation: 'reactions.removeUser',
    });
  }

  /**
   * Lists users who reacted with an emoji.
   */
  async list(
    channelId: Snowflake,
    messageId: Snowflake,
    emoji: string,
    params: ListReactionsParams = {}
  ): Promise<User[]> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 100);
    checkSnowflake(errors, 'after', params.after);
    assertValid(errors);

    return this.transport.execute<User[]>({
      method: 'GET',
      route: Routes.messageReaction,
      params: { channel_id: channelId, message_id: messageId, emoji: toReactionEmoji(emoji) },
      query: { limit: params.limit, after: params.after, type: params.type },
      operation: 'reactions.list',
    });
  }

  async removeAll(channelId: Snowflake, messageId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.messageReactions,
      params: { channel_id: channelId, message_id: messageId },
      operation: 'reactions.removeAll',
    });
  }

  async removeEmoji(channelId: Snowflake, messageId: Snowflake, emoji: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.messageReaction,
      params: { channel_id: channelId, message_id: messageId, emoji: toReactionEmoji(emoji) },
      operation: 'reactions.removeEmoji',
    });
  }
}
