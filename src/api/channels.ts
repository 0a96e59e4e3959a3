/**
 * Channel endpoints: settings, permission overwrites, invites, typing, pins,
 * announcement following and group DM recipients.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength, checkRange, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import {
  Channel,
  ChannelType,
  FollowedChannel,
  ForumTag,
  Invite,
  InviteTargetType,
  Message,
  Overwrite,
  OverwriteType,
  Snowflake,
  ThreadAutoArchiveDuration,
} from '../types/index.js';

/**
 * Fields accepted by Modify Channel. Thread-only fields apply to threads.
 */
export interface ModifyChannelPayload {
  name?: string;
  type?: ChannelType;
  position?: number | null;
  topic?: string | null;
  nsfw?: boolean | null;
  rate_limit_per_user?: number | null;
  bitrate?: number | null;
  user_limit?: number | null;
  permission_overwrites?: Overwrite[] | null;
  parent_id?: Snowflake | null;
  rtc_region?: string | null;
  default_auto_archive_duration?: ThreadAutoArchiveDuration | null;
  available_tags?: Array<Partial<ForumTag>>;
  archived?: boolean;
  auto_archive_duration?: ThreadAutoArchiveDuration;
  locked?: boolean;
  invitable?: boolean;
  applied_tags?: Snowflake[];
  flags?: number;
}

export interface EditPermissionParams {
  type: OverwriteType;
  /** Permission bit set as a string */
  allow?: string;
  deny?: string;
}

export interface CreateInviteParams {
  /** Seconds, 0 for never. Discord default 86400 */
  maxAge?: number;
  /** 0 for unlimited */
  maxUses?: number;
  temporary?: boolean;
  unique?: boolean;
  targetType?: InviteTargetType;
  targetUserId?: Snowflake;
  targetApplicationId?: Snowflake;
}

export const MAX_CHANNEL_TOPIC_LENGTH = 1024;
export const MAX_SLOWMODE_SECONDS = 21600;
export const MAX_INVITE_AGE_SECONDS = 604800;

/**
 * Validates the channel fields shared by modify and create.
 */
export function validateChannelPayload(
  errors: string[],
  payload: { name?: string; topic?: string | null; rate_limit_per_user?: number | null }
): void {
  checkLength(errors, 'name', payload.name, 1, 100);
  checkLength(errors, 'topic', payload.topic ?? undefined, 0, MAX_CHANNEL_TOPIC_LENGTH);
  checkRange(errors, 'rate_limit_per_user', payload.rate_limit_per_user ?? undefined, 0, MAX_SLOWMODE_SECONDS);
}

export class ChannelsApi extends ApiResource {
  async get(channelId: Snowflake): Promise<Channel> {
    return this.transport.execute<Channel>({
      method: 'GET',
      route: Routes.channel,
      params: { channel_id: channelId },
      operation: 'channels.get',
    });
  }

  async modify(channelId: Snowflake, payload: ModifyChannelPayload, reason?: string): Promise<Channel> {
    const errors: string[] = [];
    validateChannelPayload(errors, payload);
    assertValid(errors);

    const channel = await this.transport.execute<Channel>({
      method: 'PATCH',
      route: Routes.channel,
      params: { channel_id: channelId },
      body: payload,
      reason,
      operation: 'channels.modify',
    });
    this.logger.info('Channel modified', { channelId });
    return channel;
  }

  /**
   * Deletes a guild channel or closes a DM. Returns the deleted channel.
   */
  async delete(channelId: Snowflake, reason?: string): Promise<Channel> {
    const channel = await this.transport.execute<Channel>({
      method: 'DELETE',
      route: Routes.channel,
      params: { channel_id: channelId },
      reason,
      operation: 'channels.delete',
    });
    this.logger.info('Channel deleted', { channelId });
    return channel;
  }

  async editPermission(
    channelId: Snowflake,
    overwriteId: Snowflake,
    params: EditPermissionParams,
    reason?: string
  ): Promise<void> {
    const errors: string[] = [];
    for (const [name, value] of [['allow', params.allow], ['deny', params.deny]] as const) {
      if (value !== undefined && !/^\d+$/.test(value)) {
        errors.push(`${name} must be a permission bit set`);
      }
    }
    assertValid(errors);

    const body: Record<string, unknown> = { type: params.type };
    if (params.allow !== undefined) body.allow = params.allow;
    if (params.deny !== undefined) body.deny = params.deny;

    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.channelPermission,
      params: { channel_id: channelId, overwrite_id: overwriteId },
      body,
      reason,
      operation: 'channels.editPermission',
    });
  }

  async deletePermission(channelId: Snowflake, overwriteId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.channelPermission,
      params: { channel_id: channelId, overwrite_id: overwriteId },
      reason,
      operation: 'channels.deletePermission',
    });
  }

  async getInvites(channelId: Snowflake): Promise<Invite[]> {
    return this.transport.execute<Invite[]>({
      method: 'GET',
      route: Routes.channelInvites,
      params: { channel_id: channelId },
      operation: 'channels.getInvites',
    });
  }

  async createInvite(channelId: Snowflake, params: CreateInviteParams = {}, reason?: string): Promise<Invite> {
    const errors: string[] = [];
    checkRange(errors, 'maxAge', params.maxAge, 0, MAX_INVITE_AGE_SECONDS);
    checkRange(errors, 'maxUses', params.maxUses, 0, 100);
    checkSnowflake(errors, 'targetUserId', params.targetUserId);
    checkSnowflake(errors, 'targetApplicationId', params.targetApplicationId);
    if (params.targetType === InviteTargetType.Stream && !params.targetUserId) {
      errors.push('Stream invites need targetUserId');
    }
    if (params.targetType === InviteTargetType.EmbeddedApplication && !params.targetApplicationId) {
      errors.push('Embedded application invites need targetApplicationId');
    }
    assertValid(errors);

    const body: Record<string, unknown> = {};
    if (params.maxAge !== undefined) body.max_age = params.maxAge;
    if (params.maxUses !== undefined) body.max_uses = params.maxUses;
    if (params.temporary !== undefined) body.temporary = params.temporary;
    if (params.unique !== undefined) body.unique = params.unique;
    if (params.targetType !== undefined) body.target_type = params.targetType;
    if (params.targetUserId !== undefined) body.target_user_id = params.targetUserId;
    if (params.targetApplicationId !== undefined) {
      body.target_application_id = params.targetApplicationId;
    }

    return this.transport.execute<Invite>({
      method: 'POST',
      route: Routes.channelInvites,
      params: { channel_id: channelId },
      body,
      reason,
      operation: 'channels.createInvite',
    });
  }

  /**
   * Shows the typing indicator for about ten seconds.
   */
  async triggerTyping(channelId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'POST',
      route: Routes.channelTyping,
      params: { channel_id: channelId },
      operation: 'channels.triggerTyping',
    });
  }

  async getPinnedMessages(channelId: Snowflake): Promise<Message[]> {
    return this.transport.execute<Message[]>({
      method: 'GET',
      route: Routes.channelPins,
      params: { channel_id: channelId },
      operation: 'channels.getPinnedMessages',
    });
  }

  async pinMessage(channelId: Snowflake, messageId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.channelPin,
      params: { channel_id: channelId, message_id: messageId },
      reason,
      operation: 'channels.pinMessage',
    });
  }

  async unpinMessage(channelId: Snowflake, messageId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.channelPin,
      params: { channel_id: channelId, message_id: messageId },
      reason,
      operation: 'channels.unpinMessage',
    });
  }

  /**
   * Follows an announcement channel, delivering its crossposts to
   * `webhookChannelId`.
   */
  async follow(channelId: Snowflake, webhookChannelId: Snowflake, reason?: string): Promise<FollowedChannel> {
    const errors: string[] = [];
    checkSnowflake(errors, 'webhookChannelId', webhookChannelId);
    assertValid(errors);

    return this.transport.execute<FollowedChannel>({
      method: 'POST',
      route: Routes.channelFollowers,
      params: { channel_id: channelId },
      body: { webhook_channel_id: webhookChannelId },
      reason,
      operation: 'channels.follow',
    });
  }

  /**
   * Adds a user to a group DM the bot created with `users.createGroupDM`.
   *
   * @param accessToken - OAuth2 token of the user, granted the `gdm.join` scope
   */
  async addGroupRecipient(
    channelId: Snowflake,
    userId: Snowflake,
    accessToken: string,
    nick?: string
  ): Promise<void> {
    const errors: string[] = [];
    if (accessToken.trim().length === 0) {
      errors.push('Access tokens cannot be empty');
    }
    assertValid(errors);

    const body: Record<string, unknown> = { access_token: accessToken };
    if (nick !== undefined) body.nick = nick;
    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.channelRecipient,
      params: { channel_id: channelId, user_id: userId },
      body,
      operation: 'channels.addGroupRecipient',
    });
  }

  async removeGroupRecipient(channelId: Snowflake, userId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.channelRecipient,
      params: { channel_id: channelId, user_id: userId },
      operation: 'channels.removeGroupRecipient',
    });
  }
}
