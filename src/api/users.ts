/**
 * User endpoints, mostly about the current (bot) user.
 */

import { ApiResource } from './base.js';
import { assertValid, checkExclusive, checkLength, checkRange, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import { Channel, Connection, Guild, Snowflake, User } from '../types/index.js';

export interface ModifyCurrentUserParams {
  username?: string;
  /** Image data URI, null to remove */
  avatar?: string | null;
  banner?: string | null;
}

export interface CurrentUserGuildsParams {
  before?: Snowflake;
  after?: Snowflake;
  /** 1-200 */
  limit?: number;
  withCounts?: boolean;
}

/**
 * Partial guild returned by the current user's guild listing.
 */
export type PartialGuild = Pick<Guild, 'id' | 'name' | 'icon' | 'features'> & {
  owner: boolean;
  permissions: string;
  approximate_member_count?: number;
  approximate_presence_count?: number;
};

export class UsersApi extends ApiResource {
  async getCurrent(): Promise<User> {
    return this.transport.execute<User>({
      method: 'GET',
      route: Routes.currentUser,
      operation: 'users.getCurrent',
    });
  }

  async get(userId: Snowflake): Promise<User> {
    return this.transport.execute<User>({
      method: 'GET',
      route: Routes.user,
      params: { user_id: userId },
      operation: 'users.get',
    });
  }

  async modifyCurrent(params: ModifyCurrentUserParams): Promise<User> {
    const errors: string[] = [];
    checkLength(errors, 'username', params.username, 2, 32);
    assertValid(errors);

    return this.transport.execute<User>({
      method: 'PATCH',
      route: Routes.currentUser,
      body: params,
      operation: 'users.modifyCurrent',
    });
  }

  async getCurrentGuilds(params: CurrentUserGuildsParams = {}): Promise<PartialGuild[]> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 200);
    checkExclusive(errors, { before: params.before, after: params.after });
    checkSnowflake(errors, 'before', params.before);
    checkSnowflake(errors, 'after', params.after);
    assertValid(errors);

    return this.transport.execute<PartialGuild[]>({
      method: 'GET',
      route: Routes.currentUserGuilds,
      query: {
        before: params.before,
        after: params.after,
        limit: params.limit,
        with_counts: params.withCounts,
      },
      operation: 'users.getCurrentGuilds',
    });
  }

  async leaveGuild(guildId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.currentUserGuild,
      params: { guild_id: guildId },
      operation: 'users.leaveGuild',
    });
    this.logger.info('Left guild', { guildId });
  }

  /**
   * Opens (or returns the existing) DM channel with a user.
   */
  async createDM(recipientId: Snowflake): Promise<Channel> {
    const errors: string[] = [];
    checkSnowflake(errors, 'recipientId', recipientId);
    assertValid(errors);

    const channel = await this.transport.execute<Channel>({
      method: 'POST',
      route: Routes.currentUserChannels,
      body: { recipient_id: recipientId },
      operation: 'users.createDM',
    });
    this.logger.debug('DM channel created/retrieved', { recipientId, channelId: channel.id });
    return channel;
  }

  /**
   * Creates a group DM from users' OAuth2 `gdm.join` access tokens.
   *
   * @param nicks - nicknames by user ID
   */
  async createGroupDM(accessTokens: string[], nicks: Record<Snowflake, string> = {}): Promise<Channel> {
    const errors: string[] = [];
    if (accessTokens.length === 0) {
      errors.push('At least one access token is required');
    }
    if (accessTokens.some((token) => token.trim().length === 0)) {
      errors.push('Access tokens cannot be empty');
    }
    for (const userId of Object.keys(nicks)) {
      checkSnowflake(errors, 'nicks', userId);
    }
    assertValid(errors);

    return this.transport.execute<Channel>({
      method: 'POST',
      route: Routes.currentUserChannels,
      body: { access_tokens: accessTokens, nicks },
      operation: 'users.createGroupDM',
    });
  }

  async getConnections(): Promise<Connection[]> {
    return this.transport.execute<Connection[]>({
      method: 'GET',
      route: Routes.currentUserConnections,
      operation: 'users.getConnections',
    });
  }
}
