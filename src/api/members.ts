/**
 * Guild member endpoints.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength, checkRange, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import { GuildMember, Snowflake } from '../types/index.js';

export interface ListMembersParams {
  /** 1-1000 */
  limit?: number;
  /** Highest user ID of the previous page */
  after?: Snowflake;
}

export interface AddMemberParams {
  /** OAuth2 access token with the `guilds.join` scope */
  accessToken: string;
  nick?: string;
  roles?: Snowflake[];
  mute?: boolean;
  deaf?: boolean;
}

export interface ModifyMemberPayload {
  nick?: string | null;
  roles?: Snowflake[] | null;
  mute?: boolean | null;
  deaf?: boolean | null;
  /** Voice channel to move the member to, null to disconnect */
  channel_id?: Snowflake | null;
  /** ISO8601 timeout end, null to lift it */
  communication_disabled_until?: string | null;
  flags?: number | null;
}

/** Discord caps timeouts at 28 days */
export const MAX_TIMEOUT_MS = 28 * 24 * 60 * 60 * 1000;

export class MembersApi extends ApiResource {
  async get(guildId: Snowflake, userId: Snowflake): Promise<GuildMember> {
    return this.transport.execute<GuildMember>({
      method: 'GET',
      route: Routes.guildMember,
      params: { guild_id: guildId, user_id: userId },
      operation: 'members.get',
    });
  }

  /**
   * Lists members ordered by user ID. Needs the guild members intent.
   */
  async list(guildId: Snowflake, params: ListMembersParams = {}): Promise<GuildMember[]> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 1000);
    checkSnowflake(errors, 'after', params.after);
    assertValid(errors);

    return this.transport.execute<GuildMember[]>({
      method: 'GET',
      route: Routes.guildMembers,
      params: { guild_id: guildId },
      query: { limit: params.limit, after: params.after },
      operation: 'members.list',
    });
  }

  /**
   * Finds members whose username or nickname starts with `query`.
   */
  async search(guildId: Snowflake, query: string, limit: number = 1): Promise<GuildMember[]> {
    const errors: string[] = [];
    if (query.trim().length === 0) {
      errors.push('query cannot be empty');
    }
    checkRange(errors, 'limit', limit, 1, 1000);
    assertValid(errors);

    return this.transport.execute<GuildMember[]>({
      method: 'GET',
      route: Routes.guildMembersSearch,
      params: { guild_id: guildId },
      query: { query, limit },
      operation: 'members.search',
    });
  }

  /**
   * Adds a user to the guild through their OAuth2 grant. Resolves to
   * `undefined` when the user was already a member.
   */
  async add(guildId: Snowflake, userId: Snowflake, params: AddMemberParams): Promise<GuildMember | undefined> {
    const errors: string[] = [];
    if (params.accessToken.trim().length === 0) {
      errors.push('accessToken cannot be empty');
    }
    checkLength(errors, 'nick', params.nick, 1, 32);
    for (const roleId of params.roles ?? []) {
      checkSnowflake(errors, 'roles', roleId);
    }
    assertValid(errors);

    const body: Record<string, unknown> = { access_token: params.accessToken };
    if (params.nick !== undefined) body.nick = params.nick;
    if (params.roles !== undefined) body.roles = params.roles;
    if (params.mute !== undefined) body.mute = params.mute;
    if (params.deaf !== undefined) body.deaf = params.deaf;

    const member = await this.transport.executeOptional<GuildMember>({
      method: 'PUT',
      route: Routes.guildMember,
      params: { guild_id: guildId, user_id: userId },
      body,
      operation: 'members.add',
    });
    this.logger.info('Member added', { guildId, userId, alreadyMember: member === undefined });
    return member;
  }

  async modify(
    guildId: Snowflake,
    userId: Snowflake,
    payload: ModifyMemberPayload,
    reason?: string
  ): Promise<GuildMember> {
    const errors: string[] = [];
    checkLength(errors, 'nick', payload.nick ?? undefined, 1, 32);
    checkSnowflake(errors, 'channel_id', payload.channel_id ?? undefined);
    if (payload.communication_disabled_until) {
      const until = Date.parse(payload.communication_disabled_until);
      if (Number.isNaN(until)) {
        errors.push('communication_disabled_until must be an ISO8601 timestamp');
      } else if (until - Date.now() > MAX_TIMEOUT_MS) {
        errors.push('Timeouts cannot exceed 28 days');
      }
    }
    assertValid(errors);

    return this.transport.execute<GuildMember>({
      method: 'PATCH',
      route: Routes.guildMember,
      params: { guild_id: guildId, user_id: userId },
      body: payload,
      reason,
      operation: 'members.modify',
    });
  }

  /**
   * Changes the bot's own nickname.
   */
  async modifyCurrent(guildId: Snowflake, nick: string | null, reason?: string): Promise<GuildMember> {
    const errors: string[] = [];
    checkLength(errors, 'nick', nick ?? undefined, 1, 32);
    assertValid(errors);

    return this.transport.execute<GuildMember>({
      method: 'PATCH',
      route: Routes.guildCurrentMember,
      params: { guild_id: guildId },
      body: { nick },
      reason,
      operation: 'members.modifyCurrent',
    });
  }

  /**
   * Kicks a member.
   */
  async remove(guildId: Snowflake, userId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildMember,
      params: { guild_id: guildId, user_id: userId },
      reason,
      operation: 'members.remove',
    });
    this.logger.info('Member removed', { guildId, userId });
  }

  async addRole(guildId: Snowflake, userId: Snowflake, roleId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.guildMemberRole,
      params: { guild_id: guildId, user_id: userId, role_id: roleId },
      reason,
      operation: 'members.addRole',
    });
  }

  async removeRole(guildId: Snowflake, userId: Snowflake, roleId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildMemberRole,
      params: { guild_id: guildId, user_id: userId, role_id: roleId },
      reason,
      operation: 'members.removeRole',
    });
  }
}
