/**
 * Guild endpoints: guild settings, channels, bans, pruning, audit log,
 * integrations, widget, vanity URL, welcome and membership screens, and
 * voice states.
 */

import { ApiResource } from './base.js';
import {
  assertValid,
  checkExclusive,
  checkLength,
  checkRange,
  checkSnowflake,
  toIsoTimestamp,
} from './validation.js';
import { ModifyChannelPayload, validateChannelPayload } from './channels.js';
import { Routes } from '../routes/index.js';
import {
  AuditLog,
  Ban,
  Channel,
  ChannelType,
  DefaultMessageNotificationLevel,
  ExplicitContentFilterLevel,
  Guild,
  GuildPreview,
  GuildWidget,
  Integration,
  Invite,
  MembershipScreening,
  PruneResult,
  Role,
  Snowflake,
  VanityUrl,
  VerificationLevel,
  VoiceRegion,
  WelcomeScreen,
  WelcomeScreenChannel,
  WidgetSettings,
  MAX_BAN_DELETE_MESSAGE_DAYS,
  MAX_PRUNE_DAYS,
  MIN_PRUNE_DAYS,
} from '../types/index.js';

const SECONDS_PER_DAY = 86400;

export interface CreateGuildPayload {
  /** 2-100 characters */
  name: string;
  /** Image data URI */
  icon?: string;
  verification_level?: VerificationLevel;
  default_message_notifications?: DefaultMessageNotificationLevel;
  explicit_content_filter?: ExplicitContentFilterLevel;
  /** The first role is the @everyone role */
  roles?: Array<Partial<Role>>;
  /** Placeholder IDs may be used to link categories */
  channels?: Array<Partial<Channel>>;
  afk_channel_id?: Snowflake;
  afk_timeout?: number;
  system_channel_id?: Snowflake;
  system_channel_flags?: number;
}

export interface ModifyGuildPayload {
  name?: string;
  verification_level?: VerificationLevel | null;
  default_message_notifications?: DefaultMessageNotificationLevel | null;
  explicit_content_filter?: ExplicitContentFilterLevel | null;
  afk_channel_id?: Snowflake | null;
  afk_timeout?: number;
  icon?: string | null;
  owner_id?: Snowflake;
  splash?: string | null;
  discovery_splash?: string | null;
  banner?: string | null;
  system_channel_id?: Snowflake | null;
  system_channel_flags?: number;
  rules_channel_id?: Snowflake | null;
  public_updates_channel_id?: Snowflake | null;
  preferred_locale?: string | null;
  features?: string[];
  description?: string | null;
  premium_progress_bar_enabled?: boolean;
}

export type CreateGuildChannelPayload = ModifyChannelPayload & {
  name: string;
  type?: ChannelType;
};

export interface ChannelPositionUpdate {
  id: Snowflake;
  position?: number | null;
  lock_permissions?: boolean | null;
  parent_id?: Snowflake | null;
}

export interface ListBansParams {
  /** 1-1000 */
  limit?: number;
  before?: Snowflake;
  after?: Snowflake;
}

export interface CreateBanParams {
  /** Days of the user's messages to delete, 0-7 */
  deleteMessageDays?: number;
  reason?: string;
}

export interface PruneCountParams {
  /** Inactivity window in days, 1-30. Discord defaults to 7 */
  days?: number;
  /** Also prune members with these roles */
  includeRoles?: Snowflake[];
}

export interface BeginPruneParams extends PruneCountParams {
  /** Large guilds should pass false; the result is then null */
  computePruneCount?: boolean;
  reason?: string;
}

export interface AuditLogParams {
  userId?: Snowflake;
  actionType?: number;
  before?: Snowflake;
  after?: Snowflake;
  /** 1-100 */
  limit?: number;
}

export interface ModifyWelcomeScreenPayload {
  enabled?: boolean | null;
  welcome_channels?: WelcomeScreenChannel[] | null;
  description?: string | null;
}

function validatePrune(errors: string[], params: PruneCountParams): void {
  checkRange(errors, 'days', params.days, MIN_PRUNE_DAYS, MAX_PRUNE_DAYS);
  for (const roleId of params.includeRoles ?? []) {
    checkSnowflake(errors, 'includeRoles', roleId);
  }
}

export interface ModifyMembershipScreeningPayload {
  enabled?: boolean;
  form_fields?: MembershipScreening['form_fields'];
  description?: string | null;
}

export interface ModifyCurrentVoiceStatePayload {
  /** Stage channel the bot is in */
  channel_id?: Snowflake;
  suppress?: boolean;
  /** Raises or, with `null`, lowers the bot's hand */
  request_to_speak_timestamp?: Date | string | null;
}

export interface ModifyVoiceStatePayload {
  /** Stage channel the user is in */
  channel_id: Snowflake;
  suppress?: boolean;
}

export class GuildsApi extends ApiResource {
  /**
   * @param withCounts - include approximate member and presence counts
   */
  async get(guildId: Snowflake, withCounts: boolean = false): Promise<Guild> {
    return this.transport.execute<Guild>({
      method: 'GET',
      route: Routes.guild,
      params: { guild_id: guildId },
      query: { with_counts: withCounts || undefined },
      operation: 'guilds.get',
    });
  }

  async getPreview(guildId: Snowflake): Promise<GuildPreview> {
    return this.transport.execute<GuildPreview>({
      method: 'GET',
      route: Routes.guildPreview,
      params: { guild_id: guildId },
      operation: 'guilds.getPreview',
    });
  }

  /**
   * Creates a guild owned by the bot. Only bots in fewer than ten guilds may.
   */
  async create(payload: CreateGuildPayload): Promise<Guild> {
    const errors: string[] = [];
    checkLength(errors, 'name', payload.name, 2, 100);
    assertValid(errors);

    const guild = await this.transport.execute<Guild>({
      method: 'POST',
      route: Routes.guilds,
      body: payload,
      operation: 'guilds.create',
    });
    this.logger.info('Guild created', { guildId: guild.id });
    return guild;
  }

  async modify(guildId: Snowflake, payload: ModifyGuildPayload, reason?: string): Promise<Guild> {
    const errors: string[] = [];
    checkLength(errors, 'name', payload.name, 2, 100);
    checkSnowflake(errors, 'owner_id', payload.owner_id);
    assertValid(errors);

    return this.transport.execute<Guild>({
      method: 'PATCH',
      route: Routes.guild,
      params: { guild_id: guildId },
      body: payload,
      reason,
      operation: 'guilds.modify',
    });
  }

  /**
   * Deletes a guild. The bot must own it.
   */
  async delete(guildId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guild,
      params: { guild_id: guildId },
      operation: 'guilds.delete',
    });
    this.logger.info('Guild deleted', { guildId });
  }

  async getChannels(guildId: Snowflake): Promise<Channel[]> {
    return this.transport.execute<Channel[]>({
      method: 'GET',
      route: Routes.guildChannels,
      params: { guild_id: guildId },
      operation: 'guilds.getChannels',
    });
  }

  async createChannel(guildId: Snowflake, payload: CreateGuildChannelPayload, reason?: string): Promise<Channel> {
    const errors: string[] = [];
    validateChannelPayload(errors, payload);
    checkSnowflake(errors, 'parent_id', payload.parent_id ?? undefined);
    assertValid(errors);

    const channel = await this.transport.execute<Channel>({
      method: 'POST',
      route: Routes.guildChannels,
      params: { guild_id: guildId },
      body: payload,
      reason,
      operation: 'guilds.createChannel',
    });
    this.logger.info('Channel created', { guildId, channelId: channel.id });
    return channel;
  }

  async modifyChannelPositions(
    guildId: Snowflake,
    positions: ChannelPositionUpdate[],
    reason?: string
  ): Promise<void> {
    const errors: string[] = [];
    if (positions.length === 0) {
      errors.push('At least one channel position is required');
    }
    for (const update of positions) {
      checkSnowflake(errors, 'id', update.id);
    }
    assertValid(errors);

    await this.transport.executeVoid({
      method: 'PATCH',
      route: Routes.guildChannels,
      params: { guild_id: guildId },
      body: positions,
      reason,
      operation: 'guilds.modifyChannelPositions',
    });
  }

  async getBans(guildId: Snowflake, params: ListBansParams = {}): Promise<Ban[]> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 1000);
    checkExclusive(errors, { before: params.before, after: params.after });
    checkSnowflake(errors, 'before', params.before);
    checkSnowflake(errors, 'after', params.after);
    assertValid(errors);

    return this.transport.execute<Ban[]>({
      method: 'GET',
      route: Routes.guildBans,
      params: { guild_id: guildId },
      query: { limit: params.limit, before: params.before, after: params.after },
      operation: 'guilds.getBans',
    });
  }

  async getBan(guildId: Snowflake, userId: Snowflake): Promise<Ban> {
    return this.transport.execute<Ban>({
      method: 'GET',
      route: Routes.guildBan,
      params: { guild_id: guildId, user_id: userId },
      operation: 'guilds.getBan',
    });
  }

  /**
   * Bans a user, optionally deleting up to seven days of their messages.
   */
  async createBan(guildId: Snowflake, userId: Snowflake, params: CreateBanParams = {}): Promise<void> {
    const errors: string[] = [];
    checkRange(errors, 'deleteMessageDays', params.deleteMessageDays, 0, MAX_BAN_DELETE_MESSAGE_DAYS);
    assertValid(errors);

    const body: Record<string, unknown> = {};
    if (params.deleteMessageDays !== undefined) {
      body.delete_message_seconds = params.deleteMessageDays * SECONDS_PER_DAY;
    }

    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.guildBan,
      params: { guild_id: guildId, user_id: userId },
      body,
      reason: params.reason,
      operation: 'guilds.createBan',
    });
    this.logger.info('User banned', { guildId, userId });
  }

  async removeBan(guildId: Snowflake, userId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildBan,
      params: { guild_id: guildId, user_id: userId },
      reason,
      operation: 'guilds.removeBan',
    });
    this.logger.info('User unbanned', { guildId, userId });
  }

  /**
   * Counts members a prune with these parameters would remove.
   */
  async getPruneCount(guildId: Snowflake, params: PruneCountParams = {}): Promise<PruneResult> {
    const errors: string[] = [];
    validatePrune(errors, params);
    assertValid(errors);

    return this.transport.execute<PruneResult>({
      method: 'GET',
      route: Routes.guildPrune,
      params: { guild_id: guildId },
      query: { days: params.days, include_roles: params.includeRoles },
      operation: 'guilds.getPruneCount',
    });
  }

  async beginPrune(guildId: Snowflake, params: BeginPruneParams = {}): Promise<PruneResult> {
    const errors: string[] = [];
    validatePrune(errors, params);
    assertValid(errors);

    const result = await this.transport.execute<PruneResult>({
      method: 'POST',
      route: Routes.guildPrune,
      params: { guild_id: guildId },
      query: {
        days: params.days,
        compute_prune_count: params.computePruneCount,
        include_roles: params.includeRoles,
      },
      reason: params.reason,
      operation: 'guilds.beginPrune',
    });
    this.logger.info('Guild pruned', { guildId, pruned: result.pruned });
    return result;
  }

  async getAuditLog(guildId: Snowflake, params: AuditLogParams = {}): Promise<AuditLog> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 100);
    checkExclusive(errors, { before: params.before, after: params.after });
    checkSnowflake(errors, 'userId', params.userId);
    checkSnowflake(errors, 'before', params.before);
    checkSnowflake(errors, 'after', params.after);
    assertValid(errors);

    return this.transport.execute<AuditLog>({
      method: 'GET',
      route: Routes.guildAuditLog,
      params: { guild_id: guildId },
      query: {
        user_id: params.userId,
        action_type: params.actionType,
        before: params.before,
        after: params.after,
        limit: params.limit,
      },
      operation: 'guilds.getAuditLog',
    });
  }

  async getVoiceRegions(guildId: Snowflake): Promise<VoiceRegion[]> {
    return this.transport.execute<VoiceRegion[]>({
      method: 'GET',
      route: Routes.guildRegions,
      params: { guild_id: guildId },
      operation: 'guilds.getVoiceRegions',
    });
  }

  async getInvites(guildId: Snowflake): Promise<Invite[]> {
    return this.transport.execute<Invite[]>({
      method: 'GET',
      route: Routes.guildInvites,
      params: { guild_id: guildId },
      operation: 'guilds.getInvites',
    });
  }

  async getIntegrations(guildId: Snowflake): Promise<Integration[]> {
    return this.transport.execute<Integration[]>({
      method: 'GET',
      route: Routes.guildIntegrations,
      params: { guild_id: guildId },
      operation: 'guilds.getIntegrations',
    });
  }

  async deleteIntegration(guildId: Snowflake, integrationId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildIntegration,
      params: { guild_id: guildId, integration_id: integrationId },
      reason,
      operation: 'guilds.deleteIntegration',
    });
  }

  async getWidgetSettings(guildId: Snowflake): Promise<WidgetSettings> {
    return this.transport.execute<WidgetSettings>({
      method: 'GET',
      route: Routes.guildWidget,
      params: { guild_id: guildId },
      operation: 'guilds.getWidgetSettings',
    });
  }

  async modifyWidget(
    guildId: Snowflake,
    settings: Partial<WidgetSettings>,
    reason?: string
  ): Promise<WidgetSettings> {
    const errors: string[] = [];
    checkSnowflake(errors, 'channel_id', settings.channel_id ?? undefined);
    assertValid(errors);

    return this.transport.execute<WidgetSettings>({
      method: 'PATCH',
      route: Routes.guildWidget,
      params: { guild_id: guildId },
      body: settings,
      reason,
      operation: 'guilds.modifyWidget',
    });
  }

  async getVanityUrl(guildId: Snowflake): Promise<VanityUrl> {
    return this.transport.execute<VanityUrl>({
      method: 'GET',
      route: Routes.guildVanityUrl,
      params: { guild_id: guildId },
      operation: 'guilds.getVanityUrl',
    });
  }

  async getWelcomeScreen(guildId: Snowflake): Promise<WelcomeScreen> {
    return this.transport.execute<WelcomeScreen>({
      method: 'GET',
      route: Routes.guildWelcomeScreen,
      params: { guild_id: guildId },
      operation: 'guilds.getWelcomeScreen',
    });
  }

  async modifyWelcomeScreen(
    guildId: Snowflake,
    payload: ModifyWelcomeScreenPayload,
    reason?: string
  ): Promise<WelcomeScreen> {
    const errors: string[] = [];
    if (payload.welcome_channels && payload.welcome_channels.length > 5) {
      errors.push('A welcome screen shows at most 5 channels');
    }
    checkLength(errors, 'description', payload.description ?? undefined, 0, 140);
    assertValid(errors);

    return this.transport.execute<WelcomeScreen>({
      method: 'PATCH',
      route: Routes.guildWelcomeScreen,
      params: { guild_id: guildId },
      body: payload,
      reason,
      operation: 'guilds.modifyWelcomeScreen',
    });
  }

  /**
   * Reads the public widget. Sent without the bot token; fails with 403
   * unless the widget is enabled.
   */
  async getWidget(guildId: Snowflake): Promise<GuildWidget> {
    return this.transport.execute<GuildWidget>({
      method: 'GET',
      route: Routes.guildWidgetJson,
      params: { guild_id: guildId },
      auth: false,
      operation: 'guilds.getWidget',
    });
  }

  async getMembershipScreening(guildId: Snowflake): Promise<MembershipScreening> {
    return this.transport.execute<MembershipScreening>({
      method: 'GET',
      route: Routes.guildMemberVerification,
      params: { guild_id: guildId },
      operation: 'guilds.getMembershipScreening',
    });
  }

  async modifyMembershipScreening(
    guildId: Snowflake,
    payload: ModifyMembershipScreeningPayload,
    reason?: string
  ): Promise<MembershipScreening> {
    const errors: string[] = [];
    for (const field of payload.form_fields ?? []) {
      checkLength(errors, 'form_fields.label', field.label, 1, 300);
    }
    assertValid(errors);

    return this.transport.execute<MembershipScreening>({
      method: 'PATCH',
      route: Routes.guildMemberVerification,
      params: { guild_id: guildId },
      body: payload,
      reason,
      operation: 'guilds.modifyMembershipScreening',
    });
  }

  async modifyCurrentVoiceState(guildId: Snowflake, payload: ModifyCurrentVoiceStatePayload): Promise<void> {
    const errors: string[] = [];
    checkSnowflake(errors, 'channel_id', payload.channel_id);
    const body: Record<string, unknown> = {};
    if (payload.channel_id !== undefined) body.channel_id = payload.channel_id;
    if (payload.suppress !== undefined) body.suppress = payload.suppress;
    if (payload.request_to_speak_timestamp === null) {
      body.request_to_speak_timestamp = null;
    } else if (payload.request_to_speak_timestamp !== undefined) {
      body.request_to_speak_timestamp = toIsoTimestamp(
        errors,
        'request_to_speak_timestamp',
        payload.request_to_speak_timestamp
      );
    }
    assertValid(errors);

    await this.transport.executeVoid({
      method: 'PATCH',
      route: Routes.guildCurrentVoiceState,
      params: { guild_id: guildId },
      body,
      operation: 'guilds.modifyCurrentVoiceState',
    });
  }

  /**
   * Suppresses or unsuppresses another user in a stage channel.
   */
  async modifyVoiceState(guildId: Snowflake, userId: Snowflake, payload: ModifyVoiceStatePayload): Promise<void> {
    const errors: string[] = [];
    checkSnowflake(errors, 'channel_id', payload.channel_id);
    assertValid(errors);

    await this.transport.executeVoid({
      method: 'PATCH',
      route: Routes.guildVoiceState,
      params: { guild_id: guildId, user_id: userId },
      body: payload,
      operation: 'guilds.modifyVoiceState',
    });
  }
}
