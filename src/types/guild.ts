/**
 * Discord guild, member, role, ban and emoji structures.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';

export enum VerificationLevel {
  None = 0,
  Low = 1,
  Medium = 2,
  High = 3,
  VeryHigh = 4,
}

export enum DefaultMessageNotificationLevel {
  AllMessages = 0,
  OnlyMentions = 1,
}

export enum ExplicitContentFilterLevel {
  Disabled = 0,
  MembersWithoutRoles = 1,
  AllMembers = 2,
}

/**
 * Role tags (bot, integration, premium subscriber).
 */
export interface RoleTags {
  bot_id?: Snowflake;
  integration_id?: Snowflake;
  premium_subscriber?: null;
}

export interface Role {
  id: Snowflake;
  name: string;
  color: number;
  hoist: boolean;
  icon?: string | null;
  unicode_emoji?: string | null;
  position: number;
  /** Permission bit set, serialized as a string */
  permissions: string;
  managed: boolean;
  mentionable: boolean;
  tags?: RoleTags;
  flags?: number;
}

export interface Emoji {
  id: Snowflake | null;
  name: string | null;
  roles?: Snowflake[];
  user?: User;
  require_colons?: boolean;
  managed?: boolean;
  animated?: boolean;
  available?: boolean;
}

export interface GuildMember {
  user?: User;
  nick?: string | null;
  avatar?: string | null;
  roles: Snowflake[];
  joined_at: string;
  premium_since?: string | null;
  deaf: boolean;
  mute: boolean;
  flags?: number;
  pending?: boolean;
  permissions?: string;
  communication_disabled_until?: string | null;
}

export interface Ban {
  reason: string | null;
  user: User;
}

export interface Guild {
  id: Snowflake;
  name: string;
  icon: string | null;
  splash: string | null;
  discovery_splash: string | null;
  owner_id: Snowflake;
  afk_channel_id: Snowflake | null;
  afk_timeout: number;
  widget_enabled?: boolean;
  widget_channel_id?: Snowflake | null;
  verification_level: VerificationLevel;
  default_message_notifications: DefaultMessageNotificationLevel;
  explicit_content_filter: ExplicitContentFilterLevel;
  roles: Role[];
  emojis: Emoji[];
  features: string[];
  mfa_level: number;
  application_id: Snowflake | null;
  system_channel_id: Snowflake | null;
  system_channel_flags: number;
  rules_channel_id: Snowflake | null;
  max_members?: number;
  vanity_url_code: string | null;
  description: string | null;
  banner: string | null;
  premium_tier: number;
  premium_subscription_count?: number;
  preferred_locale: string;
  public_updates_channel_id: Snowflake | null;
  nsfw_level: number;
  /** Present when fetched with `with_counts` */
  approximate_member_count?: number;
  approximate_presence_count?: number;
}

export interface GuildPreview {
  id: Snowflake;
  name: string;
  icon: string | null;
  splash: string | null;
  discovery_splash: string | null;
  emojis: Emoji[];
  features: string[];
  approximate_member_count: number;
  approximate_presence_count: number;
  description: string | null;
}

export interface PruneResult {
  /** Null when `compute_prune_count` was false */
  pruned: number | null;
}

export interface IntegrationAccount {
  id: string;
  name: string;
}

export interface Integration {
  id: Snowflake;
  name: string;
  type: 'twitch' | 'youtube' | 'discord' | 'guild_subscription';
  enabled: boolean;
  syncing?: boolean;
  role_id?: Snowflake;
  expire_behavior?: number;
  expire_grace_period?: number;
  user?: User;
  account: IntegrationAccount;
  synced_at?: string;
  revoked?: boolean;
}

export interface WidgetSettings {
  enabled: boolean;
  channel_id: Snowflake | null;
}

/**
 * Public widget, readable without authentication when the widget is enabled.
 */
export interface GuildWidget {
  id: Snowflake;
  name: string;
  instant_invite: string | null;
  channels: Array<{ id: Snowflake; name: string; position: number }>;
  members: Array<Partial<User>>;
  presence_count: number;
}

/**
 * Rules screen shown to new members before they can talk.
 */
export interface MembershipScreening {
  version: string;
  form_fields: Array<{
    field_type: 'TERMS';
    label: string;
    values?: string[];
    required: boolean;
  }>;
  description: string | null;
}

export interface WelcomeScreenChannel {
  channel_id: Snowflake;
  description: string;
  emoji_id: Snowflake | null;
  emoji_name: string | null;
}

export interface WelcomeScreen {
  description: string | null;
  welcome_channels: WelcomeScreenChannel[];
}

export interface VanityUrl {
  code: string | null;
  uses: number;
}

export interface VoiceRegion {
  id: string;
  name: string;
  optimal: boolean;
  deprecated: boolean;
  custom: boolean;
}

export interface AuditLogChange {
  key: string;
  new_value?: unknown;
  old_value?: unknown;
}

export interface AuditLogEntry {
  id: Snowflake;
  target_id: string | null;
  changes?: AuditLogChange[];
  user_id: Snowflake | null;
  action_type: number;
  options?: Record<string, string>;
  reason?: string;
}

export interface AuditLog {
  audit_log_entries: AuditLogEntry[];
  users: User[];
  integrations: Array<Partial<Integration>>;
  webhooks: Array<Record<string, unknown>>;
  threads: Array<Record<string, unknown>>;
  application_commands: Array<Record<string, unknown>>;
  auto_moderation_rules: Array<Record<string, unknown>>;
  guild_scheduled_events: Array<Record<string, unknown>>;
}

/** Discord's upper bound for delete-message days on ban */
export const MAX_BAN_DELETE_MESSAGE_DAYS = 7;

/** Prune inactivity window, in days */
export const MIN_PRUNE_DAYS = 1;
export const MAX_PRUNE_DAYS = 30;
