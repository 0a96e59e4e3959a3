/**
 * Discord channel, thread and invite structures.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';
import { Guild, GuildMember } from './guild.js';

export enum ChannelType {
  GuildText = 0,
  DM = 1,
  GuildVoice = 2,
  GroupDM = 3,
  GuildCategory = 4,
  GuildAnnouncement = 5,
  AnnouncementThread = 10,
  PublicThread = 11,
  PrivateThread = 12,
  GuildStageVoice = 13,
  GuildDirectory = 14,
  GuildForum = 15,
  GuildMedia = 16,
}

/**
 * Thread auto-archive duration in minutes.
 */
export enum ThreadAutoArchiveDuration {
  OneHour = 60,
  OneDay = 1440,
  ThreeDays = 4320,
  OneWeek = 10080,
}

export enum OverwriteType {
  Role = 0,
  Member = 1,
}

/**
 * Permission overwrite; `allow` and `deny` are permission bit sets as strings.
 */
export interface Overwrite {
  id: Snowflake;
  type: OverwriteType;
  allow: string;
  deny: string;
}

export interface ThreadMetadata {
  archived: boolean;
  auto_archive_duration: ThreadAutoArchiveDuration;
  archive_timestamp: string;
  locked: boolean;
  invitable?: boolean;
  create_timestamp?: string | null;
}

export interface ThreadMember {
  id?: Snowflake;
  user_id?: Snowflake;
  join_timestamp: string;
  flags: number;
  /** Present when listed with `with_member` */
  member?: GuildMember;
}

export interface ForumTag {
  id: Snowflake;
  name: string;
  moderated: boolean;
  emoji_id: Snowflake | null;
  emoji_name: string | null;
}

export interface Channel {
  id: Snowflake;
  type: ChannelType;
  guild_id?: Snowflake;
  position?: number;
  permission_overwrites?: Overwrite[];
  name?: string | null;
  topic?: string | null;
  nsfw?: boolean;
  last_message_id?: Snowflake | null;
  bitrate?: number;
  user_limit?: number;
  /** Slowmode delay in seconds */
  rate_limit_per_user?: number;
  recipients?: User[];
  icon?: string | null;
  owner_id?: Snowflake;
  application_id?: Snowflake;
  parent_id?: Snowflake | null;
  last_pin_timestamp?: string | null;
  rtc_region?: string | null;
  message_count?: number;
  member_count?: number;
  thread_metadata?: ThreadMetadata;
  member?: ThreadMember;
  default_auto_archive_duration?: ThreadAutoArchiveDuration;
  default_thread_rate_limit_per_user?: number;
  flags?: number;
  available_tags?: ForumTag[];
  applied_tags?: Snowflake[];
}

/**
 * Result of the thread listing endpoints.
 */
export interface ThreadList {
  threads: Channel[];
  /** Thread member objects for threads the current user has joined */
  members: ThreadMember[];
  /** Only present on archived listings */
  has_more?: boolean;
}

export interface FollowedChannel {
  channel_id: Snowflake;
  webhook_id: Snowflake;
}

export enum InviteTargetType {
  Stream = 1,
  EmbeddedApplication = 2,
}

export interface Invite {
  code: string;
  guild?: Partial<Guild>;
  channel: Partial<Channel> | null;
  inviter?: User;
  target_type?: InviteTargetType;
  target_user?: User;
  approximate_presence_count?: number;
  approximate_member_count?: number;
  expires_at?: string | null;
  /** Metadata, present on channel and guild invite listings */
  uses?: number;
  max_uses?: number;
  max_age?: number;
  temporary?: boolean;
  created_at?: string;
}

const TEXT_CHANNEL_TYPES: ReadonlySet<ChannelType> = new Set([
  ChannelType.GuildText,
  ChannelType.DM,
  ChannelType.GroupDM,
  ChannelType.GuildAnnouncement,
  ChannelType.AnnouncementThread,
  ChannelType.PublicThread,
  ChannelType.PrivateThread,
  ChannelType.GuildVoice,
  ChannelType.GuildStageVoice,
]);

const THREAD_TYPES: ReadonlySet<ChannelType> = new Set([
  ChannelType.AnnouncementThread,
  ChannelType.PublicThread,
  ChannelType.PrivateThread,
]);

/**
 * Whether messages can be sent to the channel.
 */
export function isTextChannel(channel: Pick<Channel, 'type'>): boolean {
  return TEXT_CHANNEL_TYPES.has(channel.type);
}

export function isThread(channel: Pick<Channel, 'type'>): boolean {
  return THREAD_TYPES.has(channel.type);
}

export function isDMChannel(channel: Pick<Channel, 'type'>): boolean {
  return channel.type === ChannelType.DM || channel.type === ChannelType.GroupDM;
}
