/**
 * Guild scheduled event structures.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';
import { GuildMember } from './guild.js';

export enum ScheduledEventPrivacyLevel {
  GuildOnly = 2,
}

export enum ScheduledEventEntityType {
  StageInstance = 1,
  Voice = 2,
  External = 3,
}

export enum ScheduledEventStatus {
  Scheduled = 1,
  Active = 2,
  Completed = 3,
  Canceled = 4,
}

export interface ScheduledEventEntityMetadata {
  /** Where an external event takes place */
  location?: string;
}

export interface GuildScheduledEvent {
  id: Snowflake;
  guild_id: Snowflake;
  /** Null for external events */
  channel_id: Snowflake | null;
  creator_id?: Snowflake | null;
  name: string;
  description?: string | null;
  scheduled_start_time: string;
  /** Required for external events */
  scheduled_end_time: string | null;
  privacy_level: ScheduledEventPrivacyLevel;
  status: ScheduledEventStatus;
  entity_type: ScheduledEventEntityType;
  entity_id: Snowflake | null;
  entity_metadata: ScheduledEventEntityMetadata | null;
  creator?: User;
  /** Present when requested with `with_user_count` */
  user_count?: number;
  image?: string | null;
}

export interface GuildScheduledEventUser {
  guild_scheduled_event_id: Snowflake;
  user: User;
  /** Present when requested with `with_member` */
  member?: GuildMember;
}
