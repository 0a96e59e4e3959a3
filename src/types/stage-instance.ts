/**
 * Stage instance structures.
 */

import { Snowflake } from './snowflake.js';

export enum StagePrivacyLevel {
  /** Deprecated by Discord; kept for reading older instances */
  Public = 1,
  GuildOnly = 2,
}

export interface StageInstance {
  id: Snowflake;
  guild_id: Snowflake;
  channel_id: Snowflake;
  topic: string;
  privacy_level: StagePrivacyLevel;
  discoverable_disabled?: boolean;
  guild_scheduled_event_id: Snowflake | null;
}
