/**
 * Guild template structures.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';
import { Guild } from './guild.js';

export interface GuildTemplate {
  code: string;
  name: string;
  description: string | null;
  usage_count: number;
  creator_id: Snowflake;
  creator: User;
  created_at: string;
  updated_at: string;
  source_guild_id: Snowflake;
  /** Snapshot of the guild the template was taken from */
  serialized_source_guild: Partial<Guild>;
  /** True when the source guild changed since the last sync */
  is_dirty: boolean | null;
}
