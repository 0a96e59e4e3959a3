/**
 * Webhook structures.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';
import { Guild } from './guild.js';
import { Channel } from './channel.js';

export enum WebhookType {
  Incoming = 1,
  ChannelFollower = 2,
  Application = 3,
}

export interface Webhook {
  id: Snowflake;
  type: WebhookType;
  guild_id?: Snowflake | null;
  channel_id: Snowflake | null;
  /** Absent when fetched with a token */
  user?: User;
  name: string | null;
  avatar: string | null;
  /** Only present for incoming webhooks the caller may see */
  token?: string;
  application_id: Snowflake | null;
  source_guild?: Partial<Guild>;
  source_channel?: Partial<Channel>;
  url?: string;
}

/**
 * Credentials for token-authenticated webhook routes.
 */
export interface WebhookCredentials {
  id: Snowflake;
  token: string;
}

export const MIN_WEBHOOK_NAME_LENGTH = 1;
export const MAX_WEBHOOK_NAME_LENGTH = 80;
