/**
 * REST descriptions of the gateway, and the current application.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';

export interface GatewayInfo {
  url: string;
}

export interface SessionStartLimit {
  total: number;
  remaining: number;
  /** Milliseconds until the limit resets */
  reset_after: number;
  max_concurrency: number;
}

export interface GatewayBotInfo extends GatewayInfo {
  /** Recommended shard count */
  shards: number;
  session_start_limit: SessionStartLimit;
}

export interface Application {
  id: Snowflake;
  name: string;
  icon: string | null;
  description: string;
  rpc_origins?: string[];
  bot_public: boolean;
  bot_require_code_grant: boolean;
  owner?: User;
  verify_key: string;
  guild_id?: Snowflake;
  flags?: number;
  tags?: string[];
}
