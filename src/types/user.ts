/**
 * Discord user objects.
 */

import { Snowflake } from './snowflake.js';

/**
 * Discord user object.
 */
export interface User {
  id: Snowflake;
  username: string;
  /** Legacy discriminator; "0" for migrated usernames */
  discriminator: string;
  global_name?: string | null;
  avatar?: string | null;
  bot?: boolean;
  system?: boolean;
  mfa_enabled?: boolean;
  banner?: string | null;
  accent_color?: number | null;
  locale?: string;
  verified?: boolean;
  email?: string | null;
  flags?: number;
  premium_type?: number;
  public_flags?: number;
}

/**
 * Account connection (Twitch, GitHub, ...) of the current user.
 */
export interface Connection {
  id: string;
  name: string;
  type: string;
  revoked?: boolean;
  verified: boolean;
  friend_sync: boolean;
  show_activity: boolean;
  two_way_link: boolean;
  visibility: 0 | 1;
}

/**
 * Returns the display name Discord shows for a user.
 */
export function getDisplayName(user: User): string {
  return user.global_name ?? user.username;
}
