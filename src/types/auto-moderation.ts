/**
 * Auto moderation rule structures.
 */

import { Snowflake } from './snowflake.js';

export enum AutoModerationEventType {
  MessageSend = 1,
  MemberUpdate = 2,
}

export enum AutoModerationTriggerType {
  Keyword = 1,
  Spam = 3,
  KeywordPreset = 4,
  MentionSpam = 5,
  MemberProfile = 6,
}

export enum AutoModerationKeywordPreset {
  Profanity = 1,
  SexualContent = 2,
  Slurs = 3,
}

export enum AutoModerationActionType {
  BlockMessage = 1,
  SendAlertMessage = 2,
  Timeout = 3,
  BlockMemberInteraction = 4,
}

/**
 * Which fields apply depends on the trigger type.
 */
export interface AutoModerationTriggerMetadata {
  keyword_filter?: string[];
  regex_patterns?: string[];
  presets?: AutoModerationKeywordPreset[];
  allow_list?: string[];
  mention_total_limit?: number;
  mention_raid_protection_enabled?: boolean;
}

export interface AutoModerationActionMetadata {
  /** Alert channel for `SendAlertMessage` */
  channel_id?: Snowflake;
  /** Timeout length for `Timeout`, at most 28 days */
  duration_seconds?: number;
  /** Shown to the member when `BlockMessage` fires */
  custom_message?: string;
}

export interface AutoModerationAction {
  type: AutoModerationActionType;
  metadata?: AutoModerationActionMetadata;
}

export interface AutoModerationRule {
  id: Snowflake;
  guild_id: Snowflake;
  name: string;
  creator_id: Snowflake;
  event_type: AutoModerationEventType;
  trigger_type: AutoModerationTriggerType;
  trigger_metadata: AutoModerationTriggerMetadata;
  actions: AutoModerationAction[];
  enabled: boolean;
  exempt_roles: Snowflake[];
  exempt_channels: Snowflake[];
}
