/**
 * Interaction responses and application commands.
 */

import { Snowflake } from './snowflake.js';
import { ActionRow } from './component.js';
import { AllowedMentions, Embed, PartialAttachment } from './message.js';
import { ChannelType } from './channel.js';

export enum InteractionResponseType {
  Pong = 1,
  ChannelMessageWithSource = 4,
  DeferredChannelMessageWithSource = 5,
  /** Component interactions only */
  DeferredUpdateMessage = 6,
  UpdateMessage = 7,
  ApplicationCommandAutocompleteResult = 8,
  Modal = 9,
}

export interface CommandOptionChoice {
  name: string;
  value: string | number;
  name_localizations?: Record<string, string> | null;
}

/**
 * Data of a message-bearing interaction response.
 */
export interface InteractionMessageData {
  tts?: boolean;
  content?: string;
  embeds?: Embed[];
  allowed_mentions?: AllowedMentions;
  flags?: number;
  components?: ActionRow[];
  attachments?: PartialAttachment[];
}

export interface InteractionAutocompleteData {
  choices: CommandOptionChoice[];
}

export interface InteractionModalData {
  custom_id: string;
  title: string;
  components: ActionRow[];
}

export type InteractionCallbackData =
  | InteractionMessageData
  | InteractionAutocompleteData
  | InteractionModalData;

export interface InteractionResponse {
  type: InteractionResponseType;
  data?: InteractionCallbackData;
}

export enum ApplicationCommandType {
  ChatInput = 1,
  User = 2,
  Message = 3,
}

export enum ApplicationCommandOptionType {
  SubCommand = 1,
  SubCommandGroup = 2,
  String = 3,
  Integer = 4,
  Boolean = 5,
  User = 6,
  Channel = 7,
  Role = 8,
  Mentionable = 9,
  Number = 10,
  Attachment = 11,
}

export interface ApplicationCommandOption {
  type: ApplicationCommandOptionType;
  name: string;
  description: string;
  name_localizations?: Record<string, string> | null;
  description_localizations?: Record<string, string> | null;
  required?: boolean;
  choices?: CommandOptionChoice[];
  options?: ApplicationCommandOption[];
  channel_types?: ChannelType[];
  min_value?: number;
  max_value?: number;
  min_length?: number;
  max_length?: number;
  autocomplete?: boolean;
}

export interface ApplicationCommand {
  id: Snowflake;
  type?: ApplicationCommandType;
  application_id: Snowflake;
  guild_id?: Snowflake;
  name: string;
  name_localizations?: Record<string, string> | null;
  description: string;
  description_localizations?: Record<string, string> | null;
  options?: ApplicationCommandOption[];
  default_member_permissions: string | null;
  dm_permission?: boolean;
  nsfw?: boolean;
  version: Snowflake;
}

/**
 * Payload to create, edit or bulk-overwrite a command.
 */
export type ApplicationCommandInput = Omit<
  ApplicationCommand,
  'id' | 'application_id' | 'guild_id' | 'version' | 'default_member_permissions'
> & {
  default_member_permissions?: string | null;
};

export enum ApplicationCommandPermissionType {
  Role = 1,
  User = 2,
  Channel = 3,
}

export interface ApplicationCommandPermission {
  id: Snowflake;
  type: ApplicationCommandPermissionType;
  permission: boolean;
}

export interface GuildApplicationCommandPermissions {
  id: Snowflake;
  application_id: Snowflake;
  guild_id: Snowflake;
  permissions: ApplicationCommandPermission[];
}

/** Chat-input command names: lowercase, 1-32 chars */
export const COMMAND_NAME_PATTERN = /^[-_\p{Ll}\p{N}\p{sc=Deva}\p{sc=Thai}]{1,32}$/u;
export const MAX_COMMAND_DESCRIPTION_LENGTH = 100;
