/**
 * Discord message, embed, attachment and reaction structures.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';
import { ActionRow, PartialEmoji } from './component.js';
import { Channel } from './channel.js';
import { GuildMember } from './guild.js';

/**
 * Message flags relevant to sending and editing.
 */
export enum MessageFlags {
  Crossposted = 1 << 0,
  IsCrosspost = 1 << 1,
  SuppressEmbeds = 1 << 2,
  Urgent = 1 << 4,
  HasThread = 1 << 5,
  Ephemeral = 1 << 6,
  Loading = 1 << 7,
  SuppressNotifications = 1 << 12,
}

/**
 * Reply / forward reference.
 */
export interface MessageReference {
  message_id?: Snowflake;
  channel_id?: Snowflake;
  guild_id?: Snowflake;
  /** When false, replying to a deleted message sends a plain message instead of failing */
  fail_if_not_exists?: boolean;
}

export type AllowedMentionType = 'roles' | 'users' | 'everyone';

/**
 * Controls which mentions in content actually ping.
 */
export interface AllowedMentions {
  parse?: AllowedMentionType[];
  roles?: Snowflake[];
  users?: Snowflake[];
  replied_user?: boolean;
}

export interface Attachment {
  id: Snowflake;
  filename: string;
  description?: string;
  content_type?: string;
  size: number;
  url: string;
  proxy_url: string;
  height?: number | null;
  width?: number | null;
  ephemeral?: boolean;
}

/**
 * Attachment descriptor sent in `payload_json`. `id` is the index of the
 * matching `files[n]` part for new uploads, or an existing attachment ID.
 */
export interface PartialAttachment {
  id: Snowflake | number;
  filename?: string;
  description?: string;
}

/**
 * A file to upload with a message.
 */
export interface FileAttachment {
  /** File name as Discord shows it */
  name: string;
  data: Uint8Array | string;
  contentType?: string;
  /** Alt text */
  description?: string;
}

export interface Reaction {
  count: number;
  me: boolean;
  emoji: PartialEmoji;
}

export interface StickerItem {
  id: Snowflake;
  name: string;
  format_type: number;
}

export interface Message {
  id: Snowflake;
  channel_id: Snowflake;
  guild_id?: Snowflake;
  author: User;
  member?: Partial<GuildMember>;
  content: string;
  timestamp: string;
  edited_timestamp: string | null;
  tts: boolean;
  mention_everyone: boolean;
  mentions: User[];
  mention_roles: Snowflake[];
  attachments: Attachment[];
  embeds: Embed[];
  reactions?: Reaction[];
  nonce?: string | number;
  pinned: boolean;
  webhook_id?: Snowflake;
  type: number;
  application_id?: Snowflake;
  message_reference?: MessageReference;
  flags?: number;
  referenced_message?: Message | null;
  thread?: Channel;
  components?: ActionRow[];
  sticker_items?: StickerItem[];
}

export interface EmbedFooter {
  text: string;
  icon_url?: string;
  proxy_icon_url?: string;
}

/**
 * Image, thumbnail or video of an embed.
 */
export interface EmbedMedia {
  url: string;
  proxy_url?: string;
  width?: number;
  height?: number;
}

export interface EmbedAuthor {
  name: string;
  url?: string;
  icon_url?: string;
  proxy_icon_url?: string;
}

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface Embed {
  title?: string;
  type?: 'rich' | 'image' | 'video' | 'gifv' | 'article' | 'link';
  description?: string;
  url?: string;
  /** ISO8601 */
  timestamp?: string;
  /** Decimal RGB */
  color?: number;
  footer?: EmbedFooter;
  image?: EmbedMedia;
  thumbnail?: EmbedMedia;
  video?: EmbedMedia;
  author?: EmbedAuthor;
  fields?: EmbedField[];
}

/** Maximum characters allowed in message content */
export const MAX_MESSAGE_CONTENT_LENGTH = 2000;

/** Maximum number of embeds per message */
export const MAX_EMBEDS_PER_MESSAGE = 10;

/** Maximum total characters across all embeds of a message */
export const MAX_EMBED_TOTAL_CHARACTERS = 6000;

export const MAX_EMBED_TITLE_LENGTH = 256;
export const MAX_EMBED_DESCRIPTION_LENGTH = 4096;
export const MAX_EMBED_FIELDS = 25;

/**
 * Fluent builder for rich embeds.
 */
export class EmbedBuilder {
  private readonly embed: Embed = { type: 'rich' };

  title(title: string): this {
    if (title.length > MAX_EMBED_TITLE_LENGTH) {
      throw new RangeError(`Embed title cannot exceed ${MAX_EMBED_TITLE_LENGTH} characters`);
    }
    this.embed.title = title;
    return this;
  }

  description(description: string): this {
    if (description.length > MAX_EMBED_DESCRIPTION_LENGTH) {
      throw new RangeError(
        `Embed description cannot exceed ${MAX_EMBED_DESCRIPTION_LENGTH} characters`
      );
    }
    this.embed.description = description;
    return this;
  }

  url(url: string): this {
    this.embed.url = url;
    return this;
  }

  /** Accepts a number such as 0x5865f2 */
  color(color: number): this {
    this.embed.color = color;
    return this;
  }

  /** Defaults to now */
  timestamp(timestamp: Date | string = new Date()): this {
    this.embed.timestamp = timestamp instanceof Date ? timestamp.toISOString() : timestamp;
    return this;
  }

  footer(text: string, iconUrl?: string): this {
    this.embed.footer = iconUrl ? { text, icon_url: iconUrl } : { text };
    return this;
  }

  image(url: string): this {
    this.embed.image = { url };
    return this;
  }

  thumbnail(url: string): this {
    this.embed.thumbnail = { url };
    return this;
  }

  author(name: string, url?: string, iconUrl?: string): this {
    const author: EmbedAuthor = { name };
    if (url) author.url = url;
    if (iconUrl) author.icon_url = iconUrl;
    this.embed.author = author;
    return this;
  }

  addField(name: string, value: string, inline?: boolean): this {
    const fields = this.embed.fields ?? [];
    if (fields.length >= MAX_EMBED_FIELDS) {
      throw new RangeError(`Embeds cannot have more than ${MAX_EMBED_FIELDS} fields`);
    }
    fields.push(inline === undefined ? { name, value } : { name, value, inline });
    this.embed.fields = fields;
    return this;
  }

  build(): Embed {
    return {
      ...this.embed,
      fields: this.embed.fields ? [...this.embed.fields] : undefined,
    };
  }
}

/**
 * Counts the characters Discord charges against the per-message embed limit.
 */
export function getEmbedCharacterCount(embed: Embed): number {
  let count = 0;
  if (embed.title) count += embed.title.length;
  if (embed.description) count += embed.description.length;
  if (embed.footer?.text) count += embed.footer.text.length;
  if (embed.author?.name) count += embed.author.name.length;
  for (const field of embed.fields ?? []) {
    count += field.name.length + field.value.length;
  }
  return count;
}
