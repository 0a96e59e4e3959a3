/**
 * Sticker and sticker pack structures.
 */

import { Snowflake } from './snowflake.js';
import { User } from './user.js';

export enum StickerType {
  Standard = 1,
  Guild = 2,
}

export enum StickerFormatType {
  Png = 1,
  Apng = 2,
  Lottie = 3,
  Gif = 4,
}

export interface Sticker {
  id: Snowflake;
  /** Set for standard stickers */
  pack_id?: Snowflake;
  name: string;
  description: string | null;
  /** Autocomplete keywords, comma separated */
  tags: string;
  type: StickerType;
  format_type: StickerFormatType;
  available?: boolean;
  guild_id?: Snowflake;
  /** Uploader; present when the bot can manage the guild's stickers */
  user?: User;
  sort_value?: number;
}

export interface StickerPack {
  id: Snowflake;
  stickers: Sticker[];
  name: string;
  sku_id: Snowflake;
  cover_sticker_id?: Snowflake;
  description: string;
  banner_asset_id?: Snowflake;
}

/** Upload limit for guild sticker files, in bytes */
export const MAX_STICKER_FILE_SIZE = 512 * 1024;
