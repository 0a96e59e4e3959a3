/**
 * Sticker endpoints: standard sticker packs and guild stickers.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength } from './validation.js';
import { Routes } from '../routes/index.js';
import { FileAttachment, Snowflake, Sticker, StickerPack, MAX_STICKER_FILE_SIZE } from '../types/index.js';

export interface CreateStickerParams {
  /** 2-30 characters */
  name: string;
  /** Empty, or 2-100 characters */
  description?: string;
  /** Autocomplete keywords, up to 200 characters */
  tags: string;
  /** PNG, APNG, GIF or Lottie JSON, at most 512 KiB */
  file: FileAttachment;
}

export interface ModifyStickerParams {
  name?: string;
  description?: string | null;
  tags?: string;
}

const STICKER_FILE_PATTERN = /\.(png|apng|gif|json)$/i;

function validateSticker(errors: string[], params: ModifyStickerParams): void {
  checkLength(errors, 'name', params.name, 2, 30);
  const description = params.description ?? '';
  if (description.length === 1 || description.length > 100) {
    errors.push('description must be empty or between 2 and 100 characters');
  }
  checkLength(errors, 'tags', params.tags, 1, 200);
}

function fileSize(file: FileAttachment): number {
  return typeof file.data === 'string' ? Buffer.byteLength(file.data) : file.data.byteLength;
}

export class StickersApi extends ApiResource {
  async get(stickerId: Snowflake): Promise<Sticker> {
    return this.transport.execute<Sticker>({
      method: 'GET',
      route: Routes.sticker,
      params: { sticker_id: stickerId },
      operation: 'stickers.get',
    });
  }

  /**
   * Lists the standard sticker packs available to Nitro users.
   */
  async listPacks(): Promise<StickerPack[]> {
    const response = await this.transport.execute<{ sticker_packs: StickerPack[] }>({
      method: 'GET',
      route: Routes.stickerPacks,
      operation: 'stickers.listPacks',
    });
    return response.sticker_packs;
  }

  async listGuild(guildId: Snowflake): Promise<Sticker[]> {
    return this.transport.execute<Sticker[]>({
      method: 'GET',
      route: Routes.guildStickers,
      params: { guild_id: guildId },
      operation: 'stickers.listGuild',
    });
  }

  async getGuild(guildId: Snowflake, stickerId: Snowflake): Promise<Sticker> {
    return this.transport.execute<Sticker>({
      method: 'GET',
      route: Routes.guildSticker,
      params: { guild_id: guildId, sticker_id: stickerId },
      operation: 'stickers.getGuild',
    });
  }

  /**
   * Uploads a guild sticker. The request is a form of `name`,
   * `description`, `tags` and one `file` part.
   */
  async create(guildId: Snowflake, params: CreateStickerParams, reason?: string): Promise<Sticker> {
    const errors: string[] = [];
    validateSticker(errors, params);
    if (!STICKER_FILE_PATTERN.test(params.file.name)) {
      errors.push('file must be a PNG, APNG, GIF or Lottie JSON file');
    }
    if (fileSize(params.file) > MAX_STICKER_FILE_SIZE) {
      errors.push(`file must be at most ${MAX_STICKER_FILE_SIZE} bytes`);
    }
    assertValid(errors);

    const sticker = await this.transport.execute<Sticker>({
      method: 'POST',
      route: Routes.guildStickers,
      params: { guild_id: guildId },
      formFields: { name: params.name, description: params.description ?? '', tags: params.tags },
      files: [params.file],
      reason,
      operation: 'stickers.create',
    });
    this.logger.info('Sticker created', { guildId, stickerId: sticker.id });
    return sticker;
  }

  async modify(
    guildId: Snowflake,
    stickerId: Snowflake,
    params: ModifyStickerParams,
    reason?: string
  ): Promise<Sticker> {
    const errors: string[] = [];
    validateSticker(errors, params);
    assertValid(errors);

    return this.transport.execute<Sticker>({
      method: 'PATCH',
      route: Routes.guildSticker,
      params: { guild_id: guildId, sticker_id: stickerId },
      body: params,
      reason,
      operation: 'stickers.modify',
    });
  }

  async delete(guildId: Snowflake, stickerId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildSticker,
      params: { guild_id: guildId, sticker_id: stickerId },
      reason,
      operation: 'stickers.delete',
    });
  }
}
