/**
 * Guild emoji endpoints.
 */

import { ApiResource } from './base.js';
import { assertValid, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import { Emoji, Snowflake } from '../types/index.js';

export interface CreateEmojiParams {
  /** 2-32 alphanumeric or underscore characters */
  name: string;
  /** `data:image/...;base64,` URI, at most 256 KiB */
  image: string;
  /** Roles allowed to use the emoji */
  roles?: Snowflake[];
}

export interface ModifyEmojiParams {
  name?: string;
  roles?: Snowflake[] | null;
}

const EMOJI_NAME_PATTERN = /^\w{2,32}$/;
const IMAGE_DATA_URI_PATTERN = /^data:image\/(png|jpeg|gif|webp);base64,/;

function validateEmoji(errors: string[], params: { name?: string; roles?: Snowflake[] | null }): void {
  if (params.name !== undefined && !EMOJI_NAME_PATTERN.test(params.name)) {
    errors.push('name must be 2-32 letters, digits or underscores');
  }
  for (const roleId of params.roles ?? []) {
    checkSnowflake(errors, 'roles', roleId);
  }
}

export class EmojisApi extends ApiResource {
  async list(guildId: Snowflake): Promise<Emoji[]> {
    return this.transport.execute<Emoji[]>({
      method: 'GET',
      route: Routes.guildEmojis,
      params: { guild_id: guildId },
      operation: 'emojis.list',
    });
  }

  async get(guildId: Snowflake, emojiId: Snowflake): Promise<Emoji> {
    return this.transport.execute<Emoji>({
      method: 'GET',
      route: Routes.guildEmoji,
      params: { guild_id: guildId, emoji_id: emojiId },
      operation: 'emojis.get',
    });
  }

  async create(guildId: Snowflake, params: CreateEmojiParams, reason?: string): Promise<Emoji> {
    const errors: string[] = [];
    validateEmoji(errors, params);
    if (!IMAGE_DATA_URI_PATTERN.test(params.image)) {
      errors.push('image must be a base64 image data URI');
    }
    assertValid(errors);

    const emoji = await this.transport.execute<Emoji>({
      method: 'POST',
      route: Routes.guildEmojis,
      params: { guild_id: guildId },
      body: { name: params.name, image: params.image, roles: params.roles ?? [] },
      reason,
      operation: 'emojis.create',
    });
    this.logger.info('Emoji created', { guildId, emojiId: emoji.id });
    return emoji;
  }

  async modify(guildId: Snowflake, emojiId: Snowflake, params: ModifyEmojiParams, reason?: string): Promise<Emoji> {
    const errors: string[] = [];
    validateEmoji(errors, params);
    assertValid(errors);

    return this.transport.execute<Emoji>({
      method: 'PATCH',
      route: Routes.guildEmoji,
      params: { guild_id: guildId, emoji_id: emojiId },
      body: params,
      reason,
      operation: 'emojis.modify',
    });
  }

  async delete(guildId: Snowflake, emojiId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildEmoji,
      params: { guild_id: guildId, emoji_id: emojiId },
      reason,
      operation: 'emojis.delete',
    });
  }
}
