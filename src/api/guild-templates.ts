/**
 * Guild template endpoints. Templates are addressed by their code.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength } from './validation.js';
import { Routes } from '../routes/index.js';
import { Guild, GuildTemplate, Snowflake } from '../types/index.js';

export interface CreateGuildTemplateParams {
  /** 1-100 characters */
  name: string;
  /** Up to 120 characters */
  description?: string | null;
}

export type ModifyGuildTemplateParams = Partial<CreateGuildTemplateParams>;

function validateTemplate(errors: string[], params: ModifyGuildTemplateParams): void {
  checkLength(errors, 'name', params.name, 1, 100);
  checkLength(errors, 'description', params.description ?? undefined, 0, 120);
}

export class GuildTemplatesApi extends ApiResource {
  async get(code: string): Promise<GuildTemplate> {
    return this.transport.execute<GuildTemplate>({
      method: 'GET',
      route: Routes.template,
      params: { template_code: code },
      operation: 'templates.get',
    });
  }

  /**
   * Creates a guild from a template. Discord only allows this for bots in
   * fewer than 10 guilds.
   *
   * @param icon - image data URI
   */
  async createGuild(code: string, name: string, icon?: string): Promise<Guild> {
    const errors: string[] = [];
    checkLength(errors, 'name', name, 2, 100);
    assertValid(errors);

    const body: Record<string, unknown> = { name };
    if (icon !== undefined) body.icon = icon;
    return this.transport.execute<Guild>({
      method: 'POST',
      route: Routes.template,
      params: { template_code: code },
      body,
      operation: 'templates.createGuild',
    });
  }

  async list(guildId: Snowflake): Promise<GuildTemplate[]> {
    return this.transport.execute<GuildTemplate[]>({
      method: 'GET',
      route: Routes.guildTemplates,
      params: { guild_id: guildId },
      operation: 'templates.list',
    });
  }

  async create(guildId: Snowflake, params: CreateGuildTemplateParams): Promise<GuildTemplate> {
    const errors: string[] = [];
    validateTemplate(errors, params);
    assertValid(errors);

    const template = await this.transport.execute<GuildTemplate>({
      method: 'POST',
      route: Routes.guildTemplates,
      params: { guild_id: guildId },
      body: params,
      operation: 'templates.create',
    });
    this.logger.info('Guild template created', { guildId, code: template.code });
    return template;
  }

  /**
   * Updates the template to the guild's current state.
   */
  async sync(guildId: Snowflake, code: string): Promise<GuildTemplate> {
    return this.transport.execute<GuildTemplate>({
      method: 'PUT',
      route: Routes.guildTemplate,
      params: { guild_id: guildId, template_code: code },
      operation: 'templates.sync',
    });
  }

  async modify(guildId: Snowflake, code: string, params: ModifyGuildTemplateParams): Promise<GuildTemplate> {
    const errors: string[] = [];
    validateTemplate(errors, params);
    assertValid(errors);

    return this.transport.execute<GuildTemplate>({
      method: 'PATCH',
      route: Routes.guildTemplate,
      params: { guild_id: guildId, template_code: code },
      body: params,
      operation: 'templates.modify',
    });
  }

  /**
   * Deletes the template and returns it.
   */
  async delete(guildId: Snowflake, code: string): Promise<GuildTemplate> {
    return this.transport.execute<GuildTemplate>({
      method: 'DELETE',
      route: Routes.guildTemplate,
      params: { guild_id: guildId, template_code: code },
      operation: 'templates.delete',
    });
  }
}
