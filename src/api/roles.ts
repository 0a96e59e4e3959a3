/**
 * Guild role endpoints.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength, checkRange, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import { Role, Snowflake } from '../types/index.js';

export interface RolePayload {
  name?: string;
  /** Permission bit set as a string */
  permissions?: string;
  /** RGB integer */
  color?: number;
  hoist?: boolean;
  /** Image data URI, guilds with the ROLE_ICONS feature only */
  icon?: string | null;
  unicode_emoji?: string | null;
  mentionable?: boolean;
}

export interface RolePositionUpdate {
  id: Snowflake;
  position?: number | null;
}

function validateRolePayload(errors: string[], payload: RolePayload): void {
  checkLength(errors, 'name', payload.name, 1, 100);
  checkRange(errors, 'color', payload.color, 0, 0xffffff);
  if (payload.permissions !== undefined && !/^\d+$/.test(payload.permissions)) {
    errors.push('permissions must be a permission bit set');
  }
}

export class RolesApi extends ApiResource {
  async list(guildId: Snowflake): Promise<Role[]> {
    return this.transport.execute<Role[]>({
      method: 'GET',
      route: Routes.guildRoles,
      params: { guild_id: guildId },
      operation: 'roles.list',
    });
  }

  async create(guildId: Snowflake, payload: RolePayload = {}, reason?: string): Promise<Role> {
    const errors: string[] = [];
    validateRolePayload(errors, payload);
    assertValid(errors);

    const role = await this.transport.execute<Role>({
      method: 'POST',
      route: Routes.guildRoles,
      params: { guild_id: guildId },
      body: payload,
      reason,
      operation: 'roles.create',
    });
    this.logger.info('Role created', { guildId, roleId: role.id });
    return role;
  }

  async modify(guildId: Snowflake, roleId: Snowflake, payload: RolePayload, reason?: string): Promise<Role> {
    const errors: string[] = [];
    validateRolePayload(errors, payload);
    assertValid(errors);

    return this.transport.execute<Role>({
      method: 'PATCH',
      route: Routes.guildRole,
      params: { guild_id: guildId, role_id: roleId },
      body: payload,
      reason,
      operation: 'roles.modify',
    });
  }

  /**
   * Reorders roles and returns every role of the guild.
   */
  async modifyPositions(guildId: Snowflake, positions: RolePositionUpdate[], reason?: string): Promise<Role[]> {
    const errors: string[] = [];
    if (positions.length === 0) {
      errors.push('At least one role position is required');
    }
    for (const update of positions) {
      checkSnowflake(errors, 'id', update.id);
    }
    assertValid(errors);

    return this.transport.execute<Role[]>({
      method: 'PATCH',
      route: Routes.guildRoles,
      params: { guild_id: guildId },
      body: positions,
      reason,
      operation: 'roles.modifyPositions',
    });
  }

  async delete(guildId: Snowflake, roleId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildRole,
      params: { guild_id: guildId, role_id: roleId },
      reason,
      operation: 'roles.delete',
    });
    this.logger.info('Role deleted', { guildId, roleId });
  }
}
