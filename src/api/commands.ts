/**
 * Application command endpoints, global and per guild.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength } from './validation.js';
import { Routes } from '../routes/index.js';
import {
  ApplicationCommand,
  ApplicationCommandInput,
  ApplicationCommandType,
  GuildApplicationCommandPermissions,
  Snowflake,
  COMMAND_NAME_PATTERN,
  MAX_COMMAND_DESCRIPTION_LENGTH,
} from '../types/index.js';

/** Commands per scope, by type */
export const MAX_COMMANDS: Readonly<Record<ApplicationCommandType, number>> = {
  [ApplicationCommandType.ChatInput]: 100,
  [ApplicationCommandType.User]: 5,
  [ApplicationCommandType.Message]: 5,
};

function validateCommand(errors: string[], command: Partial<ApplicationCommandInput>, index?: number): void {
  const prefix = index === undefined ? '' : `commands[${index}].`;
  const type = command.type ?? ApplicationCommandType.ChatInput;

  if (command.name !== undefined) {
    if (type === ApplicationCommandType.ChatInput) {
      if (!COMMAND_NAME_PATTERN.test(command.name)) {
        errors.push(`${prefix}name must be 1-32 lowercase characters without spaces`);
      }
    } else {
      checkLength(errors, `${prefix}name`, command.name, 1, 32);
    }
  }

  if (type === ApplicationCommandType.ChatInput) {
    checkLength(errors, `${prefix}description`, command.description, 1, MAX_COMMAND_DESCRIPTION_LENGTH);
  } else if (command.description) {
    errors.push(`${prefix}description must be empty for user and message commands`);
  }

  if (command.options && command.options.length > 25) {
    errors.push(`${prefix}options has more than 25 entries`);
  }
}

function validateNewCommand(errors: string[], command: ApplicationCommandInput, index?: number): void {
  if (!command.name) {
    errors.push(`${index === undefined ? '' : `commands[${index}].`}name is required`);
  }
  validateCommand(errors, command, index);
}

export class CommandsApi extends ApiResource {
  async listGlobal(applicationId: Snowflake, withLocalizations: boolean = false): Promise<ApplicationCommand[]> {
    return this.transport.execute<ApplicationCommand[]>({
      method: 'GET',
      route: Routes.globalCommands,
      params: { application_id: applicationId },
      query: { with_localizations: withLocalizations || undefined },
      operation: 'commands.listGlobal',
    });
  }

  /**
   * Creates a global command; an existing command with the same name is
   * replaced.
   */
  async createGlobal(applicationId: Snowflake, command: ApplicationCommandInput): Promise<ApplicationCommand> {
    const errors: string[] = [];
    validateNewCommand(errors, command);
    assertValid(errors);

    const created = await this.transport.execute<ApplicationCommand>({
      method: 'POST',
      route: Routes.globalCommands,
      params: { application_id: applicationId },
      body: command,
      operation: 'commands.createGlobal',
    });
    this.logger.info('Global command created', { commandId: created.id, name: created.name });
    return created;
  }

  async getGlobal(applicationId: Snowflake, commandId: Snowflake): Promise<ApplicationCommand> {
    return this.transport.execute<ApplicationCommand>({
      method: 'GET',
      route: Routes.globalCommand,
      params: { application_id: applicationId, command_id: commandId },
      operation: 'commands.getGlobal',
    });
  }

  async editGlobal(
    applicationId: Snowflake,
    commandId: Snowflake,
    changes: Partial<ApplicationCommandInput>
  ): Promise<ApplicationCommand> {
    const errors: string[] = [];
    validateCommand(errors, changes);
    assertValid(errors);

    return this.transport.execute<ApplicationCommand>({
      method: 'PATCH',
      route: Routes.globalCommand,
      params: { application_id: applicationId, command_id: commandId },
      body: changes,
      operation: 'commands.editGlobal',
    });
  }

  async deleteGlobal(applicationId: Snowflake, commandId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.globalCommand,
      params: { application_id: applicationId, command_id: commandId },
      operation: 'commands.deleteGlobal',
    });
  }

  /**
   * Replaces every global command with `commands`.
   */
  async bulkOverwriteGlobal(
    applicationId: Snowflake,
    commands: ApplicationCommandInput[]
  ): Promise<ApplicationCommand[]> {
    this.validateBulk(commands);
    const result = await this.transport.execute<ApplicationCommand[]>({
      method: 'PUT',
      route: Routes.globalCommands,
      params: { application_id: applicationId },
      body: commands,
      operation: 'commands.bulkOverwriteGlobal',
    });
    this.logger.info('Global commands overwritten', { count: result.length });
    return result;
  }

  async listGuild(
    applicationId: Snowflake,
    guildId: Snowflake,
    withLocalizations: boolean = false
  ): Promise<ApplicationCommand[]> {
    return this.transport.execute<ApplicationCommand[]>({
      method: 'GET',
      route: Routes.guildCommands,
      params: { application_id: applicationId, guild_id: guildId },
      query: { with_localizations: withLocalizations || undefined },
      operation: 'commands.listGuild',
    });
  }

  async createGuild(
    applicationId: Snowflake,
    guildId: Snowflake,
    command: ApplicationCommandInput
  ): Promise<ApplicationCommand> {
    const errors: string[] = [];
    validateNewCommand(errors, command);
    assertValid(errors);

    return this.transport.execute<ApplicationCommand>({
      method: 'POST',
      route: Routes.guildCommands,
      params: { application_id: applicationId, guild_id: guildId },
      body: command,
      operation: 'commands.createGuild',
    });
  }

  async getGuild(applicationId: Snowflake, guildId: Snowflake, commandId: Snowflake): Promise<ApplicationCommand> {
    return this.transport.execute<ApplicationCommand>({
      method: 'GET',
      route: Routes.guildCommand,
      params: { application_id: applicationId, guild_id: guildId, command_id: commandId },
      operation: 'commands.getGuild',
    });
  }

  async editGuild(
    applicationId: Snowflake,
    guildId: Snowflake,
    commandId: Snowflake,
    changes: Partial<ApplicationCommandInput>
  ): Promise<ApplicationCommand> {
    const errors: string[] = [];
    validateCommand(errors, changes);
    assertValid(errors);

    return this.transport.execute<ApplicationCommand>({
      method: 'PATCH',
      route: Routes.guildCommand,
      params: { application_id: applicationId, guild_id: guildId, command_id: commandId },
      body: changes,
      operation: 'commands.editGuild',
    });
  }

  async deleteGuild(applicationId: Snowflake, guildId: Snowflake, commandId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildCommand,
      params: { application_id: applicationId, guild_id: guildId, command_id: commandId },
      operation: 'commands.deleteGuild',
    });
  }

  async bulkOverwriteGuild(
    applicationId: Snowflake,
    guildId: Snowflake,
    commands: ApplicationCommandInput[]
  ): Promise<ApplicationCommand[]> {
    this.validateBulk(commands);
    return this.transport.execute<ApplicationCommand[]>({
      method: 'PUT',
      route: Routes.guildCommands,
      params: { application_id: applicationId, guild_id: guildId },
      body: commands,
      operation: 'commands.bulkOverwriteGuild',
    });
  }

  /**
   * Permission overrides of every command in a guild.
   */
  async getGuildPermissions(
    applicationId: Snowflake,
    guildId: Snowflake
  ): Promise<GuildApplicationCommandPermissions[]> {
    return this.transport.execute<GuildApplicationCommandPermissions[]>({
      method: 'GET',
      route: Routes.guildCommandsPermissions,
      params: { application_id: applicationId, guild_id: guildId },
      operation: 'commands.getGuildPermissions',
    });
  }

  async getPermissions(
    applicationId: Snowflake,
    guildId: Snowflake,
    commandId: Snowflake
  ): Promise<GuildApplicationCommandPermissions> {
    return this.transport.execute<GuildApplicationCommandPermissions>({
      method: 'GET',
      route: Routes.guildCommandPermissions,
      params: { application_id: applicationId, guild_id: guildId, command_id: commandId },
      operation: 'commands.getPermissions',
    });
  }

  private validateBulk(commands: ApplicationCommandInput[]): void {
    const errors: string[] = [];
    const seen = new Set<string>();
    const counts = new Map<ApplicationCommandType, number>();
    commands.forEach((command, index) => {
      validateNewCommand(errors, command, index);
      const type = command.type ?? ApplicationCommandType.ChatInput;
      const key = `${type}:${command.name}`;
      if (seen.has(key)) {
        errors.push(`commands[${index}].name duplicates another command of the same type`);
      }
      seen.add(key);
      counts.set(type, (counts.get(type) ?? 0) + 1);
    });
    for (const [type, count] of counts) {
      if (count > MAX_COMMANDS[type]) {
        errors.push(`At most ${MAX_COMMANDS[type]} commands of type ${type} may be registered`);
      }
    }
    assertValid(errors);
  }
}
