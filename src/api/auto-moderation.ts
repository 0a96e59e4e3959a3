/**
 * Auto moderation rule endpoints.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength, checkRange, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import {
  AutoModerationAction,
  AutoModerationActionType,
  AutoModerationEventType,
  AutoModerationRule,
  AutoModerationTriggerMetadata,
  AutoModerationTriggerType,
  Snowflake,
} from '../types/index.js';

export interface CreateAutoModerationRulePayload {
  /** 1-100 characters */
  name: string;
  event_type: AutoModerationEventType;
  trigger_type: AutoModerationTriggerType;
  trigger_metadata?: AutoModerationTriggerMetadata;
  actions: AutoModerationAction[];
  enabled?: boolean;
  /** Up to 20 roles */
  exempt_roles?: Snowflake[];
  /** Up to 50 channels */
  exempt_channels?: Snowflake[];
}

/** The trigger type of a rule is fixed once it exists. */
export type ModifyAutoModerationRulePayload = Partial<Omit<CreateAutoModerationRulePayload, 'trigger_type'>>;

const MAX_TIMEOUT_SECONDS = 28 * 86400;

function checkList(errors: string[], name: string, items: string[] | undefined, maxItems: number, maxLength: number): void {
  if (items === undefined) return;
  if (items.length > maxItems) {
    errors.push(`${name} takes at most ${maxItems} entries`);
  }
  if (items.some((item) => item.length > maxLength)) {
    errors.push(`${name} entries must be at most ${maxLength} characters`);
  }
}

function validateActions(errors: string[], actions: AutoModerationAction[]): void {
  actions.forEach((action, index) => {
    const metadata = action.metadata ?? {};
    switch (action.type) {
      case AutoModerationActionType.SendAlertMessage:
        if (metadata.channel_id === undefined) {
          errors.push(`actions[${index}]: alert actions need metadata.channel_id`);
        }
        checkSnowflake(errors, `actions[${index}].metadata.channel_id`, metadata.channel_id);
        break;
      case AutoModerationActionType.Timeout:
        if (metadata.duration_seconds === undefined) {
          errors.push(`actions[${index}]: timeout actions need metadata.duration_seconds`);
        }
        checkRange(errors, `actions[${index}].metadata.duration_seconds`, metadata.duration_seconds, 0, MAX_TIMEOUT_SECONDS);
        break;
      case AutoModerationActionType.BlockMessage:
        checkLength(errors, `actions[${index}].metadata.custom_message`, metadata.custom_message, 0, 150);
        break;
      default:
        break;
    }
  });
}

function validateRule(
  errors: string[],
  payload: ModifyAutoModerationRulePayload,
  triggerType: AutoModerationTriggerType | undefined
): void {
  checkLength(errors, 'name', payload.name, 1, 100);

  const metadata = payload.trigger_metadata;
  if (metadata) {
    checkList(errors, 'keyword_filter', metadata.keyword_filter, 1000, 60);
    checkList(errors, 'regex_patterns', metadata.regex_patterns, 10, 260);
    const allowListLimit = triggerType === AutoModerationTriggerType.Keyword ? 100 : 1000;
    checkList(errors, 'allow_list', metadata.allow_list, allowListLimit, 60);
    checkRange(errors, 'mention_total_limit', metadata.mention_total_limit, 0, 50);
  }

  if (payload.actions !== undefined) {
    if (payload.actions.length === 0) {
      errors.push('A rule needs at least one action');
    }
    validateActions(errors, payload.actions);
  }

  if (payload.exempt_roles && payload.exempt_roles.length > 20) {
    errors.push('exempt_roles takes at most 20 roles');
  }
  if (payload.exempt_channels && payload.exempt_channels.length > 50) {
    errors.push('exempt_channels takes at most 50 channels');
  }
  for (const roleId of payload.exempt_roles ?? []) {
    checkSnowflake(errors, 'exempt_roles', roleId);
  }
  for (const channelId of payload.exempt_channels ?? []) {
    checkSnowflake(errors, 'exempt_channels', channelId);
  }
}

export class AutoModerationApi extends ApiResource {
  async listRules(guildId: Snowflake): Promise<AutoModerationRule[]> {
    return this.transport.execute<AutoModerationRule[]>({
      method: 'GET',
      route: Routes.autoModerationRules,
      params: { guild_id: guildId },
      operation: 'autoModeration.listRules',
    });
  }

  async getRule(guildId: Snowflake, ruleId: Snowflake): Promise<AutoModerationRule> {
    return this.transport.execute<AutoModerationRule>({
      method: 'GET',
      route: Routes.autoModerationRule,
      params: { guild_id: guildId, rule_id: ruleId },
      operation: 'autoModeration.getRule',
    });
  }

  async createRule(
    guildId: Snowflake,
    payload: CreateAutoModerationRulePayload,
    reason?: string
  ): Promise<AutoModerationRule> {
    const errors: string[] = [];
    validateRule(errors, payload, payload.trigger_type);
    assertValid(errors);

    const rule = await this.transport.execute<AutoModerationRule>({
      method: 'POST',
      route: Routes.autoModerationRules,
      params: { guild_id: guildId },
      body: payload,
      reason,
      operation: 'autoModeration.createRule',
    });
    this.logger.info('Auto moderation rule created', { guildId, ruleId: rule.id });
    return rule;
  }

  async modifyRule(
    guildId: Snowflake,
    ruleId: Snowflake,
    payload: ModifyAutoModerationRulePayload,
    reason?: string
  ): Promise<AutoModerationRule> {
    const errors: string[] = [];
    validateRule(errors, payload, undefined);
    assertValid(errors);

    return this.transport.execute<AutoModerationRule>({
      method: 'PATCH',
      route: Routes.autoModerationRule,
      params: { guild_id: guildId, rule_id: ruleId },
      body: payload,
      reason,
      operation: 'autoModeration.modifyRule',
    });
  }

  async deleteRule(guildId: Snowflake, ruleId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.autoModerationRule,
      params: { guild_id: guildId, rule_id: ruleId },
      reason,
      operation: 'autoModeration.deleteRule',
    });
  }
}
