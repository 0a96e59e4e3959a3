/**
 * Stage instance endpoints. An instance holds the live topic of a stage
 * channel and is keyed by that channel.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength, checkSnowflake } from './validation.js';
import { Routes } from '../routes/index.js';
import { Snowflake, StageInstance, StagePrivacyLevel } from '../types/index.js';

export interface CreateStageInstanceParams {
  channelId: Snowflake;
  /** 1-120 characters */
  topic: string;
  privacyLevel?: StagePrivacyLevel;
  /** Notify @everyone that the stage started; needs Mention Everyone */
  sendStartNotification?: boolean;
  /** Scheduled event the stage belongs to */
  guildScheduledEventId?: Snowflake;
}

export interface ModifyStageInstanceParams {
  topic?: string;
  privacyLevel?: StagePrivacyLevel;
}

export class StageInstancesApi extends ApiResource {
  async create(params: CreateStageInstanceParams, reason?: string): Promise<StageInstance> {
    const errors: string[] = [];
    checkSnowflake(errors, 'channelId', params.channelId);
    checkLength(errors, 'topic', params.topic, 1, 120);
    checkSnowflake(errors, 'guildScheduledEventId', params.guildScheduledEventId);
    assertValid(errors);

    const body: Record<string, unknown> = { channel_id: params.channelId, topic: params.topic };
    if (params.privacyLevel !== undefined) body.privacy_level = params.privacyLevel;
    if (params.sendStartNotification !== undefined) body.send_start_notification = params.sendStartNotification;
    if (params.guildScheduledEventId !== undefined) body.guild_scheduled_event_id = params.guildScheduledEventId;

    const instance = await this.transport.execute<StageInstance>({
      method: 'POST',
      route: Routes.stageInstances,
      body,
      reason,
      operation: 'stageInstances.create',
    });
    this.logger.info('Stage started', { channelId: params.channelId, stageInstanceId: instance.id });
    return instance;
  }

  async get(channelId: Snowflake): Promise<StageInstance> {
    return this.transport.execute<StageInstance>({
      method: 'GET',
      route: Routes.stageInstance,
      params: { channel_id: channelId },
      operation: 'stageInstances.get',
    });
  }

  async modify(channelId: Snowflake, params: ModifyStageInstanceParams, reason?: string): Promise<StageInstance> {
    const errors: string[] = [];
    checkLength(errors, 'topic', params.topic, 1, 120);
    assertValid(errors);

    const body: Record<string, unknown> = {};
    if (params.topic !== undefined) body.topic = params.topic;
    if (params.privacyLevel !== undefined) body.privacy_level = params.privacyLevel;

    return this.transport.execute<StageInstance>({
      method: 'PATCH',
      route: Routes.stageInstance,
      params: { channel_id: channelId },
      body,
      reason,
      operation: 'stageInstances.modify',
    });
  }

  /**
   * Ends the stage.
   */
  async delete(channelId: Snowflake, reason?: string): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.stageInstance,
      params: { channel_id: channelId },
      reason,
      operation: 'stageInstances.delete',
    });
  }
}
