/**
 * Guild scheduled event endpoints, including the list of interested users.
 */

import { ApiResource } from './base.js';
import { assertValid, checkLength, checkRange, checkSnowflake, toIsoTimestamp } from './validation.js';
import { Routes } from '../routes/index.js';
import {
  GuildScheduledEvent,
  GuildScheduledEventUser,
  ScheduledEventEntityMetadata,
  ScheduledEventEntityType,
  ScheduledEventPrivacyLevel,
  ScheduledEventStatus,
  Snowflake,
} from '../types/index.js';

export interface CreateScheduledEventPayload {
  /** 1-100 characters */
  name: string;
  /** Up to 1000 characters */
  description?: string;
  entity_type: ScheduledEventEntityType;
  /** Required for stage and voice events, absent for external ones */
  channel_id?: Snowflake;
  /** `location` is required for external events */
  entity_metadata?: ScheduledEventEntityMetadata;
  scheduled_start_time: Date | string;
  /** Required for external events */
  scheduled_end_time?: Date | string;
  /** Defaults to guild only, the one level Discord accepts */
  privacy_level?: ScheduledEventPrivacyLevel;
  /** Cover image data URI */
  image?: string;
}

export interface ModifyScheduledEventPayload {
  name?: string;
  description?: string | null;
  entity_type?: ScheduledEventEntityType;
  /** Set to `null` when moving an event to an external location */
  channel_id?: Snowflake | null;
  entity_metadata?: ScheduledEventEntityMetadata | null;
  scheduled_start_time?: Date | string;
  scheduled_end_time?: Date | string;
  privacy_level?: ScheduledEventPrivacyLevel;
  /** Start, end or cancel the event */
  status?: ScheduledEventStatus;
  image?: string | null;
}

export interface ListScheduledEventUsersParams {
  /** 1-100, defaults to 100 */
  limit?: number;
  /** Include the guild member of each user */
  withMember?: boolean;
  before?: Snowflake;
  after?: Snowflake;
}

/**
 * Checks an event payload and returns its JSON body with times as ISO8601
 * strings. `entityType` is the type the event will have after the request.
 */
function toEventBody(
  errors: string[],
  payload: ModifyScheduledEventPayload,
  entityType: ScheduledEventEntityType | undefined
): Record<string, unknown> {
  checkLength(errors, 'name', payload.name, 1, 100);
  checkLength(errors, 'description', payload.description ?? undefined, 0, 1000);
  checkSnowflake(errors, 'channel_id', payload.channel_id ?? undefined);

  if (entityType === ScheduledEventEntityType.External) {
    const location = payload.entity_metadata?.location;
    if (location === undefined || location.trim().length === 0) {
      errors.push('External events need entity_metadata.location');
    } else {
      checkLength(errors, 'entity_metadata.location', location, 1, 100);
    }
    if (payload.scheduled_end_time === undefined) {
      errors.push('External events need scheduled_end_time');
    }
    if (payload.channel_id) {
      errors.push('External events cannot have a channel_id');
    }
  }

  const start = toIsoTimestamp(errors, 'scheduled_start_time', payload.scheduled_start_time);
  const end = toIsoTimestamp(errors, 'scheduled_end_time', payload.scheduled_end_time);
  if (start !== undefined && end !== undefined && Date.parse(end) <= Date.parse(start)) {
    errors.push('scheduled_end_time must be after scheduled_start_time');
  }

  const body: Record<string, unknown> = { ...payload };
  if (start !== undefined) body.scheduled_start_time = start;
  if (end !== undefined) body.scheduled_end_time = end;
  return body;
}

export class ScheduledEventsApi extends ApiResource {
  /**
   * @param withUserCount - include the number of interested users
   */
  async list(guildId: Snowflake, withUserCount: boolean = false): Promise<GuildScheduledEvent[]> {
    return this.transport.execute<GuildScheduledEvent[]>({
      method: 'GET',
      route: Routes.guildScheduledEvents,
      params: { guild_id: guildId },
      query: { with_user_count: withUserCount || undefined },
      operation: 'scheduledEvents.list',
    });
  }

  async get(guildId: Snowflake, eventId: Snowflake, withUserCount: boolean = false): Promise<GuildScheduledEvent> {
    return this.transport.execute<GuildScheduledEvent>({
      method: 'GET',
      route: Routes.guildScheduledEvent,
      params: { guild_id: guildId, event_id: eventId },
      query: { with_user_count: withUserCount || undefined },
      operation: 'scheduledEvents.get',
    });
  }

  async create(
    guildId: Snowflake,
    payload: CreateScheduledEventPayload,
    reason?: string
  ): Promise<GuildScheduledEvent> {
    const errors: string[] = [];
    const body = toEventBody(errors, payload, payload.entity_type);
    if (payload.entity_type !== ScheduledEventEntityType.External && payload.channel_id === undefined) {
      errors.push('Stage and voice events need a channel_id');
    }
    body.privacy_level = payload.privacy_level ?? ScheduledEventPrivacyLevel.GuildOnly;
    assertValid(errors);

    const event = await this.transport.execute<GuildScheduledEvent>({
      method: 'POST',
      route: Routes.guildScheduledEvents,
      params: { guild_id: guildId },
      body,
      reason,
      operation: 'scheduledEvents.create',
    });
    this.logger.info('Scheduled event created', { guildId, eventId: event.id });
    return event;
  }

  /**
   * Modifies an event. Moving it to an external location needs
   * `entity_type`, `entity_metadata.location`, `scheduled_end_time` and
   * `channel_id: null` in the same request.
   */
  async modify(
    guildId: Snowflake,
    eventId: Snowflake,
    payload: ModifyScheduledEventPayload,
    reason?: string
  ): Promise<GuildScheduledEvent> {
    const errors: string[] = [];
    const body = toEventBody(errors, payload, payload.entity_type);
    if (payload.status === ScheduledEventStatus.Scheduled) {
      errors.push('status can only change to Active, Completed or Canceled');
    }
    assertValid(errors);

    return this.transport.execute<GuildScheduledEvent>({
      method: 'PATCH',
      route: Routes.guildScheduledEvent,
      params: { guild_id: guildId, event_id: eventId },
      body,
      reason,
      operation: 'scheduledEvents.modify',
    });
  }

  async delete(guildId: Snowflake, eventId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.guildScheduledEvent,
      params: { guild_id: guildId, event_id: eventId },
      operation: 'scheduledEvents.delete',
    });
  }

  /**
   * Lists users interested in an event, ordered by user ID.
   */
  async listUsers(
    guildId: Snowflake,
    eventId: Snowflake,
    params: ListScheduledEventUsersParams = {}
  ): Promise<GuildScheduledEventUser[]> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 100);
    checkSnowflake(errors, 'before', params.before);
    checkSnowflake(errors, 'after', params.after);
    assertValid(errors);

    return this.transport.execute<GuildScheduledEventUser[]>({
      method: 'GET',
      route: Routes.guildScheduledEventUsers,
      params: { guild_id: guildId, event_id: eventId },
      query: {
        limit: params.limit,
        with_member: params.withMember || undefined,
        before: params.before,
        after: params.after,
      },
      operation: 'scheduledEvents.listUsers',
    });
  }
}
