/**
 * Thread endpoints.
 */

import { ApiResource } from './base.js';
import {
  MessageContentParams,
  assertValid,
  checkLength,
  checkRange,
  checkSnowflake,
  toMessageBody,
  toIsoTimestamp,
  validateMessageContent,
} from './validation.js';
import { MAX_SLOWMODE_SECONDS } from './channels.js';
import { Routes } from '../routes/index.js';
import {
  Channel,
  ChannelType,
  Message,
  Snowflake,
  ThreadAutoArchiveDuration,
  ThreadList,
  ThreadMember,
} from '../types/index.js';

interface ThreadOptions {
  /** 1-100 characters */
  name: string;
  autoArchiveDuration?: ThreadAutoArchiveDuration;
  /** Slowmode in seconds */
  rateLimitPerUser?: number;
}

export type StartThreadFromMessageParams = ThreadOptions;

export interface StartThreadParams extends ThreadOptions {
  /** Defaults to a private thread, as Discord does */
  type?: ChannelType.PublicThread | ChannelType.PrivateThread | ChannelType.AnnouncementThread;
  /** Private threads only */
  invitable?: boolean;
}

export interface StartForumThreadParams extends ThreadOptions {
  /** The thread's first message */
  message: MessageContentParams & { stickerIds?: Snowflake[] };
  appliedTags?: Snowflake[];
}

/**
 * A forum thread together with its starter message.
 */
export type ForumThread = Channel & { message?: Message };

export interface ListThreadMembersParams {
  withMember?: boolean;
  after?: Snowflake;
  /** 1-100 */
  limit?: number;
}

export interface ListArchivedThreadsParams {
  /** Threads archived before this time */
  before?: Date | string;
  /** 2-100 */
  limit?: number;
}

export interface ListJoinedArchivedThreadsParams {
  /** Threads with an ID before this one */
  before?: Snowflake;
  limit?: number;
}

function validateThreadOptions(errors: string[], options: ThreadOptions): void {
  checkLength(errors, 'name', options.name, 1, 100);
  checkRange(errors, 'rateLimitPerUser', options.rateLimitPerUser, 0, MAX_SLOWMODE_SECONDS);
}

function toThreadBody(options: ThreadOptions): Record<string, unknown> {
  const body: Record<string, unknown> = { name: options.name };
  if (options.autoArchiveDuration !== undefined) {
    body.auto_archive_duration = options.autoArchiveDuration;
  }
  if (options.rateLimitPerUser !== undefined) {
    body.rate_limit_per_user = options.rateLimitPerUser;
  }
  return body;
}

export class ThreadsApi extends ApiResource {
  async startFromMessage(
    channelId: Snowflake,
    messageId: Snowflake,
    params: StartThreadFromMessageParams,
    reason?: string
  ): Promise<Channel> {
    const errors: string[] = [];
    validateThreadOptions(errors, params);
    assertValid(errors);

    const thread = await this.transport.execute<Channel>({
      method: 'POST',
      route: Routes.messageThreads,
      params: { channel_id: channelId, message_id: messageId },
      body: toThreadBody(params),
      reason,
      operation: 'threads.startFromMessage',
    });
    this.logger.info('Thread created', { channelId, threadId: thread.id });
    return thread;
  }

  /**
   * Starts a thread without a starter message.
   */
  async start(channelId: Snowflake, params: StartThreadParams, reason?: string): Promise<Channel> {
    const errors: string[] = [];
    validateThreadOptions(errors, params);
    if (params.invitable !== undefined && params.type !== undefined && params.type !== ChannelType.PrivateThread) {
      errors.push('invitable only applies to private threads');
    }
    assertValid(errors);

    const body = toThreadBody(params);
    body.type = params.type ?? ChannelType.PrivateThread;
    if (params.invitable !== undefined) body.invitable = params.invitable;

    const thread = await this.transport.execute<Channel>({
      method: 'POST',
      route: Routes.channelThreads,
      params: { channel_id: channelId },
      body,
      reason,
      operation: 'threads.start',
    });
    this.logger.info('Thread created', { channelId, threadId: thread.id });
    return thread;
  }

  /**
   * Creates a post in a forum or media channel.
   */
  async startInForum(
    channelId: Snowflake,
    params: StartForumThreadParams,
    reason?: string
  ): Promise<ForumThread> {
    const errors: string[] = [];
    validateThreadOptions(errors, params);
    validateMessageContent(errors, params.message, {
      requireContent: true,
      extraSource: params.message.stickerIds !== undefined && params.message.stickerIds.length > 0,
    });
    if (params.appliedTags && params.appliedTags.length > 5) {
      errors.push('A forum post can have at most 5 tags');
    }
    for (const tag of params.appliedTags ?? []) {
      checkSnowflake(errors, 'appliedTags', tag);
    }
    assertValid(errors);

    const message = toMessageBody(params.message);
    if (params.message.stickerIds?.length) message.sticker_ids = params.message.stickerIds;

    const body = toThreadBody(params);
    body.message = message;
    if (params.appliedTags !== undefined) body.applied_tags = params.appliedTags;

    const thread = await this.transport.execute<ForumThread>({
      method: 'POST',
      route: Routes.channelThreads,
      params: { channel_id: channelId },
      body,
      files: params.message.files,
      attachmentsIn: 'message',
      reason,
      operation: 'threads.startInForum',
    });
    this.logger.info('Forum post created', { channelId, threadId: thread.id });
    return thread;
  }

  async join(threadId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.threadOwnMember,
      params: { channel_id: threadId },
      operation: 'threads.join',
    });
  }

  async leave(threadId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.threadOwnMember,
      params: { channel_id: threadId },
      operation: 'threads.leave',
    });
  }

  async addMember(threadId: Snowflake, userId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'PUT',
      route: Routes.threadMember,
      params: { channel_id: threadId, user_id: userId },
      operation: 'threads.addMember',
    });
  }

  async removeMember(threadId: Snowflake, userId: Snowflake): Promise<void> {
    await this.transport.executeVoid({
      method: 'DELETE',
      route: Routes.threadMember,
      params: { channel_id: threadId, user_id: userId },
      operation: 'threads.removeMember',
    });
  }

  async getMember(threadId: Snowflake, userId: Snowflake, withMember: boolean = false): Promise<ThreadMember> {
    return this.transport.execute<ThreadMember>({
      method: 'GET',
      route: Routes.threadMember,
      params: { channel_id: threadId, user_id: userId },
      query: { with_member: withMember || undefined },
      operation: 'threads.getMember',
    });
  }

  async listMembers(threadId: Snowflake, params: ListThreadMembersParams = {}): Promise<ThreadMember[]> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 1, 100);
    checkSnowflake(errors, 'after', params.after);
    if ((params.after !== undefined || params.limit !== undefined) && !params.withMember) {
      errors.push('after and limit require withMember');
    }
    assertValid(errors);

    return this.transport.execute<ThreadMember[]>({
      method: 'GET',
      route: Routes.threadMembers,
      params: { channel_id: threadId },
      query: { with_member: params.withMember, after: params.after, limit: params.limit },
      operation: 'threads.listMembers',
    });
  }

  /**
   * Lists active threads in a guild the bot can see.
   */
  async listActive(guildId: Snowflake): Promise<ThreadList> {
    return this.transport.execute<ThreadList>({
      method: 'GET',
      route: Routes.guildActiveThreads,
      params: { guild_id: guildId },
      operation: 'threads.listActive',
    });
  }

  async listPublicArchived(channelId: Snowflake, params: ListArchivedThreadsParams = {}): Promise<ThreadList> {
    return this.listArchived(Routes.threadsPublicArchived, 'threads.listPublicArchived', channelId, params);
  }

  async listPrivateArchived(channelId: Snowflake, params: ListArchivedThreadsParams = {}): Promise<ThreadList> {
    return this.listArchived(Routes.threadsPrivateArchived, 'threads.listPrivateArchived', channelId, params);
  }

  /**
   * Private archived threads the current user has joined, ordered by ID.
   */
  async listJoinedPrivateArchived(
    channelId: Snowflake,
    params: ListJoinedArchivedThreadsParams = {}
  ): Promise<ThreadList> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 2, 100);
    checkSnowflake(errors, 'before', params.before);
    assertValid(errors);

    return this.transport.execute<ThreadList>({
      method: 'GET',
      route: Routes.threadsJoinedPrivateArchived,
      params: { channel_id: channelId },
      query: { before: params.before, limit: params.limit },
      operation: 'threads.listJoinedPrivateArchived',
    });
  }

  private async listArchived(
    route: string,
    operation: string,
    channelId: Snowflake,
    params: ListArchivedThreadsParams
  ): Promise<ThreadList> {
    const errors: string[] = [];
    checkRange(errors, 'limit', params.limit, 2, 100);
    const before = toIsoTimestamp(errors, 'before', params.before);
    assertValid(errors);

    return this.transport.execute<ThreadList>({
      method: 'GET',
      route,
      params: { channel_id: channelId },
      query: { before, limit: params.limit },
      operation,
    });
  }
}
