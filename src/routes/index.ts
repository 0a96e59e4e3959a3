/**
 * Route templates, compilation and rate-limit bucket identity.
 *
 * A template such as `/channels/:channel_id/messages/:message_id` compiles
 * to the request path plus a bucket route (`GET /channels/:channel_id/...`)
 * and the value of its major parameter. Requests that differ only in minor
 * parameters (the message ID above) share a bucket; requests with different
 * major parameters never do.
 */

import { ValidationError } from '../errors/index.js';
import { isValidSnowflake } from '../types/snowflake.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type RouteParams = Record<string, string | number>;

export type QueryValue = string | number | boolean | undefined | ReadonlyArray<string | number>;

export type QueryParams = Record<string, QueryValue>;

export interface CompiledRoute {
  method: HttpMethod;
  template: string;
  /** Path with parameters substituted and URL-encoded */
  path: string;
  /** `METHOD template`, the bucket identity before Discord reports a hash */
  bucketRoute: string;
  /** Value of the major parameter, or `global` */
  majorParameter: string;
  /** Token-authenticated routes are sent without the bot token and skip the global limit */
  usesToken: boolean;
}

/**
 * Major parameters in order of precedence.
 *
 * Webhook and interaction routes are keyed by their IDs so that tokens never
 * end up in bucket keys, stats or logs.
 */
export const MAJOR_PARAMETERS = ['channel_id', 'guild_id', 'webhook_id', 'interaction_id'] as const;

const TOKEN_PARAMETERS = ['webhook_token', 'interaction_token'];

const PLACEHOLDER_PATTERN = /:([a-z_]+)/g;

/**
 * Compiles a route template.
 * @throws ValidationError when a placeholder has no value, or an `*_id` value is not a snowflake
 */
export function compileRoute(method: HttpMethod, template: string, params: RouteParams = {}): CompiledRoute {
  const problems: string[] = [];
  const names: string[] = [];

  const path = template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    names.push(name);
    const value = params[name];
    if (value === undefined || String(value).length === 0) {
      problems.push(`Missing route parameter "${name}"`);
      return '';
    }
    if (name.endsWith('_id') && !isValidSnowflake(String(value))) {
      problems.push(`${name} must be a snowflake`);
      return '';
    }
    return encodeURIComponent(String(value));
  });

  if (problems.length > 0) {
    throw new ValidationError(problems);
  }

  let majorParameter = 'global';
  for (const major of MAJOR_PARAMETERS) {
    if (names.includes(major)) {
      majorParameter = String(params[major]);
      break;
    }
  }

  return {
    method,
    template,
    path,
    bucketRoute: `${method} ${template}`,
    majorParameter,
    usesToken: names.some((name) => TOKEN_PARAMETERS.includes(name)),
  };
}

/**
 * Serializes query parameters. `undefined` values are dropped and arrays
 * repeat their key.
 */
export function buildQuery(query: QueryParams = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      params.append(key, String(value));
      continue;
    }
    for (const item of value) {
      params.append(key, String(item));
    }
  }
  const serialized = params.toString();
  return serialized ? `?${serialized}` : '';
}

/**
 * Every endpoint template bound by the API classes.
 */
export const Routes = {
  // Channels
  channel: '/channels/:channel_id',
  channelPermission: '/channels/:channel_id/permissions/:overwrite_id',
  channelInvites: '/channels/:channel_id/invites',
  channelTyping: '/channels/:channel_id/typing',
  channelPins: '/channels/:channel_id/pins',
  channelPin: '/channels/:channel_id/pins/:message_id',
  channelFollowers: '/channels/:channel_id/followers',
  channelWebhooks: '/channels/:channel_id/webhooks',
  channelRecipient: '/channels/:channel_id/recipients/:user_id',

  // Messages
  channelMessages: '/channels/:channel_id/messages',
  channelMessage: '/channels/:channel_id/messages/:message_id',
  channelBulkDelete: '/channels/:channel_id/messages/bulk-delete',
  channelMessageCrosspost: '/channels/:channel_id/messages/:message_id/crosspost',

  // Reactions
  messageReactions: '/channels/:channel_id/messages/:message_id/reactions',
  messageReaction: '/channels/:channel_id/messages/:message_id/reactions/:emoji',
  messageOwnReaction: '/channels/:channel_id/messages/:message_id/reactions/:emoji/@me',
  messageUserReaction: '/channels/:channel_id/messages/:message_id/reactions/:emoji/:user_id',

  // Threads
  messageThreads: '/channels/:channel_id/messages/:message_id/threads',
  channelThreads: '/channels/:channel_id/threads',
  threadMembers: '/channels/:channel_id/thread-members',
  threadOwnMember: '/channels/:channel_id/thread-members/@me',
  threadMember: '/channels/:channel_id/thread-members/:user_id',
  threadsPublicArchived: '/channels/:channel_id/threads/archived/public',
  threadsPrivateArchived: '/channels/:channel_id/threads/archived/private',
  threadsJoinedPrivateArchived: '/channels/:channel_id/users/@me/threads/archived/private',
  guildActiveThreads: '/guilds/:guild_id/threads/active',

  // Guilds
  guilds: '/guilds',
  guild: '/guilds/:guild_id',
  guildPreview: '/guilds/:guild_id/preview',
  guildChannels: '/guilds/:guild_id/channels',
  guildBans: '/guilds/:guild_id/bans',
  guildBan: '/guilds/:guild_id/bans/:user_id',
  guildPrune: '/guilds/:guild_id/prune',
  guildAuditLog: '/guilds/:guild_id/audit-logs',
  guildRegions: '/guilds/:guild_id/regions',
  guildInvites: '/guilds/:guild_id/invites',
  guildIntegrations: '/guilds/:guild_id/integrations',
  guildIntegration: '/guilds/:guild_id/integrations/:integration_id',
  guildWidget: '/guilds/:guild_id/widget',
  guildVanityUrl: '/guilds/:guild_id/vanity-url',
  guildWelcomeScreen: '/guilds/:guild_id/welcome-screen',
  guildWebhooks: '/guilds/:guild_id/webhooks',
  guildWidgetJson: '/guilds/:guild_id/widget.json',
  guildMemberVerification: '/guilds/:guild_id/member-verification',
  guildCurrentVoiceState: '/guilds/:guild_id/voice-states/@me',
  guildVoiceState: '/guilds/:guild_id/voice-states/:user_id',

  // Members
  guildMembers: '/guilds/:guild_id/members',
  guildMembersSearch: '/guilds/:guild_id/members/search',
  guildMember: '/guilds/:guild_id/members/:user_id',
  guildCurrentMember: '/guilds/:guild_id/members/@me',
  guildMemberRole: '/guilds/:guild_id/members/:user_id/roles/:role_id',

  // Roles
  guildRoles: '/guilds/:guild_id/roles',
  guildRole: '/guilds/:guild_id/roles/:role_id',

  // Emojis
  guildEmojis: '/guilds/:guild_id/emojis',
  guildEmoji: '/guilds/:guild_id/emojis/:emoji_id',

  // Stickers
  sticker: '/stickers/:sticker_id',
  stickerPacks: '/sticker-packs',
  guildStickers: '/guilds/:guild_id/stickers',
  guildSticker: '/guilds/:guild_id/stickers/:sticker_id',

  // Scheduled events
  guildScheduledEvents: '/guilds/:guild_id/scheduled-events',
  guildScheduledEvent: '/guilds/:guild_id/scheduled-events/:event_id',
  guildScheduledEventUsers: '/guilds/:guild_id/scheduled-events/:event_id/users',

  // Stage instances
  stageInstances: '/stage-instances',
  stageInstance: '/stage-instances/:channel_id',

  // Auto moderation
  autoModerationRules: '/guilds/:guild_id/auto-moderation/rules',
  autoModerationRule: '/guilds/:guild_id/auto-moderation/rules/:rule_id',

  // Guild templates
  template: '/guilds/templates/:template_code',
  guildTemplates: '/guilds/:guild_id/templates',
  guildTemplate: '/guilds/:guild_id/templates/:template_code',

  // Webhooks
  webhook: '/webhooks/:webhook_id',
  webhookWithToken: '/webhooks/:webhook_id/:webhook_token',
  webhookSlack: '/webhooks/:webhook_id/:webhook_token/slack',
  webhookGitHub: '/webhooks/:webhook_id/:webhook_token/github',
  webhookMessage: '/webhooks/:webhook_id/:webhook_token/messages/:message_id',

  // Interactions; followups are webhook routes keyed by the application ID
  interactionCallback: '/interactions/:interaction_id/:interaction_token/callback',
  interactionOriginal: '/webhooks/:webhook_id/:interaction_token/messages/@original',
  interactionFollowups: '/webhooks/:webhook_id/:interaction_token',
  interactionFollowup: '/webhooks/:webhook_id/:interaction_token/messages/:message_id',

  // Application commands
  globalCommands: '/applications/:application_id/commands',
  globalCommand: '/applications/:application_id/commands/:command_id',
  guildCommands: '/applications/:application_id/guilds/:guild_id/commands',
  guildCommand: '/applications/:application_id/guilds/:guild_id/commands/:command_id',
  guildCommandsPermissions: '/applications/:application_id/guilds/:guild_id/commands/permissions',
  guildCommandPermissions:
    '/applications/:application_id/guilds/:guild_id/commands/:command_id/permissions',

  // Users
  currentUser: '/users/@me',
  user: '/users/:user_id',
  currentUserGuilds: '/users/@me/guilds',
  currentUserGuild: '/users/@me/guilds/:guild_id',
  currentUserChannels: '/users/@me/channels',
  currentUserConnections: '/users/@me/connections',

  // Invites
  invite: '/invites/:invite_code',

  // Applications, gateway and voice
  currentApplication: '/oauth2/applications/@me',
  gateway: '/gateway',
  gatewayBot: '/gateway/bot',
  voiceRegions: '/voice/regions',
} as const;

export type RouteTemplate = (typeof Routes)[keyof typeof Routes];
