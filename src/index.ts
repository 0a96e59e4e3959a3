/**
 * Discord REST bindings
 *
 * Typed async methods over Discord's REST API (v10), grouped by resource,
 * with per-route rate limit buckets, the global limit, retries and
 * multipart uploads handled underneath.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { DiscordClient, DiscordConfigBuilder, EmbedBuilder } from 'discord-rest-bindings';
 *
 * const client = DiscordClient.fromBuilder(
 *   new DiscordConfigBuilder().withBotToken(process.env.DISCORD_BOT_TOKEN ?? '')
 * );
 *
 * const embed = new EmbedBuilder()
 *   .title('Deploy finished')
 *   .description('All checks passed')
 *   .color(0x57f287)
 *   .timestamp()
 *   .build();
 *
 * const message = await client.messages.create('123456789012345678', {
 *   content: 'Build #42',
 *   embeds: [embed],
 * });
 * await client.reactions.add(message.channel_id, message.id, '✅');
 * ```
 *
 * ## Webhooks only
 *
 * ```typescript
 * const client = DiscordClient.fromBuilder(
 *   new DiscordConfigBuilder().withWebhook('https://discord.com/api/webhooks/<id>/<token>')
 * );
 * await client.webhooks.execute({ content: 'Hello', wait: true });
 * ```
 *
 * @module discord-rest-bindings
 */

// Client
export { DiscordClient } from './client/index.js';
export type { DiscordClientOptions } from './client/index.js';

// Configuration
export type { DiscordConfig, DiscordEnv, RateLimitConfig, RetryConfig } from './config/index.js';
export {
  DiscordConfigBuilder,
  SecretString,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  DISCORD_API_BASE_URL,
  parseWebhookUrl,
  buildWebhookUrl,
} from './config/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Routes
export * from './routes/index.js';

// Resilience
export * from './resilience/index.js';

// Transport
export { DiscordTransport, buildMultipartBody, buildFormFieldsBody } from './transport/index.js';
export type { DiscordRequest, FetchFunction } from './transport/index.js';

// Resource APIs
export * from './api/index.js';

// Types
export * from './types/index.js';
