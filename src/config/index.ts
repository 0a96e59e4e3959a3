/**
 * Discord client configuration and builder.
 */

import { z } from 'zod';
import { Snowflake } from '../types/index.js';
import { ConfigurationError, NoAuthenticationError } from '../errors/index.js';

/**
 * Rate limit configuration.
 */
export interface RateLimitConfig {
  /** Authenticated requests allowed per second across all routes. Default: 50 */
  globalLimit: number;
  /** Maximum time a request may wait for its bucket (ms). Default: 30000 */
  queueTimeout: number;
  /** Maximum pending requests per bucket. Default: 1000 */
  maxQueueSize: number;
}

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum retry attempts. Default: 3 */
  maxRetries: number;
  /** Initial backoff delay (ms). Default: 1000 */
  initialBackoffMs: number;
  /** Maximum backoff delay (ms). Default: 30000 */
  maxBackoffMs: number;
  /** Backoff multiplier. Default: 2 */
  backoffMultiplier: number;
  /** Jitter factor (0-1). Default: 0.1 */
  jitterFactor: number;
}

/**
 * Discord client configuration.
 */
export interface DiscordConfig {
  /** Bot token for REST API authentication */
  botToken?: string;
  /** Default webhook URL for webhook operations */
  defaultWebhookUrl?: string;
  /** Discord API base URL */
  baseUrl: string;
  /** Rate limit configuration */
  rateLimitConfig: RateLimitConfig;
  /** Retry configuration */
  retryConfig: RetryConfig;
  /** Request timeout in milliseconds */
  requestTimeoutMs: number;
  /** User agent string */
  userAgent: string;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  globalLimit: 50,
  queueTimeout: 30000,
  maxQueueSize: 1000,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Discord API v10 base URL.
 */
export const DISCORD_API_BASE_URL = 'https://discord.com/api/v10';

/**
 * Default user agent. Discord expects the `DiscordBot (url, version)` form.
 */
export const DEFAULT_USER_AGENT = 'DiscordBot (discord-rest-bindings, 1.0.0)';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

const WEBHOOK_URL_PATTERN =
  /^https:\/\/(?:(?:canary|ptb)\.)?(?:discord\.com|discordapp\.com)\/api(?:\/v\d+)?\/webhooks\/(\d+)\/([\w-]+)\/?$/;

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Environment variables read by {@link DiscordConfigBuilder.fromEnv}.
 */
const envSchema = z.object({
  DISCORD_BOT_TOKEN: z.string().min(1).optional(),
  DISCORD_WEBHOOK_URL: z.string().regex(WEBHOOK_URL_PATTERN, 'must be a Discord webhook URL').optional(),
  DISCORD_API_BASE_URL: z.string().url().optional(),
  DISCORD_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DISCORD_USER_AGENT: z.string().min(1).optional(),
  DISCORD_GLOBAL_RATE_LIMIT: z.coerce.number().int().positive().optional(),
});

export type DiscordEnv = z.infer<typeof envSchema>;

/**
 * Builder for Discord client configuration.
 */
export class DiscordConfigBuilder {
  private botToken?: SecretString;
  private defaultWebhookUrl?: SecretString;
  private baseUrl: string = DISCORD_API_BASE_URL;
  private rateLimitConfig: RateLimitConfig = { ...DEFAULT_RATE_LIMIT_CONFIG };
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;

  /**
   * Sets the bot token for REST API authentication.
   * @param token - The bot token (without "Bot " prefix)
   */
  withBotToken(token: string): this {
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('Bot token cannot be empty');
    }
    this.botToken = new SecretString(token.trim().replace(/^Bot\s+/i, ''));
    return this;
  }

  /**
   * Sets the default webhook URL used when webhook calls omit credentials.
   */
  withWebhook(url: string): this {
    if (!url || url.trim().length === 0) {
      throw new ConfigurationError('Webhook URL cannot be empty');
    }
    if (!WEBHOOK_URL_PATTERN.test(url.trim())) {
      throw new ConfigurationError('Invalid webhook URL format');
    }
    this.defaultWebhookUrl = new SecretString(url.trim());
    return this;
  }

  /**
   * Sets the Discord API base URL.
   * @param url - The base URL (default: https://discord.com/api/v10)
   */
  withBaseUrl(url: string): this {
    if (!url || !url.startsWith('https://')) {
      throw new ConfigurationError('Base URL must be HTTPS');
    }
    this.baseUrl = url.replace(/\/$/, '');
    return this;
  }

  withRateLimitConfig(config: Partial<RateLimitConfig>): this {
    const merged = { ...this.rateLimitConfig, ...config };
    if (merged.globalLimit <= 0 || merged.maxQueueSize <= 0 || merged.queueTimeout <= 0) {
      throw new ConfigurationError('Rate limit settings must be positive');
    }
    this.rateLimitConfig = merged;
    return this;
  }

  withRetryConfig(config: Partial<RetryConfig>): this {
    const merged = { ...this.retryConfig, ...config };
    if (merged.maxRetries < 0) {
      throw new ConfigurationError('maxRetries cannot be negative');
    }
    if (merged.jitterFactor < 0 || merged.jitterFactor > 1) {
      throw new ConfigurationError('jitterFactor must be between 0 and 1');
    }
    this.retryConfig = merged;
    return this;
  }

  /**
   * Sets the request timeout.
   * @param timeoutMs - Timeout in milliseconds
   */
  withRequestTimeout(timeoutMs: number): this {
    if (timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    if (!userAgent || userAgent.trim().length === 0) {
      throw new ConfigurationError('User agent cannot be empty');
    }
    this.userAgent = userAgent.trim();
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - DISCORD_BOT_TOKEN: Bot token
   * - DISCORD_WEBHOOK_URL: Default webhook URL
   * - DISCORD_API_BASE_URL: API base URL
   * - DISCORD_REQUEST_TIMEOUT_MS: Request timeout
   * - DISCORD_USER_AGENT: User agent
   * - DISCORD_GLOBAL_RATE_LIMIT: Requests per second across all routes
   *
   * @throws ConfigurationError if a variable is present but malformed
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): DiscordConfigBuilder {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid environment (${issues.join('; ')})`);
    }

    const values = parsed.data;
    const builder = new DiscordConfigBuilder();

    if (values.DISCORD_BOT_TOKEN) builder.withBotToken(values.DISCORD_BOT_TOKEN);
    if (values.DISCORD_WEBHOOK_URL) builder.withWebhook(values.DISCORD_WEBHOOK_URL);
    if (values.DISCORD_API_BASE_URL) builder.withBaseUrl(values.DISCORD_API_BASE_URL);
    if (values.DISCORD_REQUEST_TIMEOUT_MS) builder.withRequestTimeout(values.DISCORD_REQUEST_TIMEOUT_MS);
    if (values.DISCORD_USER_AGENT) builder.withUserAgent(values.DISCORD_USER_AGENT);
    if (values.DISCORD_GLOBAL_RATE_LIMIT) {
      builder.withRateLimitConfig({ globalLimit: values.DISCORD_GLOBAL_RATE_LIMIT });
    }

    return builder;
  }

  /**
   * Builds the Discord configuration.
   * @throws NoAuthenticationError if neither bot token nor webhook URL is configured
   */
  build(): DiscordConfig {
    if (!this.botToken && !this.defaultWebhookUrl) {
      throw new NoAuthenticationError();
    }

    return {
      botToken: this.botToken?.expose(),
      defaultWebhookUrl: this.defaultWebhookUrl?.expose(),
      baseUrl: this.baseUrl,
      rateLimitConfig: { ...this.rateLimitConfig },
      retryConfig: { ...this.retryConfig },
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
    };
  }
}

/**
 * Parses a webhook URL to extract the webhook ID and token.
 * @throws ConfigurationError if the URL is invalid
 */
export function parseWebhookUrl(url: string): { webhookId: Snowflake; webhookToken: string } {
  const match = WEBHOOK_URL_PATTERN.exec(url.trim());
  if (!match) {
    throw new ConfigurationError('Invalid webhook URL format');
  }
  return {
    webhookId: match[1],
    webhookToken: match[2],
  };
}

/**
 * Builds a webhook URL from ID and token.
 */
export function buildWebhookUrl(
  webhookId: Snowflake,
  webhookToken: string,
  baseUrl: string = DISCORD_API_BASE_URL
): string {
  return `${baseUrl}/webhooks/${webhookId}/${webhookToken}`;
}
