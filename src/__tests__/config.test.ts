/**
 * Tests for configuration.
 */

import {
  DiscordConfigBuilder,
  SecretString,
  parseWebhookUrl,
  buildWebhookUrl,
  ConfigurationError,
  NoAuthenticationError,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_USER_AGENT,
  DISCORD_API_BASE_URL,
} from '../index.js';

const WEBHOOK_URL = 'https://discord.com/api/webhooks/123456789012345678/test-webhook-token';

describe('DiscordConfigBuilder', () => {
  describe('build', () => {
    it('should build with a bot token and defaults', () => {
      const config = new DiscordConfigBuilder().withBotToken('test-secret').build();

      expect(config.botToken).toBe('test-secret');
      expect(config.defaultWebhookUrl).toBeUndefined();
      expect(config.baseUrl).toBe(DISCORD_API_BASE_URL);
      expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
      expect(config.requestTimeoutMs).toBe(30000);
      expect(config.rateLimitConfig).toEqual(DEFAULT_RATE_LIMIT_CONFIG);
      expect(config.retryConfig).toEqual(DEFAULT_RETRY_CONFIG);
    });

    it('should build with only a webhook URL', () => {
      const config = new DiscordConfigBuilder().withWebhook(WEBHOOK_URL).build();

      expect(config.botToken).toBeUndefined();
      expect(config.defaultWebhookUrl).toBe(WEBHOOK_URL);
    });

    it('should throw without any credentials', () => {
      expect(() => new DiscordConfigBuilder().build()).toThrow(NoAuthenticationError);
    });

    it('should not share nested config between builds', () => {
      const builder = new DiscordConfigBuilder().withBotToken('test-secret');
      const first = builder.build();
      first.rateLimitConfig.globalLimit = 1;

      expect(builder.build().rateLimitConfig.globalLimit).toBe(50);
    });
  });

  describe('withBotToken', () => {
    it('should strip a leading "Bot " prefix and whitespace', () => {
      const config = new DiscordConfigBuilder().withBotToken('  Bot test-secret ').build();
      expect(config.botToken).toBe('test-secret');
    });

    it('should reject an empty token', () => {
      expect(() => new DiscordConfigBuilder().withBotToken('   ')).toThrow(
        'Configuration error: Bot token cannot be empty'
      );
    });
  });

  describe('withWebhook', () => {
    it('should accept canary and versioned webhook URLs', () => {
      const url = 'https://canary.discord.com/api/v10/webhooks/123456789012345678/test-token';
      expect(new DiscordConfigBuilder().withWebhook(url).build().defaultWebhookUrl).toBe(url);
    });

    it('should reject URLs that are not Discord webhooks', () => {
      expect(() => new DiscordConfigBuilder().withWebhook('https://example.com/hook')).toThrow(
        ConfigurationError
      );
      expect(() => new DiscordConfigBuilder().withWebhook('')).toThrow(
        'Configuration error: Webhook URL cannot be empty'
      );
    });
  });

  describe('withBaseUrl', () => {
    it('should drop a trailing slash', () => {
      const config = new DiscordConfigBuilder()
        .withBotToken('test-secret')
        .withBaseUrl('https://discord.test/api/v10/')
        .build();
      expect(config.baseUrl).toBe('https://discord.test/api/v10');
    });

    it('should require HTTPS', () => {
      expect(() => new DiscordConfigBuilder().withBaseUrl('http://discord.test')).toThrow(
        'Configuration error: Base URL must be HTTPS'
      );
    });
  });

  describe('withRateLimitConfig', () => {
    it('should merge partial settings', () => {
      const config = new DiscordConfigBuilder()
        .withBotToken('test-secret')
        .withRateLimitConfig({ queueTimeout: 500 })
        .build();

      expect(config.rateLimitConfig).toEqual({ globalLimit: 50, queueTimeout: 500, maxQueueSize: 1000 });
    });

    it('should reject non-positive values', () => {
      expect(() => new DiscordConfigBuilder().withRateLimitConfig({ maxQueueSize: 0 })).toThrow(
        'Configuration error: Rate limit settings must be positive'
      );
    });
  });

  describe('withRetryConfig', () => {
    it('should merge partial settings', () => {
      const config = new DiscordConfigBuilder()
        .withBotToken('test-secret')
        .withRetryConfig({ maxRetries: 0 })
        .build();

      expect(config.retryConfig.maxRetries).toBe(0);
      expect(config.retryConfig.initialBackoffMs).toBe(1000);
    });

    it('should reject negative retries and out-of-range jitter', () => {
      expect(() => new DiscordConfigBuilder().withRetryConfig({ maxRetries: -1 })).toThrow(
        'Configuration error: maxRetries cannot be negative'
      );
      expect(() => new DiscordConfigBuilder().withRetryConfig({ jitterFactor: 1.5 })).toThrow(
        'Configuration error: jitterFactor must be between 0 and 1'
      );
    });
  });

  describe('withRequestTimeout and withUserAgent', () => {
    it('should apply valid values', () => {
      const config = new DiscordConfigBuilder()
        .withBotToken('test-secret')
        .withRequestTimeout(5000)
        .withUserAgent(' DiscordBot (https://example.test, 2.0) ')
        .build();

      expect(config.requestTimeoutMs).toBe(5000);
      expect(config.userAgent).toBe('DiscordBot (https://example.test, 2.0)');
    });

    it('should reject invalid values', () => {
      expect(() => new DiscordConfigBuilder().withRequestTimeout(0)).toThrow(ConfigurationError);
      expect(() => new DiscordConfigBuilder().withUserAgent(' ')).toThrow(ConfigurationError);
    });
  });

  describe('fromEnv', () => {
    it('should read every supported variable', () => {
      const config = DiscordConfigBuilder.fromEnv({
        DISCORD_BOT_TOKEN: 'test-secret',
        DISCORD_WEBHOOK_URL: WEBHOOK_URL,
        DISCORD_API_BASE_URL: 'https://discord.test/api/v10',
        DISCORD_REQUEST_TIMEOUT_MS: '2500',
        DISCORD_USER_AGENT: 'DiscordBot (https://example.test, 1.0)',
        DISCORD_GLOBAL_RATE_LIMIT: '25',
      }).build();

      expect(config.botToken).toBe('test-secret');
      expect(config.defaultWebhookUrl).toBe(WEBHOOK_URL);
      expect(config.baseUrl).toBe('https://discord.test/api/v10');
      expect(config.requestTimeoutMs).toBe(2500);
      expect(config.userAgent).toBe('DiscordBot (https://example.test, 1.0)');
      expect(config.rateLimitConfig.globalLimit).toBe(25);
    });

    it('should ignore unrelated variables', () => {
      const config = DiscordConfigBuilder.fromEnv({ DISCORD_BOT_TOKEN: 'test-secret', HOME: '/root' }).build();
      expect(config.botToken).toBe('test-secret');
    });

    it('should leave the builder without credentials on an empty environment', () => {
      expect(() => DiscordConfigBuilder.fromEnv({}).build()).toThrow(NoAuthenticationError);
    });

    it('should report malformed variables', () => {
      expect(() =>
        DiscordConfigBuilder.fromEnv({ DISCORD_BOT_TOKEN: 'test-secret', DISCORD_REQUEST_TIMEOUT_MS: 'soon' })
      ).toThrow(/^Configuration error: Invalid environment \(DISCORD_REQUEST_TIMEOUT_MS: /);
    });

    it('should reject a webhook URL for another host', () => {
      expect(() => DiscordConfigBuilder.fromEnv({ DISCORD_WEBHOOK_URL: 'https://example.com/hook' })).toThrow(
        'Configuration error: Invalid environment (DISCORD_WEBHOOK_URL: must be a Discord webhook URL)'
      );
    });
  });
});

describe('SecretString', () => {
  it('should hide its value when printed or serialized', () => {
    const secret = new SecretString('test-secret');

    expect(String(secret)).toBe('[REDACTED]');
    expect(JSON.stringify({ secret })).toBe('{"secret":"[REDACTED]"}');
    expect(secret.expose()).toBe('test-secret');
  });
});

describe('webhook URLs', () => {
  it('should parse the id and token', () => {
    expect(parseWebhookUrl(WEBHOOK_URL)).toEqual({
      webhookId: '123456789012345678',
      webhookToken: 'test-webhook-token',
    });
  });

  it('should accept legacy discordapp.com URLs', () => {
    const parsed = parseWebhookUrl('https://discordapp.com/api/webhooks/1/abc');
    expect(parsed.webhookId).toBe('1');
  });

  it('should reject malformed URLs', () => {
    expect(() => parseWebhookUrl('https://discord.com/api/channels/1')).toThrow(
      'Configuration error: Invalid webhook URL format'
    );
  });

  it('should build a URL from id and token', () => {
    expect(buildWebhookUrl('123', 'abc')).toBe('https://discord.com/api/v10/webhooks/123/abc');
    expect(buildWebhookUrl('123', 'abc', 'https://discord.test/api')).toBe(
      'https://discord.test/api/webhooks/123/abc'
    );
  });
});
