/**
 * Discord client - main entry point for Discord API operations.
 *
 * Wires configuration, observability, rate limiting, retry and transport,
 * and exposes one API object per Discord resource.
 */

import { DiscordConfig, DiscordConfigBuilder } from '../config/index.js';
import { RateLimiter, RateLimiterStats } from '../resilience/rate-limiter.js';
import { RetryExecutor } from '../resilience/retry.js';
import { DiscordTransport, FetchFunction } from '../transport/index.js';
import {
  Logger,
  MetricsCollector,
  Tracer,
  NoopLogger,
  NoopMetricsCollector,
  NoopTracer,
  MetricNames,
} from '../observability/index.js';
import {
  ApplicationsApi,
  AutoModerationApi,
  ChannelsApi,
  CommandsApi,
  EmojisApi,
  GatewayApi,
  GuildTemplatesApi,
  GuildsApi,
  InteractionsApi,
  InvitesApi,
  MembersApi,
  MessagesApi,
  ReactionsApi,
  RolesApi,
  ScheduledEventsApi,
  StageInstancesApi,
  StickersApi,
  ThreadsApi,
  UsersApi,
  WebhooksApi,
} from '../api/index.js';

/**
 * Discord client options.
 */
export interface DiscordClientOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  tracer?: Tracer;
  /** Replaces the global `fetch`, e.g. in tests */
  fetch?: FetchFunction;
}

/**
 * Discord REST API client.
 *
 * Shareable across callers: all requests go through one rate limiter, so
 * buckets and the global limit are honoured process-wide for this token.
 */
export class DiscordClient {
  readonly channels: ChannelsApi;
  readonly messages: MessagesApi;
  readonly reactions: ReactionsApi;
  readonly threads: ThreadsApi;
  readonly guilds: GuildsApi;
  readonly members: MembersApi;
  readonly roles: RolesApi;
  readonly emojis: EmojisApi;
  readonly stickers: StickersApi;
  readonly scheduledEvents: ScheduledEventsApi;
  readonly stageInstances: StageInstancesApi;
  readonly autoModeration: AutoModerationApi;
  readonly templates: GuildTemplatesApi;
  readonly webhooks: WebhooksApi;
  readonly interactions: InteractionsApi;
  readonly commands: CommandsApi;
  readonly users: UsersApi;
  readonly invites: InvitesApi;
  readonly applications: ApplicationsApi;
  readonly gateway: GatewayApi;

  private readonly config: DiscordConfig;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;

  private constructor(
    config: DiscordConfig,
    transport: DiscordTransport,
    rateLimiter: RateLimiter,
    logger: Logger
  ) {
    this.config = config;
    this.rateLimiter = rateLimiter;
    this.logger = logger;

    this.channels = new ChannelsApi(transport, logger);
    this.messages = new MessagesApi(transport, logger);
    this.reactions = new ReactionsApi(transport, logger);
    this.threads = new ThreadsApi(transport, logger);
    this.guilds = new GuildsApi(transport, logger);
    this.members = new MembersApi(transport, logger);
    this.roles = new RolesApi(transport, logger);
    this.emojis = new EmojisApi(transport, logger);
    this.stickers = new StickersApi(transport, logger);
    this.scheduledEvents = new ScheduledEventsApi(transport, logger);
    this.stageInstances = new StageInstancesApi(transport, logger);
    this.autoModeration = new AutoModerationApi(transport, logger);
    this.templates = new GuildTemplatesApi(transport, logger);
    this.webhooks = new WebhooksApi(transport, logger, config.defaultWebhookUrl);
    this.interactions = new InteractionsApi(transport, logger);
    this.commands = new CommandsApi(transport, logger);
    this.users = new UsersApi(transport, logger);
    this.invites = new InvitesApi(transport, logger);
    this.applications = new ApplicationsApi(transport, logger);
    this.gateway = new GatewayApi(transport, logger);
  }

  /**
   * Creates a new Discord client.
   */
  static create(config: DiscordConfig, options: DiscordClientOptions = {}): DiscordClient {
    const logger = options.logger ?? new NoopLogger();
    const metrics = options.metrics ?? new NoopMetricsCollector();
    const tracer = options.tracer ?? new NoopTracer();

    const rateLimiter = new RateLimiter(config.rateLimitConfig, { logger, metrics });
    const retryExecutor = new RetryExecutor(config.retryConfig, {
      onRetry: (attempt, error, delay) => {
        logger.warn('Retrying Discord request', { attempt, error: error.message, delayMs: delay });
        metrics.incrementCounter(MetricNames.RETRY_ATTEMPTS, 1);
      },
      onExhausted: (error, attempts) => {
        logger.error('Discord request retries exhausted', { attempts, error: error.message });
      },
    });

    const transport = new DiscordTransport({
      config,
      rateLimiter,
      retryExecutor,
      logger,
      metrics,
      tracer,
      fetch: options.fetch,
    });

    logger.debug('Discord client created', {
      baseUrl: config.baseUrl,
      hasBotToken: config.botToken !== undefined,
      hasDefaultWebhook: config.defaultWebhookUrl !== undefined,
    });

    return new DiscordClient(config, transport, rateLimiter, logger);
  }

  /**
   * Creates a client from a builder.
   */
  static fromBuilder(builder: DiscordConfigBuilder, options?: DiscordClientOptions): DiscordClient {
    return DiscordClient.create(builder.build(), options);
  }

  /**
   * Creates a client from environment variables.
   */
  static fromEnv(options?: DiscordClientOptions, env?: NodeJS.ProcessEnv): DiscordClient {
    return DiscordClient.fromBuilder(DiscordConfigBuilder.fromEnv(env), options);
  }

  /**
   * The base URL requests are sent to.
   */
  get baseUrl(): string {
    return this.config.baseUrl;
  }

  getRateLimitStats(): RateLimiterStats {
    return this.rateLimiter.getStats();
  }

  /**
   * Drops rate limit buckets idle for at least `idleMs`. Long-running
   * processes that touch many channels should call this periodically.
   *
   * @returns The number of buckets removed
   */
  sweepRateLimits(idleMs: number = 5 * 60 * 1000): number {
    const removed = this.rateLimiter.sweep(idleMs);
    this.logger.debug('Rate limit sweep finished', { removed });
    return removed;
  }
}
