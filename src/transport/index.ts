/**
 * HTTP transport layer for Discord API.
 */

import { DiscordConfig } from '../config/index.js';
import {
  parseDiscordApiError,
  NetworkError,
  NoAuthenticationError,
  DiscordApiErrorResponse,
} from '../errors/index.js';
import { RateLimiter, RateLimitBucket } from '../resilience/rate-limiter.js';
import { RetryExecutor } from '../resilience/retry.js';
import {
  compileRoute,
  buildQuery,
  CompiledRoute,
  HttpMethod,
  QueryParams,
  RouteParams,
} from '../routes/index.js';
import { FileAttachment, PartialAttachment } from '../types/index.js';
import { Logger, MetricsCollector, Tracer, MetricNames } from '../observability/index.js';

/**
 * The subset of `fetch` the transport relies on.
 */
export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Discord API request parameters.
 */
export interface DiscordRequest {
  method: HttpMethod;
  /** Route template, e.g. `/channels/:channel_id/messages` */
  route: string;
  params?: RouteParams;
  query?: QueryParams;
  /** JSON body, or the `payload_json` part when files are attached */
  body?: unknown;
  files?: FileAttachment[];
  /**
   * Key of the nested object that carries the message, and so its
   * `attachments`: `data` for interaction callbacks, `message` for forum posts
   */
  attachmentsIn?: 'data' | 'message';
  /** Plain form fields. When set, files go as `file` parts and there is no `payload_json` */
  formFields?: Record<string, string>;
  /** Sent as `X-Audit-Log-Reason` when not blank */
  reason?: string;
  /** Send the bot token. Defaults to false on webhook/interaction token routes */
  auth?: boolean;
  /** Operation name for logging/metrics */
  operation: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toApiErrorBody(value: unknown): DiscordApiErrorResponse | null {
  if (!isRecord(value)) return null;
  const body: DiscordApiErrorResponse = {};
  if (typeof value.code === 'number') body.code = value.code;
  if (typeof value.message === 'string') body.message = value.message;
  if (isRecord(value.errors)) body.errors = value.errors;
  if (typeof value.retry_after === 'number') body.retry_after = value.retry_after;
  if (typeof value.global === 'boolean') body.global = value.global;
  return body;
}

function parseJson<T>(text: string): T {
  try {
    const parsed: T = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new NetworkError('Failed to parse response body', error instanceof Error ? error : undefined);
  }
}

/**
 * Builds a multipart body: the JSON payload as `payload_json` and each file
 * as `files[n]`. When the message object does not describe its attachments,
 * one descriptor per file is added so descriptions reach Discord. The message
 * object is the payload itself unless `attachmentsIn` names a nested one.
 */
export function buildMultipartBody(
  body: unknown,
  files: FileAttachment[],
  attachmentsIn?: 'data' | 'message'
): FormData {
  const payload: Record<string, unknown> = isRecord(body) ? { ...body } : {};
  let target = payload;
  if (attachmentsIn !== undefined) {
    const nested = payload[attachmentsIn];
    target = isRecord(nested) ? { ...nested } : {};
    payload[attachmentsIn] = target;
  }
  if (target.attachments === undefined) {
    target.attachments = files.map((file, index): PartialAttachment => {
      const attachment: PartialAttachment = { id: index, filename: file.name };
      if (file.description) attachment.description = file.description;
      return attachment;
    });
  }

  const form = new FormData();
  form.append('payload_json', JSON.stringify(payload));
  files.forEach((file, index) => {
    form.append(`files[${index}]`, toBlob(file), file.name);
  });
  return form;
}

/**
 * Builds a form of plain fields plus `file` parts, the shape sticker
 * uploads take.
 */
export function buildFormFieldsBody(fields: Record<string, string>, files: FileAttachment[]): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  for (const file of files) {
    form.append('file', toBlob(file), file.name);
  }
  return form;
}

function toBlob(file: FileAttachment): Blob {
  const bytes = typeof file.data === 'string' ? Buffer.from(file.data) : new Uint8Array(file.data);
  return new Blob([bytes], { type: file.contentType ?? 'application/octet-stream' });
}

/**
 * HTTP transport for Discord API.
 *
 * Each request is validated and compiled, queued in its rate limit bucket,
 * retried on transient failure, and measured.
 */
export class DiscordTransport {
  private readonly config: DiscordConfig;
  private readonly rateLimiter: RateLimiter;
  private readonly retryExecutor: RetryExecutor;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly tracer: Tracer;
  private readonly fetchFn: FetchFunction;

  constructor(options: {
    config: DiscordConfig;
    rateLimiter: RateLimiter;
    retryExecutor: RetryExecutor;
    logger: Logger;
    metrics: MetricsCollector;
    tracer: Tracer;
    fetch?: FetchFunction;
  }) {
    this.config = options.config;
    this.rateLimiter = options.rateLimiter;
    this.retryExecutor = options.retryExecutor;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.tracer = options.tracer;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Executes a Discord API request and returns the parsed body.
   *
   * @throws ValidationError for missing route parameters
   * @throws NoAuthenticationError when the route needs a bot token and none is configured
   * @throws NetworkError when the response has no body
   */
  async execute<T>(request: DiscordRequest): Promise<T> {
    const text = await this.request(request);
    if (text === undefined) {
      throw new NetworkError(`Expected a response body from ${request.operation}`);
    }
    return parseJson<T>(text);
  }

  /**
   * Executes a request that may answer with 204 No Content, as webhook
   * executions without `wait` do.
   */
  async executeOptional<T>(request: DiscordRequest): Promise<T | undefined> {
    const text = await this.request(request);
    return text === undefined ? undefined : parseJson<T>(text);
  }

  /**
   * Executes a request whose response body is ignored.
   */
  async executeVoid(request: DiscordRequest): Promise<void> {
    await this.request(request);
  }

  /**
   * Runs the request through its bucket and the retry executor. Resolves to
   * the raw body, or `undefined` when the response is empty.
   */
  private async request(request: DiscordRequest): Promise<string | undefined> {
    const route = compileRoute(request.method, request.route, request.params);
    const authenticate = request.auth ?? !route.usesToken;
    if (authenticate && !this.config.botToken) {
      throw new NoAuthenticationError(`${request.operation} requires a bot token`);
    }

    const span = this.tracer.startSpan(`discord.${request.operation}`, {
      'http.method': request.method,
      'http.route': route.template,
    });
    const labels = { operation: request.operation, method: request.method };
    const startTime = Date.now();

    this.logger.debug('Executing Discord request', {
      operation: request.operation,
      route: route.bucketRoute,
      major: route.majorParameter,
    });
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1, labels);

    try {
      const result = await this.retryExecutor.execute(() =>
        this.rateLimiter.schedule(route, (bucket) =>
          this.send(request, route, bucket, authenticate)
        )
      );

      const durationMs = Date.now() - startTime;
      this.metrics.incrementCounter(MetricNames.REQUESTS_SUCCESS, 1, labels);
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs / 1000, labels);
      span.setStatus('ok');
      span.end();

      this.logger.debug('Discord request completed', { operation: request.operation, durationMs });
      return result;
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const message = error instanceof Error ? error.message : String(error);
      this.metrics.incrementCounter(MetricNames.REQUESTS_FAILED, 1, labels);
      this.metrics.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs / 1000, labels);
      span.setStatus('error', message);
      span.end();

      this.logger.error('Discord request failed', {
        operation: request.operation,
        route: route.bucketRoute,
        error: message,
        durationMs,
      });
      throw error;
    }
  }

  /**
   * Sends a single HTTP request while holding the bucket.
   */
  private async send(
    request: DiscordRequest,
    route: CompiledRoute,
    bucket: RateLimitBucket,
    authenticate: boolean
  ): Promise<string | undefined> {
    const url = `${this.config.baseUrl}${route.path}${buildQuery(request.query)}`;
    const headers = this.buildHeaders(authenticate, request.reason);
    const init: RequestInit = {
      method: request.method,
      headers,
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    };

    if (request.formFields) {
      init.body = buildFormFieldsBody(request.formFields, request.files ?? []);
    } else if (request.files && request.files.length > 0) {
      init.body = buildMultipartBody(request.body, request.files, request.attachmentsIn);
    } else if (request.body !== undefined) {
      headers.set('Content-Type', 'application/json');
      init.body = JSON.stringify(request.body);
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, init);
      text = await response.text();
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError' || error.name === 'TimeoutError') {
          throw new NetworkError(`Request timed out after ${this.config.requestTimeoutMs}ms`, error);
        }
        throw new NetworkError(error.message, error);
      }
      throw new NetworkError(String(error));
    }

    this.rateLimiter.updateFromResponse(route, bucket, response.headers);

    if (!response.ok) {
      const apiError = toApiErrorBody(this.parseErrorBody(text));
      const error = parseDiscordApiError(
        response.status,
        apiError,
        response.headers.get('Retry-After') ?? undefined
      );

      if (response.status === 429) {
        const isGlobal =
          apiError?.global === true || response.headers.get('X-RateLimit-Global') === 'true';
        throw this.rateLimiter.handleRateLimit(route, bucket, error.retryAfterMs ?? 1000, isGlobal);
      }
      throw error;
    }

    return response.status === 204 || text.length === 0 ? undefined : text;
  }

  private parseErrorBody(text: string): unknown {
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      return { message: text };
    }
  }

  private buildHeaders(authenticate: boolean, reason?: string): Headers {
    const headers = new Headers({ 'User-Agent': this.config.userAgent });

    if (authenticate && this.config.botToken) {
      headers.set('Authorization', `Bot ${this.config.botToken}`);
    }
    if (reason && reason.trim().length > 0) {
      headers.set('X-Audit-Log-Reason', encodeURIComponent(reason.trim()));
    }

    return headers;
  }
}
