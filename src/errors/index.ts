/**
 * Discord error types and handling.
 *
 * Every failure surfaced by the client is a {@link DiscordError}. Whether a
 * failure is worth retrying follows from its {@link DiscordErrorCode}: rate
 * limits, server errors and network failures are, everything else is not.
 */

/**
 * Error codes for Discord errors.
 */
export enum DiscordErrorCode {
  // Rate limiting
  RateLimited = 'RATE_LIMITED',
  RateLimitTimeout = 'RATE_LIMIT_TIMEOUT',
  QueueFull = 'QUEUE_FULL',
  QueueTimeout = 'QUEUE_TIMEOUT',

  // Authentication
  NoAuthentication = 'NO_AUTHENTICATION',
  Unauthorized = 'UNAUTHORIZED',
  Forbidden = 'FORBIDDEN',

  // Resource errors
  NotFound = 'NOT_FOUND',
  NoWebhookConfigured = 'NO_WEBHOOK_CONFIGURED',

  // Request errors
  BadRequest = 'BAD_REQUEST',
  ValidationError = 'VALIDATION_ERROR',

  // Server errors
  ServerError = 'SERVER_ERROR',
  NetworkError = 'NETWORK_ERROR',

  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
}

const RETRYABLE_CODES: ReadonlySet<DiscordErrorCode> = new Set([
  DiscordErrorCode.RateLimited,
  DiscordErrorCode.ServerError,
  DiscordErrorCode.NetworkError,
]);

/**
 * Numeric codes Discord puts in JSON error bodies. Only the ones callers
 * commonly branch on are listed.
 */
export enum DiscordJsonErrorCode {
  GeneralError = 0,
  UnknownChannel = 10003,
  UnknownGuild = 10004,
  UnknownInvite = 10006,
  UnknownMember = 10007,
  UnknownMessage = 10008,
  UnknownOverwrite = 10009,
  UnknownRole = 10011,
  UnknownToken = 10012,
  UnknownUser = 10013,
  UnknownEmoji = 10014,
  UnknownWebhook = 10015,
  UnknownBan = 10026,
  UnknownInteraction = 10062,
  UnknownApplicationCommand = 10063,
  MaximumPinsReached = 30003,
  MaximumGuildRolesReached = 30005,
  MaximumWebhooksReached = 30007,
  MissingAccess = 50001,
  CannotSendMessagesToThisUser = 50007,
  MissingPermissions = 50013,
  InvalidFormBody = 50035,
  InteractionAlreadyAcknowledged = 40060,
}

/**
 * Discord API error response structure.
 */
export interface DiscordApiErrorResponse {
  code?: number;
  message?: string;
  /** Nested per-field errors */
  errors?: Record<string, unknown>;
  /** Seconds to wait (present on 429) */
  retry_after?: number;
  global?: boolean;
}

export interface DiscordErrorOptions {
  code: DiscordErrorCode;
  message: string;
  statusCode?: number;
  /** Defaults to what the code implies */
  retryable?: boolean;
  retryAfterMs?: number;
  /** Code from Discord's JSON error body */
  discordCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base Discord error class.
 */
export class DiscordError extends Error {
  readonly code: DiscordErrorCode;
  readonly statusCode?: number;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly discordCode?: number;
  readonly details?: Record<string, unknown>;

  constructor(options: DiscordErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'DiscordError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? RETRYABLE_CODES.has(options.code);
    this.retryAfterMs = options.retryAfterMs;
    this.discordCode = options.discordCode;
    this.details = options.details;
  }

  /**
   * Whether Discord answered with the given JSON error code.
   */
  hasDiscordCode(code: DiscordJsonErrorCode): boolean {
    return this.discordCode === code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      discordCode: this.discordCode,
      details: this.details,
    };
  }
}

// ============================================================================
// Rate Limiting Errors
// ============================================================================

/**
 * HTTP 429 from Discord, for a bucket or the whole token.
 */
export class RateLimitedError extends DiscordError {
  constructor(retryAfterMs: number, isGlobal: boolean = false, route?: string) {
    const scope = isGlobal ? ' (global)' : '';
    super({
      code: DiscordErrorCode.RateLimited,
      message: `Rate limited${scope}, retry after ${retryAfterMs}ms`,
      statusCode: 429,
      retryAfterMs,
      details: { isGlobal, route },
    });
    this.name = 'RateLimitedError';
  }

  get isGlobal(): boolean {
    return this.details?.isGlobal === true;
  }
}

export class RateLimitTimeoutError extends DiscordError {
  constructor(waitTime: number, maxWait: number) {
    super({
      code: DiscordErrorCode.RateLimitTimeout,
      message: `Rate limit wait time (${waitTime}ms) exceeds maximum (${maxWait}ms)`,
      details: { waitTime, maxWait },
    });
    this.name = 'RateLimitTimeoutError';
  }
}

export class QueueFullError extends DiscordError {
  constructor(queueSize: number, maxSize: number) {
    super({
      code: DiscordErrorCode.QueueFull,
      message: `Request queue is full (${queueSize}/${maxSize})`,
      details: { queueSize, maxSize },
    });
    this.name = 'QueueFullError';
  }
}

export class QueueTimeoutError extends DiscordError {
  constructor(timeout: number) {
    super({
      code: DiscordErrorCode.QueueTimeout,
      message: `Request timed out waiting in queue after ${timeout}ms`,
      details: { timeout },
    });
    this.name = 'QueueTimeoutError';
  }
}

// ============================================================================
// Authentication Errors
// ============================================================================

/**
 * The operation needs a credential the client was not given.
 */
export class NoAuthenticationError extends DiscordError {
  constructor(message: string = 'No authentication configured (bot token or webhook URL required)') {
    super({ code: DiscordErrorCode.NoAuthentication, message });
    this.name = 'NoAuthenticationError';
  }
}

export class UnauthorizedError extends DiscordError {
  constructor(message: string = 'Invalid or expired authentication token', discordCode?: number) {
    super({ code: DiscordErrorCode.Unauthorized, message, statusCode: 401, discordCode });
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends DiscordError {
  constructor(message: string = 'Missing permissions for this operation', discordCode?: number) {
    super({ code: DiscordErrorCode.Forbidden, message, statusCode: 403, discordCode });
    this.name = 'ForbiddenError';
  }
}

// ============================================================================
// Resource Errors
// ============================================================================

export class NotFoundError extends DiscordError {
  constructor(resource: string, discordCode?: number) {
    super({
      code: DiscordErrorCode.NotFound,
      message: `Resource not found: ${resource}`,
      statusCode: 404,
      discordCode,
      details: { resource },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * A webhook operation was called without credentials and no default webhook.
 */
export class NoWebhookConfiguredError extends DiscordError {
  constructor() {
    super({ code: DiscordErrorCode.NoWebhookConfigured, message: 'No webhook URL configured' });
    this.name = 'NoWebhookConfiguredError';
  }
}

// ============================================================================
// Request Errors
// ============================================================================

/**
 * Discord rejected the payload. Field errors are appended to the message,
 * one `path: reason` line each.
 */
export class BadRequestError extends DiscordError {
  constructor(
    message: string,
    discordCode?: number,
    errors?: Record<string, unknown>,
    statusCode: number = 400
  ) {
    const fieldErrors = errors ? flattenDiscordErrors(errors) : [];
    super({
      code: DiscordErrorCode.BadRequest,
      message: [message, ...fieldErrors].join('\n'),
      statusCode,
      discordCode,
      details: errors ? { errors, messages: fieldErrors } : undefined,
    });
    this.name = 'BadRequestError';
  }
}

/**
 * Argument validation failed before the request was sent.
 */
export class ValidationError extends DiscordError {
  constructor(errors: string[]) {
    super({
      code: DiscordErrorCode.ValidationError,
      message: `Validation failed: ${errors.join(', ')}`,
      details: { errors },
    });
    this.name = 'ValidationError';
  }
}

// ============================================================================
// Server Errors
// ============================================================================

export class ServerError extends DiscordError {
  constructor(statusCode: number, message: string = 'Discord server error') {
    super({ code: DiscordErrorCode.ServerError, message, statusCode });
    this.name = 'ServerError';
  }
}

/**
 * Connection failure, timeout or unreadable body.
 */
export class NetworkError extends DiscordError {
  constructor(message: string, cause?: Error) {
    super({ code: DiscordErrorCode.NetworkError, message: `Network error: ${message}`, cause });
    this.name = 'NetworkError';
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends DiscordError {
  constructor(message: string) {
    super({ code: DiscordErrorCode.ConfigurationError, message: `Configuration error: ${message}` });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectFieldErrors(node: Record<string, unknown>, path: string, into: string[]): void {
  for (const [key, value] of Object.entries(node)) {
    if (key === '_errors') {
      if (!Array.isArray(value)) continue;
      for (const entry of value) {
        if (isRecord(entry) && typeof entry.message === 'string') {
          into.push(path === '' ? entry.message : `${path}: ${entry.message}`);
        }
      }
    } else if (isRecord(value)) {
      // numeric keys are array indices
      const childPath = /^\d+$/.test(key) ? `${path}[${key}]` : path === '' ? key : `${path}.${key}`;
      collectFieldErrors(value, childPath, into);
    }
  }
}

/**
 * Flattens Discord's nested `errors` object into `path: message` lines.
 *
 * Discord nests field errors by key, with numeric keys for array indices and
 * an `_errors` array at each leaf.
 */
export function flattenDiscordErrors(errors: Record<string, unknown>, path: string = ''): string[] {
  const lines: string[] = [];
  collectFieldErrors(errors, path, lines);
  return lines;
}

function retryAfterFrom(body: DiscordApiErrorResponse | null, header?: string): number {
  if (body?.retry_after !== undefined) {
    return Math.ceil(body.retry_after * 1000);
  }
  const seconds = header === undefined ? Number.NaN : parseFloat(header);
  return Number.isFinite(seconds) ? Math.ceil(seconds * 1000) : 1000;
}

type ErrorFactory = (message: string, body: DiscordApiErrorResponse | null) => DiscordError;

const STATUS_ERRORS: Readonly<Record<number, ErrorFactory>> = {
  400: (message, body) => new BadRequestError(message, body?.code, body?.errors),
  401: (message, body) => new UnauthorizedError(message, body?.code),
  403: (message, body) => new ForbiddenError(message, body?.code),
  404: (message, body) => new NotFoundError(message, body?.code),
};

/**
 * Maps a failed response to the matching error type. 429s take their wait
 * from the body's `retry_after`, then the `Retry-After` header, then one
 * second.
 */
export function parseDiscordApiError(
  statusCode: number,
  body: DiscordApiErrorResponse | null,
  retryAfterHeader?: string
): DiscordError {
  const message = body?.message ?? `HTTP ${statusCode}`;

  if (statusCode === 429) {
    return new RateLimitedError(retryAfterFrom(body, retryAfterHeader), body?.global ?? false);
  }
  const factory = STATUS_ERRORS[statusCode];
  if (factory) {
    return factory(message, body);
  }
  if (statusCode >= 500) {
    return new ServerError(statusCode, message);
  }
  return new BadRequestError(message, body?.code, body?.errors, statusCode);
}

export function isDiscordError(error: unknown): error is DiscordError {
  return error instanceof DiscordError;
}

export function isRetryableError(error: unknown): boolean {
  if (isDiscordError(error)) {
    return error.retryable;
  }
  // fetch() rejects with a TypeError on connection failures
  return error instanceof TypeError && error.message.includes('fetch');
}
