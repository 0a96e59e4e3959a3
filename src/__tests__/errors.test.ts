/**
 * Tests for error types.
 */

import {
  DiscordError,
  DiscordErrorCode,
  DiscordJsonErrorCode,
  RateLimitedError,
  RateLimitTimeoutError,
  QueueFullError,
  QueueTimeoutError,
  NoAuthenticationError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  NoWebhookConfiguredError,
  BadRequestError,
  ValidationError,
  ServerError,
  NetworkError,
  ConfigurationError,
  flattenDiscordErrors,
  parseDiscordApiError,
  isDiscordError,
  isRetryableError,
} from '../index.js';

describe('DiscordError', () => {
  it('should carry code, status and details', () => {
    const error = new DiscordError({
      code: DiscordErrorCode.BadRequest,
      message: 'bad',
      statusCode: 400,
      discordCode: 50035,
      details: { field: 'content' },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DiscordError');
    expect(error.retryable).toBe(false);
    expect(error.toJSON()).toEqual({
      name: 'DiscordError',
      code: 'BAD_REQUEST',
      message: 'bad',
      statusCode: 400,
      retryable: false,
      retryAfterMs: undefined,
      discordCode: 50035,
      details: { field: 'content' },
    });
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    const error = new NetworkError('connection reset', cause);
    expect(error.cause).toBe(cause);
  });
});

describe('rate limit errors', () => {
  it('should describe bucket and global limits', () => {
    const bucket = new RateLimitedError(1500, false, 'POST /channels/:channel_id/messages');
    const global = new RateLimitedError(200, true);

    expect(bucket.message).toBe('Rate limited, retry after 1500ms');
    expect(bucket.retryable).toBe(true);
    expect(bucket.retryAfterMs).toBe(1500);
    expect(bucket.details).toEqual({ isGlobal: false, route: 'POST /channels/:channel_id/messages' });
    expect(global.message).toBe('Rate limited (global), retry after 200ms');
    expect(bucket.isGlobal).toBe(false);
    expect(global.isGlobal).toBe(true);
  });

  it('should not retry queue failures', () => {
    expect(new RateLimitTimeoutError(5000, 1000).message).toBe(
      'Rate limit wait time (5000ms) exceeds maximum (1000ms)'
    );
    expect(new QueueFullError(10, 10).message).toBe('Request queue is full (10/10)');
    expect(new QueueTimeoutError(250).message).toBe('Request timed out waiting in queue after 250ms');
    expect(new QueueFullError(1, 1).retryable).toBe(false);
  });
});

describe('request errors', () => {
  it('should format validation failures', () => {
    const error = new ValidationError(['Content cannot be empty', 'Too many embeds (max 10)']);
    expect(error.message).toBe('Validation failed: Content cannot be empty, Too many embeds (max 10)');
    expect(error.code).toBe(DiscordErrorCode.ValidationError);
    expect(error.details).toEqual({ errors: ['Content cannot be empty', 'Too many embeds (max 10)'] });
  });

  it('should append flattened field errors to bad requests', () => {
    const error = new BadRequestError('Invalid Form Body', 50035, {
      content: { _errors: [{ code: 'BASE_TYPE_MAX_LENGTH', message: 'Must be 2000 or fewer in length.' }] },
    });

    expect(error.message).toBe('Invalid Form Body\ncontent: Must be 2000 or fewer in length.');
    expect(error.statusCode).toBe(400);
    expect(error.discordCode).toBe(50035);
  });

  it('should use fixed messages for missing credentials', () => {
    expect(new NoWebhookConfiguredError().message).toBe('No webhook URL configured');
    expect(new NoAuthenticationError().message).toBe(
      'No authentication configured (bot token or webhook URL required)'
    );
    expect(new NoAuthenticationError('getGuild requires a bot token').message).toBe(
      'getGuild requires a bot token'
    );
    expect(new ConfigurationError('x').message).toBe('Configuration error: x');
  });
});

describe('flattenDiscordErrors', () => {
  it('should walk nested objects and array indices', () => {
    const lines = flattenDiscordErrors({
      embeds: {
        '0': {
          title: { _errors: [{ code: 'A', message: 'Title too long.' }] },
          fields: { '2': { name: { _errors: [{ code: 'B', message: 'Required.' }] } } },
        },
      },
    });

    expect(lines).toEqual(['embeds[0].title: Title too long.', 'embeds[0].fields[2].name: Required.']);
  });

  it('should emit top-level errors without a path', () => {
    expect(flattenDiscordErrors({ _errors: [{ code: 'C', message: 'Bad body.' }] })).toEqual(['Bad body.']);
  });

  it('should skip malformed entries', () => {
    expect(flattenDiscordErrors({ a: 'oops', b: { _errors: [{ code: 'D' }] } })).toEqual([]);
  });
});

describe('parseDiscordApiError', () => {
  it('should map status codes to error types', () => {
    expect(parseDiscordApiError(400, { message: 'bad' })).toBeInstanceOf(BadRequestError);
    expect(parseDiscordApiError(401, { message: '401: Unauthorized', code: 0 })).toBeInstanceOf(UnauthorizedError);
    expect(parseDiscordApiError(403, { message: 'Missing Permissions', code: 50013 })).toBeInstanceOf(ForbiddenError);
    expect(parseDiscordApiError(404, { message: 'Unknown Channel', code: 10003 })).toBeInstanceOf(NotFoundError);
    expect(parseDiscordApiError(502, null)).toBeInstanceOf(ServerError);
  });

  it('should keep the Discord message and code', () => {
    const error = parseDiscordApiError(404, { message: 'Unknown Channel', code: 10003 });
    expect(error.message).toBe('Resource not found: Unknown Channel');
    expect(error.discordCode).toBe(10003);
    expect(error.hasDiscordCode(DiscordJsonErrorCode.UnknownChannel)).toBe(true);
    expect(error.hasDiscordCode(DiscordJsonErrorCode.UnknownMessage)).toBe(false);
  });

  it('should ignore an unparseable Retry-After header', () => {
    expect(parseDiscordApiError(429, null, 'soon').retryAfterMs).toBe(1000);
  });

  it('should fall back to the status when there is no body', () => {
    const error = parseDiscordApiError(503, null);
    expect(error.message).toBe('HTTP 503');
    expect(error.statusCode).toBe(503);
    expect(error.retryable).toBe(true);
  });

  it('should treat other 4xx codes as bad requests with their status', () => {
    const error = parseDiscordApiError(413, { message: 'Request entity too large' });
    expect(error).toBeInstanceOf(BadRequestError);
    expect(error.statusCode).toBe(413);
  });

  it('should take retry_after from the body before the header', () => {
    const error = parseDiscordApiError(429, { message: 'You are being rate limited.', retry_after: 1.5, global: true }, '9');
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error.retryAfterMs).toBe(1500);
    expect(error.details).toEqual({ isGlobal: true, route: undefined });
  });

  it('should use the Retry-After header, then a one second default', () => {
    expect(parseDiscordApiError(429, null, '2').retryAfterMs).toBe(2000);
    expect(parseDiscordApiError(429, null).retryAfterMs).toBe(1000);
  });
});

describe('error guards', () => {
  it('should recognise Discord errors', () => {
    expect(isDiscordError(new ServerError(500))).toBe(true);
    expect(isDiscordError(new Error('x'))).toBe(false);
  });

  it('should classify retryable errors', () => {
    expect(isRetryableError(new ServerError(500))).toBe(true);
    expect(isRetryableError(new RateLimitedError(10))).toBe(true);
    expect(isRetryableError(new NetworkError('reset'))).toBe(true);
    expect(isRetryableError(new TypeError('fetch failed'))).toBe(true);
    expect(isRetryableError(new ValidationError(['x']))).toBe(false);
    expect(isRetryableError(new TypeError('x is not a function'))).toBe(false);
    expect(isRetryableError('boom')).toBe(false);
  });
});
