/**
 * Logging, metrics and tracing seams.
 *
 * The client only talks to the {@link Logger}, {@link MetricsCollector} and
 * {@link Tracer} interfaces; hosts plug in their own implementations or use
 * the console, no-op and in-memory ones defined here.
 */

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/**
 * Parses a level name ("debug", "WARN", ...) into a {@link LogLevel}.
 * Unknown names fall back to `fallback`.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'trace':
      return LogLevel.Trace;
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return fallback;
  }
}

const SENSITIVE_FIELDS = new Set([
  'token',
  'bottoken',
  'bot_token',
  'access_token',
  'accesstoken',
  'webhooktoken',
  'webhook_token',
  'interactiontoken',
  'authorization',
  'webhookurl',
  'webhook_url',
  'secret',
  'password',
]);

// Webhook and interaction tokens travel inside URL paths.
const TOKEN_PATH_PATTERN = /\/(webhooks|interactions)\/(\d+)\/[\w.-]+/g;

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields (and tokens embedded in paths) from a context.
 */
export function redactSensitive(obj: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      result[key] = value.replace(TOKEN_PATH_PATTERN, '/$1/$2/[REDACTED]');
    } else if (isPlainObject(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Logger writing one line per entry to stdout.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: LogContext;
  private readonly format: 'json' | 'pretty';

  constructor(options: {
    level?: LogLevel;
    context?: LogContext;
    format?: 'json' | 'pretty';
  } = {}) {
    this.level = options.level ?? parseLogLevel(process.env.DISCORD_LOG_LEVEL);
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) return;

    const merged = redactSensitive({ ...this.context, ...context });
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();

    if (this.format === 'json') {
      console.log(JSON.stringify({ timestamp, level: levelName, message, ...merged }));
      return;
    }

    const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    console.log(`[${timestamp}] ${levelName}: ${message}${suffix}`);
  }
}

export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * Logger keeping entries in memory; children share the parent's buffer.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: LogContext;

  constructor(context: LogContext = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  trace(message: string, context?: LogContext): void {
    this.add(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.add(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.add(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.add(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.add(LogLevel.Error, message, context);
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }

  private add(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({
      level,
      message,
      context: redactSensitive({ ...this.context, ...context }),
      timestamp: new Date(),
    });
  }
}

// ============================================================================
// Metrics
// ============================================================================

export type MetricLabels = Record<string, string>;

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: MetricLabels): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Metric names emitted by the client.
 */
export const MetricNames = {
  /** Requests sent, labelled by operation and method */
  REQUESTS_TOTAL: 'discord_rest_requests_total',
  REQUESTS_SUCCESS: 'discord_rest_requests_success',
  REQUESTS_FAILED: 'discord_rest_requests_failed',
  /** End-to-end latency in seconds, including bucket waits */
  REQUEST_LATENCY: 'discord_rest_request_latency_seconds',
  /** 429 responses, labelled by bucket route */
  RATE_LIMITS_HIT: 'discord_rest_rate_limits_hit',
  GLOBAL_RATE_LIMITS_HIT: 'discord_rest_global_rate_limits_hit',
  /** Time spent waiting for a bucket to reset, in seconds */
  BUCKET_WAIT: 'discord_rest_bucket_wait_seconds',
  /** Requests waiting behind the in-flight one, per bucket route */
  QUEUE_DEPTH: 'discord_rest_queue_depth',
  RETRY_ATTEMPTS: 'discord_rest_retry_attempts',
} as const;

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: MetricLabels): void { /* noop */ }
  recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void { /* noop */ }
  setGauge(_name: string, _value: number, _labels?: MetricLabels): void { /* noop */ }
}

export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();
  private readonly gauges = new Map<string, number>();

  incrementCounter(name: string, value: number = 1, labels?: MetricLabels): void {
    const key = metricKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const key = metricKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  setGauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(metricKey(name, labels), value);
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: MetricLabels): number[] {
    return this.histograms.get(metricKey(name, labels)) ?? [];
  }

  getGauge(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(metricKey(name, labels));
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }
}

/**
 * Builds a Prometheus-style series key: `name{a="1",b="2"}`.
 */
export function metricKey(name: string, labels?: MetricLabels): string {
  if (!labels || Object.keys(labels).length === 0) {
    return name;
  }
  const rendered = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(',');
  return `${name}{${rendered}}`;
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanStatus = 'ok' | 'error' | 'unset';

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanContext {
  spanId: string;
  traceId: string;
  setAttribute(key: string, value: string | number | boolean): void;
  addEvent(name: string, attributes?: SpanAttributes): void;
  setStatus(status: SpanStatus, message?: string): void;
  end(): void;
}

export interface Tracer {
  startSpan(name: string, attributes?: SpanAttributes): SpanContext;
  getCurrentSpan(): SpanContext | undefined;
}

class NoopSpanContext implements SpanContext {
  spanId = '0000000000000000';
  traceId = '00000000000000000000000000000000';
  setAttribute(): void { /* noop */ }
  addEvent(): void { /* noop */ }
  setStatus(): void { /* noop */ }
  end(): void { /* noop */ }
}

export class NoopTracer implements Tracer {
  private readonly span = new NoopSpanContext();
  startSpan(): SpanContext { return this.span; }
  getCurrentSpan(): SpanContext | undefined { return undefined; }
}

function randomHex(length: number): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += Math.floor(Math.random() * 16).toString(16);
  }
  return result;
}

export class InMemorySpanContext implements SpanContext {
  readonly spanId: string = randomHex(16);
  readonly traceId: string;
  readonly name: string;
  readonly startTime: Date = new Date();
  endTime?: Date;
  status: SpanStatus = 'unset';
  statusMessage?: string;
  attributes: SpanAttributes;
  events: Array<{ name: string; timestamp: Date; attributes?: SpanAttributes }> = [];

  constructor(name: string, traceId: string, attributes: SpanAttributes = {}) {
    this.name = name;
    this.traceId = traceId;
    this.attributes = { ...attributes };
  }

  setAttribute(key: string, value: string | number | boolean): void {
    this.attributes[key] = value;
  }

  addEvent(name: string, attributes?: SpanAttributes): void {
    this.events.push({ name, timestamp: new Date(), attributes });
  }

  setStatus(status: SpanStatus, message?: string): void {
    this.status = status;
    this.statusMessage = message;
  }

  end(): void {
    this.endTime = new Date();
  }

  getDurationMs(): number | undefined {
    if (!this.endTime) return undefined;
    return this.endTime.getTime() - this.startTime.getTime();
  }
}

export class InMemoryTracer implements Tracer {
  private spans: InMemorySpanContext[] = [];
  private currentSpan?: InMemorySpanContext;
  private traceId: string = randomHex(32);

  startSpan(name: string, attributes?: SpanAttributes): InMemorySpanContext {
    const span = new InMemorySpanContext(name, this.traceId, attributes);
    this.spans.push(span);
    this.currentSpan = span;
    return span;
  }

  getCurrentSpan(): SpanContext | undefined {
    return this.currentSpan;
  }

  getSpans(): InMemorySpanContext[] {
    return [...this.spans];
  }

  clear(): void {
    this.spans = [];
    this.currentSpan = undefined;
    this.traceId = randomHex(32);
  }
}
