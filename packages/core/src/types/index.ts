/**
 * @spanline/core — Shared Types
 *
 * TelemetryError, failure categories, and the enumerations and record
 * shapes shared by the tracing, logging and export modules.
 */

// --- Failure Categories ---

export type FailureCategory =
  | 'config_error'
  | 'invalid_argument'
  | 'transport_error'
  | 'uninitialized_use';

// --- Errors ---

export class TelemetryError extends Error {
  public override readonly name: string = 'TelemetryError';

  constructor(
    message: string,
    public readonly code: string,
    public readonly category: FailureCategory,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
  }
}

/** Misconfiguration detected by initialize(). Returned, never thrown. */
export class ConfigError extends TelemetryError {
  public override readonly name = 'ConfigError';

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, 'config_error', context);
  }
}

export class InvalidArgumentError extends TelemetryError {
  public override readonly name = 'InvalidArgumentError';

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, 'invalid_argument', context);
  }
}

/**
 * Raised by transports. `retryable` decides whether the export pipeline
 * backs off and tries again or drops the batch.
 */
export class TransportError extends TelemetryError {
  public override readonly name = 'TransportError';

  constructor(
    message: string,
    code: string,
    public readonly retryable: boolean,
    context?: Record<string, unknown>,
  ) {
    super(message, code, 'transport_error', context);
  }
}

// --- Enumerations ---

export const SPAN_KINDS = ['Internal', 'Server', 'Client', 'Producer', 'Consumer'] as const;
export type SpanKindName = (typeof SPAN_KINDS)[number];

export const SPAN_STATUSES = ['Unset', 'Ok', 'Error'] as const;
export type SpanStatusName = (typeof SPAN_STATUSES)[number];

/** Ordered from least to most severe. */
export const LOG_LEVELS = ['Trace', 'Debug', 'Information', 'Warning', 'Error', 'Critical'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const OTLP_PROTOCOLS = ['grpc', 'http-protobuf'] as const;
export type OtlpProtocol = (typeof OTLP_PROTOCOLS)[number];

export type TagValue = string | number | boolean;

// --- Span Data ---

export interface SpanStatus {
  code: SpanStatusName;
  description?: string;
}

/** Snapshot of a stopped span as handed to the export pipeline. */
export interface FinishedSpan {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly name: string;
  readonly kind: SpanKindName;
  readonly startTime: number;
  readonly endTime: number;
  readonly durationMs: number;
  readonly tags: ReadonlyArray<readonly [string, TagValue]>;
  readonly status: Readonly<SpanStatus>;
}

// --- Log Data ---

export interface ErrorInfo {
  type?: string;
  message: string;
  stackTrace?: string;
}

export interface LogRecord {
  readonly timestamp: number;
  readonly observedTimestamp: number;
  readonly level: LogLevel;
  readonly message: string;
  readonly exception?: Readonly<ErrorInfo>;
  readonly traceId?: string;
  readonly spanId?: string;
  readonly attributes?: Readonly<Record<string, TagValue>>;
}

// --- Sinks ---

/** Receives finished spans and log records. Implementations never throw. */
export interface TelemetrySink {
  enqueueSpan(span: FinishedSpan): void;
  enqueueLog(record: LogRecord): void;
}

/** Wall clock in epoch milliseconds (fractional allowed). */
export type Clock = () => number;
