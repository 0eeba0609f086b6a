/**
 * @spanline/core — Tracing and Log Correlation SDK
 *
 * Spans and log records are correlated through a per-context span stack
 * and exported in batches as OTLP/protobuf over gRPC or HTTP.
 */

export { VERSION, SCOPE_NAME } from './version.js';

// Types
export {
  TelemetryError,
  ConfigError,
  InvalidArgumentError,
  TransportError,
  SPAN_KINDS,
  SPAN_STATUSES,
  LOG_LEVELS,
  OTLP_PROTOCOLS,
  type FailureCategory,
  type SpanKindName,
  type SpanStatusName,
  type LogLevel,
  type OtlpProtocol,
  type TagValue,
  type SpanStatus,
  type FinishedSpan,
  type ErrorInfo,
  type LogRecord,
  type TelemetrySink,
  type Clock,
} from './types/index.js';

// Configuration
export {
  initializeSchema,
  pipelineOptionsSchema,
  endpointSchema,
  protocolSchema,
  formatIssues,
  parseSpanKind,
  parseSpanStatus,
  parseLogLevel,
  type PipelineOptions,
  type TelemetryConfig,
} from './config/schemas.js';
export { loadEnvConfig, parseKeyValueList, type EnvConfig } from './config/env.js';

// Logger
export { logger, createFallbackLogger, createEchoLogger } from './utils/logger.js';

// Tracing
export * from './tracing/index.js';

// Logs
export { LogCorrelator, toErrorInfo, type LogSink, type WriteLogOptions } from './logs/log-correlator.js';

// Export Pipeline
export {
  ExportPipeline,
  isRetryableTransportError,
  type PipelineState,
  type PipelineStats,
  type SignalStats,
} from './export/export-pipeline.js';
export { BoundedQueue } from './export/bounded-queue.js';
export { withRetry, calculateDelay, RetryAbortedError, type RetryOptions } from './export/retry.js';
export { ConsoleEcho } from './export/console-echo.js';
export {
  OtlpSerializer,
  SPAN_KIND_VALUES,
  STATUS_CODE_VALUES,
  SEVERITY_NUMBERS,
  toAnyValue,
  toUnixNano,
  defaultProtoDir,
  type OtlpSerializerOptions,
  type DecodedBatch,
  type DecodedSpan,
  type DecodedLogRecord,
  type ExportResponse,
} from './export/otlp-serializer.js';
export {
  createTransport,
  GrpcTransport,
  HttpProtobufTransport,
  InMemoryTransport,
  grpcTarget,
  isRetryableGrpcCode,
  isRetryableStatus,
  signalUrl,
  type TransportConfig,
  type FetchFn,
  type RecordedRequest,
  type SendOptions,
  type SignalType,
  type Transport,
} from './export/transports/index.js';

// Runtime
export {
  Telemetry,
  type TelemetryOptions,
  type InitializeOptions,
  type InitializeResult,
  type WriteLogExtras,
} from './runtime/telemetry.js';
export {
  getTelemetry,
  initialize,
  initializeFromEnv,
  startSpan,
  setTag,
  setStatus,
  stopSpan,
  writeLog,
  currentSpan,
  withSpan,
  forceFlush,
  shutdown,
  getStats,
} from './runtime/api.js';
