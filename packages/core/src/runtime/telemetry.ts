/**
 * @spanline/core — Telemetry
 *
 * Main entry point. Owns at most one export pipeline at a time, together
 * with the context stack, span lifecycle manager and log correlator built
 * for it.
 *
 * Usage:
 *   const telemetry = new Telemetry();
 *   const result = telemetry.initialize('checkout', 'http://localhost:4317', 'grpc', false);
 *   if (!result.ok) throw result.error;
 *   const span = telemetry.startSpan('charge-card', 'Client');
 *   telemetry.writeLog('charging', 'Information');
 *   telemetry.stopSpan(span);
 *   await telemetry.shutdown();
 *
 * Before initialize(): startSpan() returns a no-op span, writeLog() goes to
 * standard error, and one warning is logged per instance.
 */

import type pino from 'pino';
import type {
  Clock,
  ErrorInfo,
  LogLevel,
  OtlpProtocol,
  SpanKindName,
  SpanStatusName,
  TagValue,
} from '../types/index.js';
import { ConfigError } from '../types/index.js';
import { formatIssues, initializeSchema, parseLogLevel, parseSpanKind, type TelemetryConfig } from '../config/schemas.js';
import { loadEnvConfig } from '../config/env.js';
import { ContextStack } from '../tracing/context-stack.js';
import { getNoopSpan, type SpanHandle } from '../tracing/span.js';
import { SpanLifecycleManager, defaultClock, type SpanParent } from '../tracing/span-lifecycle.js';
import { LogCorrelator, toErrorInfo } from '../logs/log-correlator.js';
import { ConsoleEcho } from '../export/console-echo.js';
import { ExportPipeline, type PipelineState, type PipelineStats } from '../export/export-pipeline.js';
import { OtlpSerializer } from '../export/otlp-serializer.js';
import { createTransport } from '../export/transports/index.js';
import type { Transport } from '../export/transports/transport.js';
import { createEchoLogger, createFallbackLogger, logger as defaultLogger } from '../utils/logger.js';

// --- Options ---

export interface TelemetryOptions {
  /** Diagnostics of the SDK itself. */
  logger?: pino.Logger;
  /** Sink for log records written before initialize(). Default: stderr. */
  fallbackLogger?: pino.Logger;
  /** Destination of console echo. Default: stdout. */
  echoLogger?: pino.Logger;
  clock?: Clock;
  transportFactory?: (config: TelemetryConfig, headers: Record<string, string>, logger: pino.Logger) => Transport;
}

export interface InitializeOptions {
  scheduledDelayMs?: number;
  maxExportBatchSize?: number;
  maxQueueSize?: number;
  maxAttempts?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  backoffMultiplier?: number;
  exportTimeoutMs?: number;
  shutdownTimeoutMs?: number;
  resourceAttributes?: Record<string, TagValue>;
  /** Extra request headers (HTTP) or metadata (gRPC), e.g. an API key. */
  headers?: Record<string, string>;
  /** Replaces the protocol's transport, e.g. with an InMemoryTransport. */
  transport?: Transport;
  protoDir?: string;
}

export type InitializeResult =
  | { ok: true; config: TelemetryConfig }
  | { ok: false; error: ConfigError };

export interface WriteLogExtras {
  attributes?: Record<string, TagValue>;
}

interface ActivePipeline {
  config: TelemetryConfig;
  pipeline: ExportPipeline;
  spans: SpanLifecycleManager;
  logs: LogCorrelator;
}

const UNINITIALIZED_STATS: PipelineStats = {
  state: 'uninitialized',
  spans: { queued: 0, exported: 0, rejected: 0, dropped: 0, lost: 0 },
  logs: { queued: 0, exported: 0, rejected: 0, dropped: 0, lost: 0 },
  lostBatches: 0,
  skippedTicks: 0,
  discarded: 0,
};

// --- Telemetry ---

export class Telemetry {
  private readonly logger: pino.Logger;
  private readonly clock: Clock;
  private fallbackLogger?: pino.Logger;
  private echoLogger?: pino.Logger;
  private active?: ActivePipeline;
  private uninitializedWarned = false;

  constructor(private readonly options: TelemetryOptions = {}) {
    this.logger = options.logger ?? defaultLogger.child({ component: 'spanline' });
    this.clock = options.clock ?? defaultClock;
    this.fallbackLogger = options.fallbackLogger;
    this.echoLogger = options.echoLogger;
  }

  // --- Lifecycle ---

  /**
   * Validate the configuration and start a new export pipeline. A pipeline
   * from an earlier call is replaced and shut down in the background.
   * Misconfiguration is returned as a ConfigError, never thrown.
   */
  initialize(
    serviceName: string,
    endpoint: string,
    protocol: OtlpProtocol,
    consoleEcho: boolean,
    options: InitializeOptions = {},
  ): InitializeResult {
    return this.configure({ serviceName, endpoint, protocol, consoleEcho }, options);
  }

  /** initialize() from OTEL_* environment variables; explicit options win. */
  initializeFromEnv(env: NodeJS.ProcessEnv = process.env, options: InitializeOptions = {}): InitializeResult {
    const fromEnv = loadEnvConfig(env);
    return this.configure(
      {
        serviceName: fromEnv.serviceName,
        endpoint: fromEnv.endpoint,
        protocol: fromEnv.protocol,
        consoleEcho: fromEnv.consoleEcho,
      },
      {
        scheduledDelayMs: fromEnv.scheduledDelayMs,
        maxExportBatchSize: fromEnv.maxExportBatchSize,
        maxQueueSize: fromEnv.maxQueueSize,
        exportTimeoutMs: fromEnv.exportTimeoutMs,
        ...options,
        resourceAttributes: { ...fromEnv.resourceAttributes, ...options.resourceAttributes },
        headers: { ...fromEnv.headers, ...options.headers },
      },
    );
  }

  isInitialized(): boolean {
    return this.active !== undefined;
  }

  getState(): PipelineState {
    return this.active?.pipeline.getState() ?? 'uninitialized';
  }

  getStats(): PipelineStats {
    return this.active?.pipeline.getStats() ?? UNINITIALIZED_STATS;
  }

  async forceFlush(): Promise<void> {
    await this.active?.pipeline.forceFlush();
  }

  /** Final flush and transport release. Later records are discarded. */
  async shutdown(): Promise<void> {
    await this.active?.pipeline.shutdown();
  }

  // --- Spans ---

  startSpan(name: string, kind: SpanKindName = 'Internal', parent?: SpanParent): SpanHandle {
    if (!this.active) {
      parseSpanKind(kind);
      this.warnUninitialized('startSpan');
      return getNoopSpan();
    }
    return this.active.spans.start(name, kind, parent);
  }

  /** No-op on a stopped span: tags set after stop are dropped. */
  setTag(span: SpanHandle, key: string, value: TagValue): void {
    this.active?.spans.setTag(span, key, value);
  }

  setStatus(span: SpanHandle, status: SpanStatusName, description?: string): void {
    this.active?.spans.setStatus(span, status, description);
  }

  /** Stops span, or the current span when omitted. Idempotent. */
  stopSpan(span?: SpanHandle): void {
    if (!this.active) return;
    const target = span ?? this.active.spans.current();
    if (target) this.active.spans.stop(target);
  }

  currentSpan(): SpanHandle | undefined {
    return this.active?.spans.current();
  }

  /**
   * Run fn with span as the current span, in its own logical context.
   * Use it to hand a span to concurrent work (Promise.all branches, queued
   * callbacks) without sharing the caller's context.
   */
  withSpan<T>(span: SpanHandle, fn: () => T): T {
    if (!this.active) return fn();
    return this.active.spans.withSpan(span, fn);
  }

  // --- Logs ---

  writeLog(
    message: string,
    level: LogLevel = 'Information',
    exception?: Error | ErrorInfo,
    span?: SpanHandle,
    extras: WriteLogExtras = {},
  ): void {
    if (!this.active) {
      const validLevel = parseLogLevel(level);
      this.warnUninitialized('writeLog');
      this.writeFallback(message, validLevel, exception, extras);
      return;
    }
    this.active.logs.write(message, level, { exception, span, attributes: extras.attributes });
  }

  // --- Internal ---

  private configure(
    args: { serviceName: string; endpoint: string; protocol: string; consoleEcho: boolean },
    options: InitializeOptions,
  ): InitializeResult {
    const { transport, headers = {}, protoDir, ...tuning } = options;
    const parsed = initializeSchema.safeParse({ ...tuning, ...args });
    if (!parsed.success) {
      return {
        ok: false,
        error: new ConfigError(
          `Invalid telemetry configuration: ${formatIssues(parsed.error)}`,
          'INVALID_CONFIG',
          { issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) },
        ),
      };
    }
    const config = parsed.data;

    let next: ActivePipeline;
    try {
      next = this.build(config, headers, transport, protoDir);
    } catch (err: unknown) {
      return {
        ok: false,
        error: new ConfigError(
          `Failed to create OTLP exporter: ${err instanceof Error ? err.message : String(err)}`,
          'EXPORTER_INIT_FAILED',
          { protocol: config.protocol, endpoint: config.endpoint },
        ),
      };
    }

    const previous = this.active;
    this.active = next;
    next.pipeline.start();

    if (previous) {
      this.logger.info({ serviceName: previous.config.serviceName }, 'Replacing existing telemetry pipeline');
      previous.pipeline.shutdown().catch((err: unknown) => {
        this.logger.error({ error: String(err) }, 'Previous pipeline failed to shut down');
      });
    }

    this.logger.info(
      { serviceName: config.serviceName, endpoint: config.endpoint, protocol: config.protocol, consoleEcho: config.consoleEcho },
      'Telemetry initialized',
    );
    return { ok: true, config };
  }

  private build(
    config: TelemetryConfig,
    headers: Record<string, string>,
    transport: Transport | undefined,
    protoDir: string | undefined,
  ): ActivePipeline {
    const pipelineLogger = this.logger.child({ serviceName: config.serviceName });
    const serializer = new OtlpSerializer({
      serviceName: config.serviceName,
      resourceAttributes: config.resourceAttributes,
      protoDir,
    });
    const resolvedTransport =
      transport ??
      this.options.transportFactory?.(config, headers, pipelineLogger) ??
      createTransport({ protocol: config.protocol, endpoint: config.endpoint, headers }, pipelineLogger);

    const pipeline = new ExportPipeline(serializer, resolvedTransport, config, pipelineLogger);
    const echo = config.consoleEcho ? new ConsoleEcho(this.getEchoLogger()) : undefined;
    const contextStack = new ContextStack();

    const spans = new SpanLifecycleManager(
      contextStack,
      (span) => {
        echo?.span(span);
        pipeline.enqueueSpan(span);
      },
      pipelineLogger,
      this.clock,
    );
    const logs = new LogCorrelator(
      (record) => {
        echo?.log(record);
        pipeline.enqueueLog(record);
      },
      () => contextStack.current(),
      this.clock,
    );

    return { config, pipeline, spans, logs };
  }

  private warnUninitialized(operation: string): void {
    if (this.uninitializedWarned) return;
    this.uninitializedWarned = true;
    this.logger.warn(
      { operation, code: 'UNINITIALIZED_USE' },
      'Telemetry used before initialize(): spans are no-ops and logs go to stderr',
    );
  }

  private writeFallback(
    message: string,
    level: LogLevel,
    exception: Error | ErrorInfo | undefined,
    extras: WriteLogExtras,
  ): void {
    this.fallbackLogger ??= createFallbackLogger();
    new ConsoleEcho(this.fallbackLogger).log({
      timestamp: this.clock(),
      observedTimestamp: this.clock(),
      level,
      message: String(message),
      exception: exception ? toErrorInfo(exception) : undefined,
      attributes: extras.attributes,
    });
  }

  private getEchoLogger(): pino.Logger {
    this.echoLogger ??= createEchoLogger();
    return this.echoLogger;
  }
}
