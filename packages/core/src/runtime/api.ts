/**
 * @spanline/core — Module-level API
 *
 * Thin functions over a process-wide Telemetry instance, created on first
 * use. Applications that need several independent pipelines (or tests)
 * construct Telemetry directly instead.
 */

import type { ErrorInfo, LogLevel, OtlpProtocol, SpanKindName, SpanStatusName, TagValue } from '../types/index.js';
import type { PipelineStats } from '../export/export-pipeline.js';
import type { SpanHandle } from '../tracing/span.js';
import type { SpanParent } from '../tracing/span-lifecycle.js';
import { Telemetry, type InitializeOptions, type InitializeResult, type WriteLogExtras } from './telemetry.js';

let defaultTelemetry: Telemetry | undefined;

export function getTelemetry(): Telemetry {
  defaultTelemetry ??= new Telemetry();
  return defaultTelemetry;
}

export function initialize(
  serviceName: string,
  endpoint: string,
  protocol: OtlpProtocol,
  consoleEcho: boolean,
  options?: InitializeOptions,
): InitializeResult {
  return getTelemetry().initialize(serviceName, endpoint, protocol, consoleEcho, options);
}

export function initializeFromEnv(env?: NodeJS.ProcessEnv, options?: InitializeOptions): InitializeResult {
  return getTelemetry().initializeFromEnv(env, options);
}

export function startSpan(name: string, kind?: SpanKindName, parent?: SpanParent): SpanHandle {
  return getTelemetry().startSpan(name, kind, parent);
}

export function setTag(span: SpanHandle, key: string, value: TagValue): void {
  getTelemetry().setTag(span, key, value);
}

export function setStatus(span: SpanHandle, status: SpanStatusName, description?: string): void {
  getTelemetry().setStatus(span, status, description);
}

export function stopSpan(span?: SpanHandle): void {
  getTelemetry().stopSpan(span);
}

export function writeLog(
  message: string,
  level?: LogLevel,
  exception?: Error | ErrorInfo,
  span?: SpanHandle,
  extras?: WriteLogExtras,
): void {
  getTelemetry().writeLog(message, level, exception, span, extras);
}

export function currentSpan(): SpanHandle | undefined {
  return getTelemetry().currentSpan();
}

export function withSpan<T>(span: SpanHandle, fn: () => T): T {
  return getTelemetry().withSpan(span, fn);
}

export function forceFlush(): Promise<void> {
  return getTelemetry().forceFlush();
}

export function shutdown(): Promise<void> {
  return getTelemetry().shutdown();
}

export function getStats(): PipelineStats {
  return getTelemetry().getStats();
}
