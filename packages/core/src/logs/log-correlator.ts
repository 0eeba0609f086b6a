/**
 * @spanline/core — Log Correlator
 *
 * Builds immutable log records and stamps them with the trace and span
 * identifiers of an open span.
 */

import type {
  Clock,
  ErrorInfo,
  LogLevel,
  LogRecord,
  TagValue,
} from '../types/index.js';
import { parseLogLevel } from '../config/schemas.js';
import type { SpanHandle } from '../tracing/span.js';

export type LogSink = (record: LogRecord) => void;

export function toErrorInfo(exception: Error | ErrorInfo): ErrorInfo {
  if (exception instanceof Error) {
    return {
      type: exception.name,
      message: exception.message,
      stackTrace: exception.stack,
    };
  }
  return {
    type: exception.type,
    message: String(exception.message),
    stackTrace: exception.stackTrace,
  };
}

export interface WriteLogOptions {
  exception?: Error | ErrorInfo;
  /** Defaults to the current span. */
  span?: SpanHandle;
  attributes?: Record<string, TagValue>;
}

export class LogCorrelator {
  constructor(
    private readonly sink: LogSink,
    private readonly currentSpan: () => SpanHandle | undefined,
    private readonly clock: Clock,
  ) {}

  /** Throws InvalidArgumentError for an unknown level. */
  write(message: string, level: LogLevel = 'Information', options: WriteLogOptions = {}): LogRecord {
    const record = this.createRecord(message, level, options);
    this.sink(record);
    return record;
  }

  createRecord(message: string, level: LogLevel, options: WriteLogOptions = {}): LogRecord {
    const validLevel = parseLogLevel(level);
    const span = options.span ?? this.currentSpan();
    const now = this.clock();

    // Only open spans correlate; a stopped or no-op span leaves the record bare.
    const correlated = span?.isRecording() ? span : undefined;

    return Object.freeze({
      timestamp: now,
      observedTimestamp: now,
      level: validLevel,
      message: String(message),
      exception: options.exception ? Object.freeze(toErrorInfo(options.exception)) : undefined,
      traceId: correlated?.traceId,
      spanId: correlated?.spanId,
      attributes: options.attributes ? Object.freeze({ ...options.attributes }) : undefined,
    });
  }
}
