/**
 * @spanline/core — Console echo
 *
 * Mirrors finished spans and log records to a pino logger (standard output
 * by default) when initialize() is called with consoleEcho enabled.
 */

import type pino from 'pino';
import type { FinishedSpan, LogLevel, LogRecord } from '../types/index.js';

const PINO_LEVELS: Record<LogLevel, pino.Level> = {
  Trace: 'trace',
  Debug: 'debug',
  Information: 'info',
  Warning: 'warn',
  Error: 'error',
  Critical: 'fatal',
};

export class ConsoleEcho {
  constructor(private readonly logger: pino.Logger) {}

  span(span: FinishedSpan): void {
    this.logger.info(
      {
        traceId: span.traceId,
        spanId: span.spanId,
        parentSpanId: span.parentSpanId,
        kind: span.kind,
        durationMs: Math.round(span.durationMs * 1000) / 1000,
        status: span.status.code,
        statusDescription: span.status.description,
        tags: Object.fromEntries(span.tags),
      },
      `span ${span.name}`,
    );
  }

  log(record: LogRecord): void {
    this.logger[PINO_LEVELS[record.level]](
      {
        traceId: record.traceId,
        spanId: record.spanId,
        exception: record.exception,
        attributes: record.attributes,
      },
      record.message,
    );
  }
}
