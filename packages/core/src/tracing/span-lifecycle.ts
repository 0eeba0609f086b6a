/**
 * @spanline/core — Span Lifecycle Manager
 *
 * Creates, tags and stops spans. Parentage resolution, in order:
 * 1. explicit parent (local span handle or remote TraceContext)
 * 2. current span of the context stack
 * 3. active OpenTelemetry API span (if a global SDK is registered)
 * 4. none: new trace
 */

import { TraceFlags, context as otelContext, isSpanContextValid, trace } from '@opentelemetry/api';
import type pino from 'pino';
import type {
  Clock,
  FinishedSpan,
  SpanKindName,
  SpanStatusName,
  TagValue,
} from '../types/index.js';
import { parseSpanKind, parseSpanStatus, tagValueSchema } from '../config/schemas.js';
import type { ContextStack } from './context-stack.js';
import { RecordingSpan, isNoopSpan, type SpanHandle } from './span.js';
import { generateSpanId, generateTraceId, type TraceContext } from './trace-context.js';

// --- Types ---

export type SpanParent = SpanHandle | TraceContext;

/** Called once per span, when it is stopped. */
export type SpanSink = (span: FinishedSpan) => void;

interface ResolvedParent {
  traceId: string;
  spanId: string;
  sampled: boolean;
}

export function defaultClock(): number {
  return performance.timeOrigin + performance.now();
}

function isSpanHandle(parent: SpanParent): parent is SpanHandle {
  return 'isRecording' in parent;
}

// --- SpanLifecycleManager ---

export class SpanLifecycleManager {
  constructor(
    private readonly contextStack: ContextStack,
    private readonly sink: SpanSink,
    private readonly logger: pino.Logger,
    private readonly clock: Clock = defaultClock,
  ) {}

  /**
   * Start a span and make it current. Throws InvalidArgumentError for an
   * unknown kind; that is the only failure.
   */
  start(name: string, kind: SpanKindName = 'Internal', parent?: SpanParent): SpanHandle {
    const validKind = parseSpanKind(kind);
    const resolved = this.resolveParent(parent);

    const span = new RecordingSpan({
      traceId: resolved?.traceId ?? generateTraceId(),
      spanId: generateSpanId(),
      parentSpanId: resolved?.spanId,
      name: String(name),
      kind: validKind,
      startTime: this.clock(),
      sampled: resolved?.sampled,
    });

    this.contextStack.push(span);
    this.logger.trace(
      { traceId: span.traceId, spanId: span.spanId, parentSpanId: span.parentSpanId, name: span.name },
      'Span started',
    );
    return span;
  }

  /**
   * Insert or overwrite a tag. Tags set after the span stopped are dropped
   * without error.
   */
  setTag(span: SpanHandle, key: string, value: TagValue): void {
    if (!(span instanceof RecordingSpan)) return;
    if (!span.isRecording()) {
      this.logger.debug({ spanId: span.spanId, key }, 'Tag dropped: span already stopped');
      return;
    }
    if (typeof key !== 'string' || key.length === 0) {
      this.logger.warn(
        { spanId: span.spanId, code: 'INVALID_TAG_KEY' },
        'Tag dropped: key must be a non-empty string',
      );
      return;
    }
    if (!tagValueSchema.safeParse(value).success) {
      this.logger.warn(
        { spanId: span.spanId, key, code: 'INVALID_TAG_VALUE' },
        'Tag dropped: value must be a string, number or boolean',
      );
      return;
    }

    span.setTag(key, value);
  }

  setStatus(span: SpanHandle, status: SpanStatusName, description?: string): void {
    if (!(span instanceof RecordingSpan)) return;
    if (!span.isRecording()) {
      this.logger.debug({ spanId: span.spanId, status }, 'Status dropped: span already stopped');
      return;
    }

    span.setStatus(parseSpanStatus(status), description);
  }

  /**
   * Stop a span. Idempotent: the second and later calls do nothing. The
   * current pointer moves only when the span was current.
   */
  stop(span: SpanHandle): void {
    if (isNoopSpan(span) || !(span instanceof RecordingSpan)) return;

    const finished = span.end(this.clock());
    if (!finished) return;

    this.contextStack.pop(span);
    this.logger.trace(
      { traceId: finished.traceId, spanId: finished.spanId, durationMs: finished.durationMs },
      'Span stopped',
    );
    this.sink(finished);
  }

  current(): SpanHandle | undefined {
    return this.contextStack.current();
  }

  /** Run fn with span carried as the current span of a fresh frame. */
  withSpan<T>(span: SpanHandle, fn: () => T): T {
    return this.contextStack.run(fn, isNoopSpan(span) ? undefined : span);
  }

  // --- Internal ---

  private resolveParent(parent?: SpanParent): ResolvedParent | undefined {
    if (parent) {
      if (isSpanHandle(parent)) {
        if (isNoopSpan(parent)) return undefined;
        return { traceId: parent.traceId, spanId: parent.spanId, sampled: true };
      }
      return { traceId: parent.traceId, spanId: parent.spanId, sampled: parent.sampled };
    }

    const current = this.contextStack.current();
    if (current) {
      return { traceId: current.traceId, spanId: current.spanId, sampled: true };
    }

    const otelSpanContext = trace.getSpanContext(otelContext.active());
    if (otelSpanContext && isSpanContextValid(otelSpanContext)) {
      return {
        traceId: otelSpanContext.traceId,
        spanId: otelSpanContext.spanId,
        sampled: (otelSpanContext.traceFlags & TraceFlags.SAMPLED) === TraceFlags.SAMPLED,
      };
    }

    return undefined;
  }
}
