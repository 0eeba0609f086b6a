/**
 * @spanline/core — Span handles
 *
 * RecordingSpan is the live span returned by startSpan(). NoopSpan is the
 * sentinel handed out before initialize(): every operation on it is a no-op,
 * so instrumented code never has to null-check.
 */

import { INVALID_SPANID, INVALID_TRACEID } from '@opentelemetry/api';
import type {
  FinishedSpan,
  SpanKindName,
  SpanStatus,
  SpanStatusName,
  TagValue,
} from '../types/index.js';
import { formatTraceparent } from './trace-context.js';

// --- Handle ---

export interface SpanHandle {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly name: string;
  readonly kind: SpanKindName;
  readonly startTime: number;
  /** Undefined until the span is stopped. */
  readonly endTime: number | undefined;
  /** W3C traceparent for propagating this span to another process. */
  readonly traceparent: string;
  /** True while the span is open and collecting tags. */
  isRecording(): boolean;
  isEnded(): boolean;
  getTag(key: string): TagValue | undefined;
  getTags(): Record<string, TagValue>;
  getStatus(): Readonly<SpanStatus>;
}

export interface RecordingSpanInit {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: SpanKindName;
  startTime: number;
  sampled?: boolean;
}

// --- RecordingSpan ---

export class RecordingSpan implements SpanHandle {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly name: string;
  readonly kind: SpanKindName;
  readonly startTime: number;
  readonly traceparent: string;

  private readonly tags = new Map<string, TagValue>();
  private status: SpanStatus = { code: 'Unset' };
  private ended?: number;

  constructor(init: RecordingSpanInit) {
    this.traceId = init.traceId;
    this.spanId = init.spanId;
    this.parentSpanId = init.parentSpanId;
    this.name = init.name;
    this.kind = init.kind;
    this.startTime = init.startTime;
    this.traceparent = formatTraceparent(init.traceId, init.spanId, init.sampled ?? true);
  }

  get endTime(): number | undefined {
    return this.ended;
  }

  isRecording(): boolean {
    return this.ended === undefined;
  }

  isEnded(): boolean {
    return this.ended !== undefined;
  }

  getTag(key: string): TagValue | undefined {
    return this.tags.get(key);
  }

  getTags(): Record<string, TagValue> {
    return Object.fromEntries(this.tags);
  }

  getStatus(): Readonly<SpanStatus> {
    return { ...this.status };
  }

  /** Returns false when the span is already stopped and the tag was dropped. */
  setTag(key: string, value: TagValue): boolean {
    if (this.ended !== undefined) return false;
    this.tags.set(key, value);
    return true;
  }

  setStatus(code: SpanStatusName, description?: string): boolean {
    if (this.ended !== undefined) return false;
    // Descriptions only carry meaning for errors.
    this.status = code === 'Error' && description ? { code, description } : { code };
    return true;
  }

  /**
   * Finalize the span. Returns the immutable snapshot the first time,
   * undefined on every later call.
   */
  end(endTime: number): FinishedSpan | undefined {
    if (this.ended !== undefined) return undefined;
    // A clock stepping backwards must not produce a negative duration.
    this.ended = Math.max(endTime, this.startTime);

    return Object.freeze({
      traceId: this.traceId,
      spanId: this.spanId,
      parentSpanId: this.parentSpanId,
      name: this.name,
      kind: this.kind,
      startTime: this.startTime,
      endTime: this.ended,
      durationMs: this.ended - this.startTime,
      tags: Object.freeze([...this.tags.entries()].map(([k, v]) => Object.freeze([k, v] as const))),
      status: Object.freeze({ ...this.status }),
    });
  }
}

// --- NoopSpan ---

class NoopSpan implements SpanHandle {
  readonly traceId = INVALID_TRACEID;
  readonly spanId = INVALID_SPANID;
  readonly parentSpanId = undefined;
  readonly name = '';
  readonly kind: SpanKindName = 'Internal';
  readonly startTime = 0;
  readonly endTime = undefined;
  readonly traceparent = formatTraceparent(INVALID_TRACEID, INVALID_SPANID, false);

  isRecording(): boolean {
    return false;
  }

  isEnded(): boolean {
    return false;
  }

  getTag(): TagValue | undefined {
    return undefined;
  }

  getTags(): Record<string, TagValue> {
    return {};
  }

  getStatus(): Readonly<SpanStatus> {
    return { code: 'Unset' };
  }
}

const noopSpan: SpanHandle = Object.freeze(new NoopSpan());

export function getNoopSpan(): SpanHandle {
  return noopSpan;
}

export function isNoopSpan(span: SpanHandle): boolean {
  return span === noopSpan;
}
