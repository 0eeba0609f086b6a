/**
 * @spanline/core — Tracing Module (W3C Trace Context, spans, context stack)
 */

export {
  createTraceContext,
  formatTraceparent,
  generateTraceId,
  generateSpanId,
  isValidTraceId,
  isValidSpanId,
  parseTraceparent,
  type TraceContext,
} from './trace-context.js';

export { RecordingSpan, getNoopSpan, isNoopSpan, type SpanHandle, type RecordingSpanInit } from './span.js';
export { ContextStack } from './context-stack.js';
export { SpanLifecycleManager, defaultClock, type SpanParent, type SpanSink } from './span-lifecycle.js';
