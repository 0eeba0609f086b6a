/**
 * @spanline/core — W3C Trace Context Primitives
 *
 * Identifier generation and the traceparent header used to carry a span
 * across process boundaries.
 * https://www.w3.org/TR/trace-context/
 *
 * Format:
 *   traceId:     32 hex chars (128 bit)
 *   spanId:      16 hex chars (64 bit)
 *   traceparent: "00-{traceId}-{spanId}-{flags}"
 */

import { randomBytes } from 'node:crypto';
import {
  TraceFlags,
  isValidSpanId as isValidOtelSpanId,
  isValidTraceId as isValidOtelTraceId,
} from '@opentelemetry/api';

// --- Types ---

/** Identity of a span that may live in another process. */
export interface TraceContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly traceparent: string;
  readonly sampled: boolean;
}

// --- Constants ---

const TRACE_ID_BYTES = 16;
const SPAN_ID_BYTES = 8;
const TRACE_VERSION = '00';

const TRACEPARENT_REGEX = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;
const UNSUPPORTED_VERSION = 'ff';
const LOWER_HEX_REGEX = /^[0-9a-f]+$/;

// --- Generation ---

export function generateTraceId(): string {
  let id = randomBytes(TRACE_ID_BYTES).toString('hex');
  while (!isValidOtelTraceId(id)) {
    id = randomBytes(TRACE_ID_BYTES).toString('hex');
  }
  return id;
}

export function generateSpanId(): string {
  let id = randomBytes(SPAN_ID_BYTES).toString('hex');
  while (!isValidOtelSpanId(id)) {
    id = randomBytes(SPAN_ID_BYTES).toString('hex');
  }
  return id;
}

// --- Validation ---

/** 32 lowercase hex characters, not all zeros. */
export function isValidTraceId(traceId: string): boolean {
  return LOWER_HEX_REGEX.test(traceId) && isValidOtelTraceId(traceId);
}

/** 16 lowercase hex characters, not all zeros. */
export function isValidSpanId(spanId: string): boolean {
  return LOWER_HEX_REGEX.test(spanId) && isValidOtelSpanId(spanId);
}

// --- traceparent formatting ---

export function formatTraceparent(traceId: string, spanId: string, sampled = true): string {
  const flags = sampled ? TraceFlags.SAMPLED : TraceFlags.NONE;
  return `${TRACE_VERSION}-${traceId}-${spanId}-${flags.toString(16).padStart(2, '0')}`;
}

// --- Factory ---

/**
 * Create a TraceContext. Reuses valid traceId/spanId if provided,
 * otherwise generates new ones.
 */
export function createTraceContext(traceId?: string, spanId?: string): TraceContext {
  const validTraceId = traceId && isValidTraceId(traceId) ? traceId : generateTraceId();
  const validSpanId = spanId && isValidSpanId(spanId) ? spanId : generateSpanId();

  return {
    traceId: validTraceId,
    spanId: validSpanId,
    traceparent: formatTraceparent(validTraceId, validSpanId),
    sampled: true,
  };
}

// --- Parsing ---

/**
 * Parse a W3C traceparent header. Returns null for malformed headers,
 * the reserved version "ff", and all-zero identifiers.
 *
 * Example: "00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01"
 */
export function parseTraceparent(header: string): TraceContext | null {
  const match = header.trim().toLowerCase().match(TRACEPARENT_REGEX);
  if (!match) return null;

  const [, version, traceId, spanId, flags] = match;
  if (version === UNSUPPORTED_VERSION) return null;
  if (!isValidTraceId(traceId) || !isValidSpanId(spanId)) return null;

  const sampled = (parseInt(flags, 16) & TraceFlags.SAMPLED) === TraceFlags.SAMPLED;

  return {
    traceId,
    spanId,
    traceparent: formatTraceparent(traceId, spanId, sampled),
    sampled,
  };
}
