import { describe, it, expect } from 'vitest';
import {
  OtlpSerializer,
  SEVERITY_NUMBERS,
  VERSION,
  toAnyValue,
  toUnixNano,
  type FinishedSpan,
  type LogRecord,
} from '@spanline/core';

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';
const SPAN_ID = '00f067aa0ba902b7';
const PARENT_ID = 'b7ad6b7169203331';

const serializer = new OtlpSerializer({
  serviceName: 'checkout',
  resourceAttributes: { 'deployment.environment': 'test' },
});

function finishedSpan(overrides: Partial<FinishedSpan> = {}): FinishedSpan {
  return {
    traceId: TRACE_ID,
    spanId: SPAN_ID,
    parentSpanId: PARENT_ID,
    name: 'charge-card',
    kind: 'Client',
    startTime: 1_700_000_000_000,
    endTime: 1_700_000_000_250.25,
    durationMs: 250.25,
    tags: [
      ['http.method', 'POST'],
      ['http.status_code', 502],
      ['retry.ratio', 1.5],
      ['cache.hit', false],
    ],
    status: { code: 'Error', description: 'gateway failed' },
    ...overrides,
  };
}

describe('OTLP value conversions', () => {
  it('should convert epoch milliseconds to unix nanoseconds', () => {
    expect(toUnixNano(1_700_000_000_000)).toBe('1700000000000000000');
    expect(toUnixNano(1_700_000_000_250.25)).toBe('1700000000250250000');
    expect(toUnixNano(0)).toBe('0');
  });

  it('should map tag values onto AnyValue variants', () => {
    expect(toAnyValue('x')).toEqual({ stringValue: 'x' });
    expect(toAnyValue(true)).toEqual({ boolValue: true });
    expect(toAnyValue(42)).toEqual({ intValue: 42 });
    expect(toAnyValue(0.5)).toEqual({ doubleValue: 0.5 });
  });

  it('should use the OTLP severity numbers', () => {
    expect(SEVERITY_NUMBERS).toEqual({
      Trace: 1,
      Debug: 5,
      Information: 9,
      Warning: 13,
      Error: 17,
      Critical: 21,
    });
  });
});

describe('OtlpSerializer', () => {
  describe('spans', () => {
    it('should describe the resource and instrumentation scope', () => {
      const batch = serializer.decodeSpans(serializer.encodeSpans([finishedSpan()]));
      expect(batch.resource).toEqual({
        'deployment.environment': 'test',
        'service.name': 'checkout',
        'telemetry.sdk.name': 'spanline',
        'telemetry.sdk.language': 'nodejs',
        'telemetry.sdk.version': VERSION,
      });
      expect(batch.scope).toEqual({ name: '@spanline/core', version: VERSION });
    });

    it('should map every span field', () => {
      const batch = serializer.decodeSpans(serializer.encodeSpans([finishedSpan()]));
      expect(batch.records).toEqual([
        {
          traceId: TRACE_ID,
          spanId: SPAN_ID,
          parentSpanId: PARENT_ID,
          name: 'charge-card',
          kind: 3,
          startTimeUnixNano: '1700000000000000000',
          endTimeUnixNano: '1700000000250250000',
          attributes: {
            'http.method': 'POST',
            'http.status_code': 502,
            'retry.ratio': 1.5,
            'cache.hit': false,
          },
          status: { code: 2, message: 'gateway failed' },
        },
      ]);
    });

    it('should omit the parent of a root span', () => {
      const batch = serializer.decodeSpans(
        serializer.encodeSpans([finishedSpan({ parentSpanId: undefined, status: { code: 'Ok' } })]),
      );
      expect(batch.records[0]?.parentSpanId).toBeUndefined();
      expect(batch.records[0]?.status).toEqual({ code: 1, message: '' });
    });

    it('should map each kind to its OTLP number', () => {
      const kinds = ['Internal', 'Server', 'Client', 'Producer', 'Consumer'] as const;
      const batch = serializer.decodeSpans(serializer.encodeSpans(kinds.map((kind) => finishedSpan({ kind }))));
      expect(batch.records.map((r) => r.kind)).toEqual([1, 2, 3, 4, 5]);
    });
  });

  describe('logs', () => {
    const record: LogRecord = {
      timestamp: 1_700_000_000_500,
      observedTimestamp: 1_700_000_000_500,
      level: 'Error',
      message: 'payment declined',
      exception: { type: 'DeclinedError', message: 'insufficient funds', stackTrace: 'at charge()' },
      traceId: TRACE_ID,
      spanId: SPAN_ID,
      attributes: { 'order.id': 'o-17' },
    };

    it('should map level, body, correlation and exception', () => {
      const batch = serializer.decodeLogs(serializer.encodeLogs([record]));
      expect(batch.records).toEqual([
        {
          timeUnixNano: '1700000000500000000',
          severityNumber: 17,
          severityText: 'Error',
          body: 'payment declined',
          attributes: {
            'order.id': 'o-17',
            'exception.type': 'DeclinedError',
            'exception.message': 'insufficient funds',
            'exception.stacktrace': 'at charge()',
          },
          traceId: TRACE_ID,
          spanId: SPAN_ID,
        },
      ]);
    });

    it('should leave uncorrelated records without identifiers', () => {
      const bare: LogRecord = {
        timestamp: 1_700_000_000_000,
        observedTimestamp: 1_700_000_000_000,
        level: 'Warning',
        message: 'no span',
      };
      const batch = serializer.decodeLogs(serializer.encodeLogs([bare]));
      expect(batch.records[0]?.traceId).toBeUndefined();
      expect(batch.records[0]?.spanId).toBeUndefined();
      expect(batch.records[0]?.severityNumber).toBe(13);
      expect(batch.records[0]?.attributes).toEqual({});
    });
  });

  describe('decodeResponse', () => {
    it('should treat an empty body as full success', () => {
      expect(serializer.decodeResponse('traces', new Uint8Array(0))).toEqual({ rejected: 0 });
    });

    it('should read partial success rejections', () => {
      // partial_success { rejected = 3, error_message = "bad" }
      const body = Uint8Array.from([0x0a, 0x07, 0x08, 0x03, 0x12, 0x03, 0x62, 0x61, 0x64]);
      expect(serializer.decodeResponse('traces', body)).toEqual({ rejected: 3, errorMessage: 'bad' });
      expect(serializer.decodeResponse('logs', body)).toEqual({ rejected: 3, errorMessage: 'bad' });
    });
  });
});
