/**
 * @spanline/core — OTLP Protobuf Serializer
 *
 * Encodes finished spans and log records as OTLP ExportTraceServiceRequest
 * and ExportLogsServiceRequest messages. The message definitions are the
 * .proto files shipped in packages/core/proto, loaded once at run time.
 */

import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import protobuf from 'protobufjs';
import type { Root, Type } from 'protobufjs';
import { z } from 'zod/v4';
import type {
  FinishedSpan,
  LogLevel,
  LogRecord,
  SpanKindName,
  SpanStatusName,
  TagValue,
} from '../types/index.js';
import { SCOPE_NAME, VERSION } from '../version.js';

// --- Constants ---

const TRACE_REQUEST = 'opentelemetry.proto.collector.trace.v1.ExportTraceServiceRequest';
const TRACE_RESPONSE = 'opentelemetry.proto.collector.trace.v1.ExportTraceServiceResponse';
const LOGS_REQUEST = 'opentelemetry.proto.collector.logs.v1.ExportLogsServiceRequest';
const LOGS_RESPONSE = 'opentelemetry.proto.collector.logs.v1.ExportLogsServiceResponse';

const PROTO_FILES = [
  'opentelemetry/proto/collector/trace/v1/trace_service.proto',
  'opentelemetry/proto/collector/logs/v1/logs_service.proto',
];

export const SPAN_KIND_VALUES: Record<SpanKindName, number> = {
  Internal: 1,
  Server: 2,
  Client: 3,
  Producer: 4,
  Consumer: 5,
};

export const STATUS_CODE_VALUES: Record<SpanStatusName, number> = {
  Unset: 0,
  Ok: 1,
  Error: 2,
};

export const SEVERITY_NUMBERS: Record<LogLevel, number> = {
  Trace: 1,
  Debug: 5,
  Information: 9,
  Warning: 13,
  Error: 17,
  Critical: 21,
};

/** Trace flags value for a sampled record. */
const FLAG_SAMPLED = 0x01;

// --- Wire shapes (protobufjs fromObject input) ---

type AnyValue =
  | { stringValue: string }
  | { boolValue: boolean }
  | { intValue: number }
  | { doubleValue: number };

type KeyValue = { key: string; value: AnyValue };

type ResourceInput = { attributes: KeyValue[] };

type ScopeInput = { name: string; version: string };

type SpanInput = {
  traceId: Uint8Array;
  spanId: Uint8Array;
  parentSpanId?: Uint8Array;
  flags: number;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  attributes: KeyValue[];
  status: { code: number; message?: string };
};

type LogRecordInput = {
  timeUnixNano: string;
  observedTimeUnixNano: string;
  severityNumber: number;
  severityText: string;
  body: AnyValue;
  attributes: KeyValue[];
  flags: number;
  traceId?: Uint8Array;
  spanId?: Uint8Array;
};

// --- Conversions ---

export function toAnyValue(value: TagValue): AnyValue {
  if (typeof value === 'string') return { stringValue: value };
  if (typeof value === 'boolean') return { boolValue: value };
  return Number.isSafeInteger(value) ? { intValue: value } : { doubleValue: value };
}

function toKeyValues(entries: Iterable<readonly [string, TagValue]>): KeyValue[] {
  const result: KeyValue[] = [];
  for (const [key, value] of entries) {
    result.push({ key, value: toAnyValue(value) });
  }
  return result;
}

/** Epoch milliseconds to unix nanoseconds, as a decimal string (fixed64). */
export function toUnixNano(epochMs: number): string {
  const micros = BigInt(Math.round(epochMs * 1000));
  return (micros * 1000n).toString();
}

function hexToBytes(hex: string): Uint8Array {
  return Buffer.from(hex, 'hex');
}

// --- Decoded shapes (for inspection and tests) ---

const bytesSchema = z.instanceof(Uint8Array).transform((bytes) => Buffer.from(bytes).toString('hex'));

const anyValueSchema = z.object({
  stringValue: z.string().optional(),
  boolValue: z.boolean().optional(),
  intValue: z.string().optional(),
  doubleValue: z.number().optional(),
});

const keyValueSchema = z.object({
  key: z.string(),
  value: anyValueSchema.optional(),
});

const scopeSchema = z.object({
  name: z.string().default(''),
  version: z.string().default(''),
});

const decodedSpanSchema = z.object({
  traceId: bytesSchema,
  spanId: bytesSchema,
  parentSpanId: bytesSchema.optional(),
  name: z.string().default(''),
  kind: z.number().default(0),
  startTimeUnixNano: z.string().default('0'),
  endTimeUnixNano: z.string().default('0'),
  attributes: z.array(keyValueSchema).default([]),
  status: z
    .object({ code: z.number().default(0), message: z.string().default('') })
    .default({ code: 0, message: '' }),
});

const decodedLogSchema = z.object({
  timeUnixNano: z.string().default('0'),
  severityNumber: z.number().default(0),
  severityText: z.string().default(''),
  body: anyValueSchema.optional(),
  attributes: z.array(keyValueSchema).default([]),
  traceId: bytesSchema.optional(),
  spanId: bytesSchema.optional(),
});

const resourceSchema = z.object({ attributes: z.array(keyValueSchema).default([]) }).default({ attributes: [] });

const traceRequestSchema = z.object({
  resourceSpans: z
    .array(
      z.object({
        resource: resourceSchema,
        scopeSpans: z
          .array(z.object({ scope: scopeSchema.optional(), spans: z.array(decodedSpanSchema).default([]) }))
          .default([]),
      }),
    )
    .default([]),
});

const logsRequestSchema = z.object({
  resourceLogs: z
    .array(
      z.object({
        resource: resourceSchema,
        scopeLogs: z
          .array(z.object({ scope: scopeSchema.optional(), logRecords: z.array(decodedLogSchema).default([]) }))
          .default([]),
      }),
    )
    .default([]),
});

const partialSuccessSchema = z.object({
  partialSuccess: z
    .object({
      rejectedSpans: z.string().optional(),
      rejectedLogRecords: z.string().optional(),
      errorMessage: z.string().optional(),
    })
    .optional(),
});

function fromAnyValue(value: z.infer<typeof anyValueSchema> | undefined): TagValue | undefined {
  if (!value) return undefined;
  if (value.stringValue !== undefined) return value.stringValue;
  if (value.boolValue !== undefined) return value.boolValue;
  if (value.intValue !== undefined) return Number(value.intValue);
  return value.doubleValue;
}

function fromKeyValues(values: z.infer<typeof keyValueSchema>[]): Record<string, TagValue> {
  const result: Record<string, TagValue> = {};
  for (const kv of values) {
    const value = fromAnyValue(kv.value);
    if (value !== undefined) result[kv.key] = value;
  }
  return result;
}

export interface DecodedSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  attributes: Record<string, TagValue>;
  status: { code: number; message: string };
}

export interface DecodedLogRecord {
  timeUnixNano: string;
  severityNumber: number;
  severityText: string;
  body?: TagValue;
  attributes: Record<string, TagValue>;
  traceId?: string;
  spanId?: string;
}

export interface DecodedBatch<T> {
  resource: Record<string, TagValue>;
  scope: { name: string; version: string };
  records: T[];
}

export interface ExportResponse {
  rejected: number;
  errorMessage?: string;
}

// --- Proto loading ---

const runtimeRequire = createRequire(import.meta.url);
const rootCache = new Map<string, Root>();

export function defaultProtoDir(): string {
  return join(dirname(runtimeRequire.resolve('@spanline/core/package.json')), 'proto');
}

function loadRoot(protoDir: string): Root {
  const cached = rootCache.get(protoDir);
  if (cached) return cached;

  const root = new protobuf.Root();
  root.resolvePath = (_origin: string, target: string) => join(protoDir, target);
  root.loadSync(PROTO_FILES, { keepCase: false });
  root.resolveAll();
  rootCache.set(protoDir, root);
  return root;
}

// --- OtlpSerializer ---

export interface OtlpSerializerOptions {
  serviceName: string;
  resourceAttributes?: Record<string, TagValue>;
  protoDir?: string;
}

export class OtlpSerializer {
  private readonly traceRequest: Type;
  private readonly traceResponse: Type;
  private readonly logsRequest: Type;
  private readonly logsResponse: Type;
  private readonly resource: ResourceInput;
  private readonly scope: ScopeInput = { name: SCOPE_NAME, version: VERSION };

  constructor(options: OtlpSerializerOptions) {
    const root = loadRoot(options.protoDir ?? defaultProtoDir());
    this.traceRequest = root.lookupType(TRACE_REQUEST);
    this.traceResponse = root.lookupType(TRACE_RESPONSE);
    this.logsRequest = root.lookupType(LOGS_REQUEST);
    this.logsResponse = root.lookupType(LOGS_RESPONSE);

    this.resource = {
      attributes: toKeyValues(
        Object.entries({
          ...options.resourceAttributes,
          'service.name': options.serviceName,
          'telemetry.sdk.name': 'spanline',
          'telemetry.sdk.language': 'nodejs',
          'telemetry.sdk.version': VERSION,
        }),
      ),
    };
  }

  encodeSpans(spans: readonly FinishedSpan[]): Uint8Array {
    const request = {
      resourceSpans: [
        {
          resource: this.resource,
          scopeSpans: [{ scope: this.scope, spans: spans.map((span) => this.toOtlpSpan(span)) }],
        },
      ],
    };
    return this.traceRequest.encode(this.traceRequest.fromObject(request)).finish();
  }

  encodeLogs(records: readonly LogRecord[]): Uint8Array {
    const request = {
      resourceLogs: [
        {
          resource: this.resource,
          scopeLogs: [{ scope: this.scope, logRecords: records.map((record) => this.toOtlpLog(record)) }],
        },
      ],
    };
    return this.logsRequest.encode(this.logsRequest.fromObject(request)).finish();
  }

  decodeSpans(payload: Uint8Array): DecodedBatch<DecodedSpan> {
    const parsed = traceRequestSchema.parse(this.toPlainObject(this.traceRequest, payload));
    const first = parsed.resourceSpans[0];
    const scope = first?.scopeSpans[0]?.scope;
    return {
      resource: fromKeyValues(first?.resource.attributes ?? []),
      scope: { name: scope?.name ?? '', version: scope?.version ?? '' },
      records: parsed.resourceSpans.flatMap((rs) =>
        rs.scopeSpans.flatMap((ss) =>
          ss.spans.map((span) => ({ ...span, attributes: fromKeyValues(span.attributes) })),
        ),
      ),
    };
  }

  decodeLogs(payload: Uint8Array): DecodedBatch<DecodedLogRecord> {
    const parsed = logsRequestSchema.parse(this.toPlainObject(this.logsRequest, payload));
    const first = parsed.resourceLogs[0];
    const scope = first?.scopeLogs[0]?.scope;
    return {
      resource: fromKeyValues(first?.resource.attributes ?? []),
      scope: { name: scope?.name ?? '', version: scope?.version ?? '' },
      records: parsed.resourceLogs.flatMap((rl) =>
        rl.scopeLogs.flatMap((sl) =>
          sl.logRecords.map((log) => ({
            ...log,
            body: fromAnyValue(log.body),
            attributes: fromKeyValues(log.attributes),
          })),
        ),
      ),
    };
  }

  /** Decode an Export*ServiceResponse; an empty body means full success. */
  decodeResponse(signal: 'traces' | 'logs', payload: Uint8Array): ExportResponse {
    if (payload.length === 0) return { rejected: 0 };

    const type = signal === 'traces' ? this.traceResponse : this.logsResponse;
    const parsed = partialSuccessSchema.parse(this.toPlainObject(type, payload));
    const partial = parsed.partialSuccess;
    const rejected = Number(partial?.rejectedSpans ?? partial?.rejectedLogRecords ?? 0);
    return { rejected, errorMessage: partial?.errorMessage || undefined };
  }

  // --- Internal ---

  private toOtlpSpan(span: FinishedSpan): SpanInput {
    return {
      traceId: hexToBytes(span.traceId),
      spanId: hexToBytes(span.spanId),
      parentSpanId: span.parentSpanId ? hexToBytes(span.parentSpanId) : undefined,
      flags: FLAG_SAMPLED,
      name: span.name,
      kind: SPAN_KIND_VALUES[span.kind],
      startTimeUnixNano: toUnixNano(span.startTime),
      endTimeUnixNano: toUnixNano(span.endTime),
      attributes: toKeyValues(span.tags),
      status: {
        code: STATUS_CODE_VALUES[span.status.code],
        message: span.status.description,
      },
    };
  }

  private toOtlpLog(record: LogRecord): LogRecordInput {
    const attributes = toKeyValues(Object.entries(record.attributes ?? {}));
    if (record.exception) {
      if (record.exception.type) {
        attributes.push({ key: 'exception.type', value: toAnyValue(record.exception.type) });
      }
      attributes.push({ key: 'exception.message', value: toAnyValue(record.exception.message) });
      if (record.exception.stackTrace) {
        attributes.push({ key: 'exception.stacktrace', value: toAnyValue(record.exception.stackTrace) });
      }
    }

    return {
      timeUnixNano: toUnixNano(record.timestamp),
      observedTimeUnixNano: toUnixNano(record.observedTimestamp),
      severityNumber: SEVERITY_NUMBERS[record.level],
      severityText: record.level,
      body: { stringValue: record.message },
      attributes,
      flags: record.traceId ? FLAG_SAMPLED : 0,
      traceId: record.traceId ? hexToBytes(record.traceId) : undefined,
      spanId: record.spanId ? hexToBytes(record.spanId) : undefined,
    };
  }

  private toPlainObject(type: Type, payload: Uint8Array): unknown {
    return type.toObject(type.decode(payload), { longs: String });
  }
}
