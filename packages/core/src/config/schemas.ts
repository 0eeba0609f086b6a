/**
 * @spanline/core — Zod Schemas for API Inputs
 *
 * Runtime validation at the API boundary. TypeScript callers are already
 * held to the closed unions; these schemas catch untyped callers (CLI
 * arguments, scripts) and turn unknown values into typed errors.
 */

import { z } from 'zod/v4';
import {
  InvalidArgumentError,
  LOG_LEVELS,
  type LogLevel,
  type SpanKindName,
  type SpanStatusName,
  OTLP_PROTOCOLS,
  SPAN_KINDS,
  SPAN_STATUSES,
} from '../types/index.js';

// --- Enumerations (case-insensitive) ---

function matchCase(values: readonly string[]) {
  return (input: unknown): unknown => {
    if (typeof input !== 'string') return input;
    const wanted = input.trim().toLowerCase();
    return values.find((value) => value.toLowerCase() === wanted) ?? input;
  };
}

export const spanKindSchema = z.preprocess(matchCase(SPAN_KINDS), z.enum(SPAN_KINDS));
export const spanStatusSchema = z.preprocess(matchCase(SPAN_STATUSES), z.enum(SPAN_STATUSES));
export const logLevelSchema = z.preprocess(matchCase(LOG_LEVELS), z.enum(LOG_LEVELS));
export const protocolSchema = z.preprocess(matchCase(OTLP_PROTOCOLS), z.enum(OTLP_PROTOCOLS));

export const tagValueSchema = z.union([z.string(), z.number(), z.boolean()]);

// --- Endpoint ---

function isHttpUri(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const url = new URL(value);
  return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
}

export const endpointSchema = z
  .string()
  .trim()
  .min(1, { message: 'Endpoint must not be empty' })
  .refine(isHttpUri, { message: 'Endpoint must be an absolute http:// or https:// URI' });

// --- initialize() ---

const positiveInt = z.number().int().positive();

export const pipelineOptionsSchema = z.object({
  scheduledDelayMs: positiveInt.default(5000),
  maxExportBatchSize: positiveInt.default(512),
  maxQueueSize: positiveInt.default(2048),
  maxAttempts: positiveInt.default(5),
  initialBackoffMs: positiveInt.default(1000),
  maxBackoffMs: positiveInt.default(5000),
  backoffMultiplier: z.number().min(1).default(1.5),
  exportTimeoutMs: positiveInt.default(10000),
  shutdownTimeoutMs: positiveInt.default(5000),
});

export const initializeSchema = z
  .object({
    serviceName: z.string().trim().min(1, { message: 'Service name must not be empty' }),
    endpoint: endpointSchema,
    protocol: protocolSchema,
    consoleEcho: z.boolean().default(false),
    resourceAttributes: z.record(z.string(), tagValueSchema).default({}),
  })
  .extend(pipelineOptionsSchema.shape)
  .refine((cfg) => cfg.maxExportBatchSize <= cfg.maxQueueSize, {
    message: 'maxExportBatchSize must not exceed maxQueueSize',
    path: ['maxExportBatchSize'],
  })
  .refine((cfg) => cfg.initialBackoffMs <= cfg.maxBackoffMs, {
    message: 'initialBackoffMs must not exceed maxBackoffMs',
    path: ['initialBackoffMs'],
  });

export type PipelineOptions = z.infer<typeof pipelineOptionsSchema>;
export type TelemetryConfig = z.infer<typeof initializeSchema>;

/** Render zod issues as "path: message; path: message". */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// --- Argument parsing for instrumentation calls ---

function parseEnum<S extends z.ZodType>(schema: S, input: unknown, what: string, code: string, valid: readonly string[]): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid ${what} "${String(input)}". Valid: ${valid.join(', ')}`,
      code,
      { value: input },
    );
  }
  return result.data;
}

export function parseSpanKind(input: unknown): SpanKindName {
  return parseEnum(spanKindSchema, input, 'span kind', 'INVALID_SPAN_KIND', SPAN_KINDS);
}

export function parseSpanStatus(input: unknown): SpanStatusName {
  return parseEnum(spanStatusSchema, input, 'span status', 'INVALID_SPAN_STATUS', SPAN_STATUSES);
}

export function parseLogLevel(input: unknown): LogLevel {
  return parseEnum(logLevelSchema, input, 'log level', 'INVALID_LOG_LEVEL', LOG_LEVELS);
}
