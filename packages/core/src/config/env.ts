/**
 * @spanline/core — Environment configuration
 *
 * Reads the standard OTEL_* variables into initialize() arguments. Values
 * are passed through unvalidated; initialize() validates them and reports
 * problems as a ConfigError.
 */

import type { OtlpProtocol } from '../types/index.js';

export interface EnvConfig {
  serviceName: string;
  endpoint: string;
  /** Normalized to "grpc" / "http-protobuf"; anything else is kept as given. */
  protocol: string;
  consoleEcho: boolean;
  headers: Record<string, string>;
  resourceAttributes: Record<string, string>;
  scheduledDelayMs?: number;
  maxExportBatchSize?: number;
  maxQueueSize?: number;
  exportTimeoutMs?: number;
}

const DEFAULT_SERVICE_NAME = 'unknown_service:node';

const DEFAULT_ENDPOINTS: Record<OtlpProtocol, string> = {
  grpc: 'http://localhost:4317',
  'http-protobuf': 'http://localhost:4318',
};

function decode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Parse "k1=v1,k2=v2" (W3C baggage style, percent-encoded values). */
export function parseKeyValueList(raw: string | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!raw) return result;

  for (const entry of raw.split(',')) {
    const separator = entry.indexOf('=');
    if (separator <= 0) continue;
    const key = entry.slice(0, separator).trim();
    const value = entry.slice(separator + 1).trim();
    if (key) result[decode(key)] = decode(value);
  }
  return result;
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

function parseBoolean(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/** OTEL spells the HTTP protocol "http/protobuf". */
function parseProtocol(raw: string | undefined): string {
  const value = raw?.trim().toLowerCase();
  if (!value) return 'grpc';
  return value === 'http/protobuf' ? 'http-protobuf' : value;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const protocol = parseProtocol(env.OTEL_EXPORTER_OTLP_PROTOCOL);
  const resourceAttributes = parseKeyValueList(env.OTEL_RESOURCE_ATTRIBUTES);

  return {
    serviceName: env.OTEL_SERVICE_NAME?.trim() || resourceAttributes['service.name'] || DEFAULT_SERVICE_NAME,
    endpoint:
      env.OTEL_EXPORTER_OTLP_ENDPOINT?.trim() ||
      (protocol === 'http-protobuf' ? DEFAULT_ENDPOINTS['http-protobuf'] : DEFAULT_ENDPOINTS.grpc),
    protocol,
    consoleEcho: parseBoolean(env.SPANLINE_CONSOLE_ECHO),
    headers: parseKeyValueList(env.OTEL_EXPORTER_OTLP_HEADERS),
    resourceAttributes,
    scheduledDelayMs: parseNumber(env.OTEL_BSP_SCHEDULE_DELAY),
    maxExportBatchSize: parseNumber(env.OTEL_BSP_MAX_EXPORT_BATCH_SIZE),
    maxQueueSize: parseNumber(env.OTEL_BSP_MAX_QUEUE_SIZE),
    exportTimeoutMs: parseNumber(env.OTEL_BSP_EXPORT_TIMEOUT),
  };
}
