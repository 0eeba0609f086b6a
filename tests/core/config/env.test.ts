import { describe, it, expect } from 'vitest';
import { loadEnvConfig, parseKeyValueList } from '@spanline/core';

describe('loadEnvConfig', () => {
  it('should fall back to gRPC on localhost', () => {
    expect(loadEnvConfig({})).toEqual({
      serviceName: 'unknown_service:node',
      endpoint: 'http://localhost:4317',
      protocol: 'grpc',
      consoleEcho: false,
      headers: {},
      resourceAttributes: {},
      scheduledDelayMs: undefined,
      maxExportBatchSize: undefined,
      maxQueueSize: undefined,
      exportTimeoutMs: undefined,
    });
  });

  it('should default the HTTP endpoint to port 4318', () => {
    const config = loadEnvConfig({ OTEL_EXPORTER_OTLP_PROTOCOL: 'http/protobuf' });
    expect(config.protocol).toBe('http-protobuf');
    expect(config.endpoint).toBe('http://localhost:4318');
  });

  it('should read every supported variable', () => {
    const config = loadEnvConfig({
      OTEL_SERVICE_NAME: ' billing ',
      OTEL_EXPORTER_OTLP_ENDPOINT: 'https://otel.example.com',
      OTEL_EXPORTER_OTLP_PROTOCOL: 'GRPC',
      OTEL_EXPORTER_OTLP_HEADERS: 'x-api-key=test-secret',
      OTEL_RESOURCE_ATTRIBUTES: 'service.version=1.2.0,team=payments',
      SPANLINE_CONSOLE_ECHO: 'true',
      OTEL_BSP_SCHEDULE_DELAY: '1000',
      OTEL_BSP_MAX_EXPORT_BATCH_SIZE: '128',
      OTEL_BSP_MAX_QUEUE_SIZE: '4096',
      OTEL_BSP_EXPORT_TIMEOUT: '3000',
    });

    expect(config).toEqual({
      serviceName: 'billing',
      endpoint: 'https://otel.example.com',
      protocol: 'grpc',
      consoleEcho: true,
      headers: { 'x-api-key': 'test-secret' },
      resourceAttributes: { 'service.version': '1.2.0', team: 'payments' },
      scheduledDelayMs: 1000,
      maxExportBatchSize: 128,
      maxQueueSize: 4096,
      exportTimeoutMs: 3000,
    });
  });

  it('should take the service name from resource attributes when unset', () => {
    const config = loadEnvConfig({ OTEL_RESOURCE_ATTRIBUTES: 'service.name=from-resource' });
    expect(config.serviceName).toBe('from-resource');
  });

  it('should pass unknown protocols through for initialize() to reject', () => {
    expect(loadEnvConfig({ OTEL_EXPORTER_OTLP_PROTOCOL: 'http/json' }).protocol).toBe('http/json');
  });

  it.each(['1', 'yes', 'ON'])('should treat %s as enabling console echo', (value) => {
    expect(loadEnvConfig({ SPANLINE_CONSOLE_ECHO: value }).consoleEcho).toBe(true);
  });
});

describe('parseKeyValueList', () => {
  it('should percent-decode keys and values', () => {
    expect(parseKeyValueList('authorization=Bearer%20test-token,x%2Did=42')).toEqual({
      authorization: 'Bearer test-token',
      'x-id': '42',
    });
  });

  it('should keep values containing "="', () => {
    expect(parseKeyValueList('query=a=b')).toEqual({ query: 'a=b' });
  });

  it('should skip malformed entries', () => {
    expect(parseKeyValueList('novalue,=orphan,ok=1,')).toEqual({ ok: '1' });
  });

  it('should leave invalid escapes undecoded', () => {
    expect(parseKeyValueList('bad=%E0%A4%A')).toEqual({ bad: '%E0%A4%A' });
  });

  it('should return an empty record for undefined input', () => {
    expect(parseKeyValueList(undefined)).toEqual({});
  });
});
