import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { Command } from 'commander';
import {
  InMemoryTransport,
  InvalidArgumentError,
  OtlpSerializer,
  Telemetry,
  TransportError,
} from '@spanline/core';
import {
  collectTag,
  describeConfig,
  registerConfigCommand,
  registerSpanCommand,
  runLogCommand,
  runSpanCommand,
  type CommandContext,
} from '@spanline/cli';

const serializer = new OtlpSerializer({ serviceName: 'cli' });

describe('CLI commands', () => {
  let transport: InMemoryTransport;
  let output: string[];
  let ctx: CommandContext;

  beforeEach(() => {
    transport = new InMemoryTransport();
    output = [];
    ctx = {
      env: { OTEL_SERVICE_NAME: 'cli-test' },
      createTelemetry: () => new Telemetry({ logger: pino({ level: 'silent' }) }),
      transport,
      stdout: (line) => void output.push(line),
    };
  });

  describe('span', () => {
    it('should export one span with its tags and status', async () => {
      const summary = await runSpanCommand(
        'deploy',
        { kind: 'client', tag: [['region', 'eu-west-1']], status: 'Error', description: 'rollback' },
        ctx,
      );

      expect(summary).toMatch(
        /^Span "deploy" trace=[0-9a-f]{32} span=[0-9a-f]{16}: 1 span\(s\), 0 log\(s\) exported, 0 lost\.$/,
      );

      const batch = serializer.decodeSpans(transport.payloads('traces')[0] ?? new Uint8Array());
      expect(batch.resource['service.name']).toBe('cli-test');
      expect(batch.records[0]).toMatchObject({
        name: 'deploy',
        kind: 3,
        attributes: { region: 'eu-west-1' },
        status: { code: 2, message: 'rollback' },
      });
      expect(transport.isClosed).toBe(true);
    });

    it('should write the log record inside the span', async () => {
      const summary = await runSpanCommand('job', { log: 'started', level: 'Warning' }, ctx);
      expect(summary).toContain(': 1 span(s), 1 log(s) exported, 0 lost.');

      const span = serializer.decodeSpans(transport.payloads('traces')[0] ?? new Uint8Array()).records[0];
      const log = serializer.decodeLogs(transport.payloads('logs')[0] ?? new Uint8Array()).records[0];
      expect(log?.body).toBe('started');
      expect(log?.spanId).toBe(span?.spanId);
      expect(log?.traceId).toBe(span?.traceId);
    });

    it('should continue a remote trace from a traceparent header', async () => {
      const summary = await runSpanCommand(
        'remote-child',
        { traceparent: '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01' },
        ctx,
      );
      expect(summary).toContain('trace=0af7651916cd43dd8448eb211c80319c');

      const span = serializer.decodeSpans(transport.payloads('traces')[0] ?? new Uint8Array()).records[0];
      expect(span?.parentSpanId).toBe('b7ad6b7169203331');
    });

    it('should reject a malformed traceparent before exporting anything', async () => {
      await expect(runSpanCommand('x', { traceparent: 'not-a-header' }, ctx)).rejects.toThrow(
        'Invalid traceparent "not-a-header"',
      );
      expect(transport.requests).toHaveLength(0);
    });

    it('should reject an unknown span kind', async () => {
      await expect(runSpanCommand('x', { kind: 'Sideways' }, ctx)).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('should reject an unknown protocol flag', async () => {
      await expect(runSpanCommand('x', { protocol: 'udp' }, ctx)).rejects.toThrow(
        'Invalid protocol "udp". Valid: grpc, http-protobuf',
      );
    });

    it('should let flags override the environment', async () => {
      await runSpanCommand('x', { service: 'from-flag' }, ctx);
      const batch = serializer.decodeSpans(transport.payloads('traces')[0] ?? new Uint8Array());
      expect(batch.resource['service.name']).toBe('from-flag');
    });

    it('should collect repeated --tag options through commander', async () => {
      const program = new Command().exitOverride();
      registerSpanCommand(program, ctx);

      await program.parseAsync(['span', 'tagged', '--tag', 'a=1', '--tag', 'b=x=y'], { from: 'user' });

      expect(output).toHaveLength(1);
      const span = serializer.decodeSpans(transport.payloads('traces')[0] ?? new Uint8Array()).records[0];
      expect(span?.attributes).toEqual({ a: '1', b: 'x=y' });
    });
  });

  describe('log', () => {
    it('should export a single record with its exception', async () => {
      const summary = await runLogCommand(
        'disk almost full',
        { level: 'critical', error: 'ENOSPC', errorType: 'SystemError' },
        ctx,
      );
      expect(summary).toBe('Log (Critical): 1 exported, 0 lost.');

      const record = serializer.decodeLogs(transport.payloads('logs')[0] ?? new Uint8Array()).records[0];
      expect(record).toMatchObject({ body: 'disk almost full', severityText: 'Critical' });
      expect(record?.traceId).toBeUndefined();
    });

    it('should count records lost to a permanent transport failure', async () => {
      const failing = new InMemoryTransport();
      failing.failNext(1, new TransportError('Rejected', 'HTTP_400', false));

      const summary = await runLogCommand('dropped', {}, { ...ctx, transport: failing });
      expect(summary).toBe('Log (Information): 0 exported, 1 lost.');
    });
  });

  describe('config', () => {
    it('should mask header values', () => {
      const config = describeConfig({
        OTEL_EXPORTER_OTLP_HEADERS: 'authorization=Bearer%20test-token,x-tenant=acme',
      });
      expect(config.headers).toEqual({ authorization: '***', 'x-tenant': '***' });
    });

    it('should print the resolved configuration as JSON', async () => {
      const program = new Command().exitOverride();
      registerConfigCommand(program, { ...ctx, env: { OTEL_EXPORTER_OTLP_PROTOCOL: 'http/protobuf' } });

      await program.parseAsync(['config'], { from: 'user' });

      expect(output).toHaveLength(1);
      expect(JSON.parse(output[0] ?? '{}')).toMatchObject({
        protocol: 'http-protobuf',
        endpoint: 'http://localhost:4318',
        serviceName: 'unknown_service:node',
      });
    });
  });
});

describe('collectTag', () => {
  it('should append key=value pairs', () => {
    expect(collectTag('b=2', [['a', '1']])).toEqual([
      ['a', '1'],
      ['b', '2'],
    ]);
  });

  it('should reject a tag without a key', () => {
    expect(() => collectTag('=oops')).toThrow('Invalid tag "=oops". Expected key=value');
  });
});
