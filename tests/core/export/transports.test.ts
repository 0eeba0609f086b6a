import { describe, it, expect } from 'vitest';
import pino from 'pino';
import * as grpc from '@grpc/grpc-js';
import {
  HttpProtobufTransport,
  InMemoryTransport,
  TransportError,
  createTransport,
  grpcTarget,
  isRetryableGrpcCode,
  isRetryableStatus,
  signalUrl,
  type FetchFn,
} from '@spanline/core';

const silentLogger = pino({ level: 'silent' });
const payload = Uint8Array.from([1, 2, 3]);

interface CapturedRequest {
  url: string;
  init: RequestInit;
}

function fakeFetch(respond: () => Response | Promise<Response>): { fetch: FetchFn; requests: CapturedRequest[] } {
  const requests: CapturedRequest[] = [];
  return {
    requests,
    fetch: async (url, init) => {
      requests.push({ url, init });
      return respond();
    },
  };
}

async function sendExpectingError(transport: HttpProtobufTransport): Promise<TransportError> {
  try {
    await transport.send('traces', payload, { timeoutMs: 1000 });
  } catch (err: unknown) {
    if (err instanceof TransportError) return err;
    throw err;
  }
  throw new Error('send() resolved');
}

describe('HTTP/protobuf transport', () => {
  describe('signalUrl', () => {
    it('should append the signal path to the endpoint', () => {
      expect(signalUrl('http://localhost:4318', 'traces')).toBe('http://localhost:4318/v1/traces');
      expect(signalUrl('http://localhost:4318/', 'logs')).toBe('http://localhost:4318/v1/logs');
    });

    it('should keep a path prefix on the endpoint', () => {
      expect(signalUrl('https://collector.example.com/otlp', 'traces')).toBe(
        'https://collector.example.com/otlp/v1/traces',
      );
    });
  });

  it('should POST the payload as application/x-protobuf', async () => {
    const { fetch, requests } = fakeFetch(() => new Response('ok', { status: 200 }));
    const transport = new HttpProtobufTransport({
      endpoint: 'http://localhost:4318',
      headers: { 'x-api-key': 'test-secret' },
      logger: silentLogger,
      fetch,
    });

    const response = await transport.send('logs', payload, { timeoutMs: 1000 });

    expect(Buffer.from(response).toString('utf-8')).toBe('ok');
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('http://localhost:4318/v1/logs');
    expect(requests[0]?.init.method).toBe('POST');
    expect(requests[0]?.init.headers).toEqual({
      'x-api-key': 'test-secret',
      'Content-Type': 'application/x-protobuf',
    });
    expect(requests[0]?.init.body).toBe(payload);
  });

  it('should mark 503 as retryable', async () => {
    const { fetch } = fakeFetch(() => new Response(null, { status: 503 }));
    const transport = new HttpProtobufTransport({ endpoint: 'http://localhost:4318', logger: silentLogger, fetch });
    const error = await sendExpectingError(transport);
    expect(error.code).toBe('HTTP_503');
    expect(error.retryable).toBe(true);
  });

  it('should mark 400 as permanent', async () => {
    const { fetch } = fakeFetch(() => new Response(null, { status: 400 }));
    const transport = new HttpProtobufTransport({ endpoint: 'http://localhost:4318', logger: silentLogger, fetch });
    const error = await sendExpectingError(transport);
    expect(error.code).toBe('HTTP_400');
    expect(error.retryable).toBe(false);
    expect(error.category).toBe('transport_error');
  });

  it('should treat network failures as retryable', async () => {
    const fetch: FetchFn = async () => {
      throw new TypeError('fetch failed');
    };
    const transport = new HttpProtobufTransport({ endpoint: 'http://localhost:4318', logger: silentLogger, fetch });
    const error = await sendExpectingError(transport);
    expect(error.code).toBe('NETWORK_ERROR');
    expect(error.retryable).toBe(true);
  });

  it('should treat a failed response body read as retryable', async () => {
    const { fetch } = fakeFetch(
      () =>
        new Response(
          new ReadableStream({
            pull(controller) {
              controller.error(new Error('socket hang up'));
            },
          }),
          { status: 200 },
        ),
    );
    const transport = new HttpProtobufTransport({ endpoint: 'http://localhost:4318', logger: silentLogger, fetch });
    const error = await sendExpectingError(transport);
    expect(error.code).toBe('NETWORK_ERROR');
    expect(error.retryable).toBe(true);
    expect(error.message).toMatch(/^OTLP\/HTTP response from http:\/\/localhost:4318\/v1\/traces could not be read: /);
  });

  it('should refuse to send after close()', async () => {
    const { fetch, requests } = fakeFetch(() => new Response(null, { status: 200 }));
    const transport = new HttpProtobufTransport({ endpoint: 'http://localhost:4318', logger: silentLogger, fetch });
    await transport.close();
    const error = await sendExpectingError(transport);
    expect(error.code).toBe('TRANSPORT_CLOSED');
    expect(requests).toHaveLength(0);
  });

  it('should classify retryable status codes', () => {
    expect([429, 502, 503, 504].every(isRetryableStatus)).toBe(true);
    expect([400, 401, 404, 500].some(isRetryableStatus)).toBe(false);
  });
});

describe('gRPC transport helpers', () => {
  it('should derive the target address and credentials from the endpoint', () => {
    expect(grpcTarget('http://localhost:4317')).toEqual({ address: 'localhost:4317', secure: false });
    expect(grpcTarget('https://collector.example.com')).toEqual({
      address: 'collector.example.com:443',
      secure: true,
    });
    expect(grpcTarget('http://collector')).toEqual({ address: 'collector:4317', secure: false });
  });

  it('should classify retryable status codes', () => {
    expect(isRetryableGrpcCode(grpc.status.UNAVAILABLE)).toBe(true);
    expect(isRetryableGrpcCode(grpc.status.DEADLINE_EXCEEDED)).toBe(true);
    expect(isRetryableGrpcCode(grpc.status.RESOURCE_EXHAUSTED)).toBe(true);
    expect(isRetryableGrpcCode(grpc.status.INVALID_ARGUMENT)).toBe(false);
    expect(isRetryableGrpcCode(grpc.status.UNAUTHENTICATED)).toBe(false);
  });

  it('should build a gRPC transport without connecting', async () => {
    const transport = createTransport({ protocol: 'grpc', endpoint: 'http://localhost:4317' }, silentLogger);
    expect(transport.protocol).toBe('grpc');
    await transport.close();
  });
});

describe('InMemoryTransport', () => {
  it('should record requests and fail on demand', async () => {
    const transport = new InMemoryTransport().failNext(1);

    await expect(transport.send('traces', payload, { timeoutMs: 10 })).rejects.toThrow('Simulated outage');
    await transport.send('traces', payload, { timeoutMs: 10 });

    expect(transport.attempts).toBe(2);
    expect(transport.payloads('traces')).toEqual([payload]);
    expect(transport.payloads('logs')).toEqual([]);
  });
});
