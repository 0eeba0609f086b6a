/**
 * @spanline/core — OTLP/gRPC transport
 *
 * Unary Export calls against the collector's TraceService and LogsService.
 * Payloads arrive already encoded, so the client uses identity
 * (de)serializers instead of generated stubs.
 */

import * as grpc from '@grpc/grpc-js';
import type pino from 'pino';
import { TransportError } from '../../types/index.js';
import type { SendOptions, SignalType, Transport } from './transport.js';

const SIGNAL_METHODS: Record<SignalType, string> = {
  traces: '/opentelemetry.proto.collector.trace.v1.TraceService/Export',
  logs: '/opentelemetry.proto.collector.logs.v1.LogsService/Export',
};

/** Status codes the OTLP/gRPC specification marks as retryable. */
const RETRYABLE_CODES = new Set<number>([
  grpc.status.CANCELLED,
  grpc.status.DEADLINE_EXCEEDED,
  grpc.status.RESOURCE_EXHAUSTED,
  grpc.status.ABORTED,
  grpc.status.OUT_OF_RANGE,
  grpc.status.UNAVAILABLE,
  grpc.status.DATA_LOSS,
]);

export function isRetryableGrpcCode(code: number): boolean {
  return RETRYABLE_CODES.has(code);
}

/** "http://collector:4317" -> "collector:4317"; the scheme picks the credentials. */
export function grpcTarget(endpoint: string): { address: string; secure: boolean } {
  const url = new URL(endpoint);
  const port = url.port || (url.protocol === 'https:' ? '443' : '4317');
  return { address: `${url.hostname}:${port}`, secure: url.protocol === 'https:' };
}

const identity = (value: Buffer): Buffer => value;

export interface GrpcTransportOptions {
  endpoint: string;
  metadata?: Record<string, string>;
  logger: pino.Logger;
}

export class GrpcTransport implements Transport {
  readonly protocol = 'grpc' as const;
  private readonly client: grpc.Client;
  private closed = false;

  constructor(private readonly options: GrpcTransportOptions) {
    const { address, secure } = grpcTarget(options.endpoint);
    const credentials = secure ? grpc.credentials.createSsl() : grpc.credentials.createInsecure();
    this.client = new grpc.Client(address, credentials);
  }

  send(signal: SignalType, payload: Uint8Array, options: SendOptions): Promise<Uint8Array> {
    if (this.closed) {
      return Promise.reject(new TransportError('Transport is closed', 'TRANSPORT_CLOSED', false));
    }

    const method = SIGNAL_METHODS[signal];
    const metadata = new grpc.Metadata();
    for (const [key, value] of Object.entries(this.options.metadata ?? {})) {
      metadata.set(key, value);
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const call = this.client.makeUnaryRequest<Buffer, Buffer>(
        method,
        identity,
        identity,
        Buffer.from(payload),
        metadata,
        { deadline: Date.now() + options.timeoutMs },
        (err, response) => {
          options.signal?.removeEventListener('abort', cancel);
          if (err) {
            this.options.logger.debug({ method, code: err.code }, 'OTLP/gRPC export failed');
            reject(
              new TransportError(
                `OTLP/gRPC export ${method} failed: ${err.details || err.message}`,
                `GRPC_${grpc.status[err.code] ?? err.code}`,
                isRetryableGrpcCode(err.code) && !options.signal?.aborted,
                { method, code: err.code },
              ),
            );
            return;
          }
          resolve(response ?? new Uint8Array(0));
        },
      );

      function cancel(): void {
        call.cancel();
      }
      options.signal?.addEventListener('abort', cancel, { once: true });
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.client.close();
  }
}
