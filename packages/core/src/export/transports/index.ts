import type pino from 'pino';
import type { OtlpProtocol } from '../../types/index.js';
import { GrpcTransport } from './grpc-transport.js';
import { HttpProtobufTransport } from './http-transport.js';
import type { Transport } from './transport.js';

export interface TransportConfig {
  protocol: OtlpProtocol;
  endpoint: string;
  headers?: Record<string, string>;
}

export function createTransport(config: TransportConfig, logger: pino.Logger): Transport {
  switch (config.protocol) {
    case 'grpc':
      return new GrpcTransport({ endpoint: config.endpoint, metadata: config.headers, logger });
    case 'http-protobuf':
      return new HttpProtobufTransport({ endpoint: config.endpoint, headers: config.headers, logger });
  }
}

export type { SendOptions, SignalType, Transport } from './transport.js';
export { GrpcTransport, grpcTarget, isRetryableGrpcCode } from './grpc-transport.js';
export { HttpProtobufTransport, isRetryableStatus, signalUrl, type FetchFn } from './http-transport.js';
export { InMemoryTransport, type RecordedRequest } from './in-memory-transport.js';
