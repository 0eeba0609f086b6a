/**
 * @spanline/core — OTLP/HTTP protobuf transport
 *
 * POST {endpoint}/v1/traces and {endpoint}/v1/logs with
 * Content-Type application/x-protobuf.
 */

import type pino from 'pino';
import { TransportError } from '../../types/index.js';
import type { SendOptions, SignalType, Transport } from './transport.js';

const SIGNAL_PATHS: Record<SignalType, string> = {
  traces: 'v1/traces',
  logs: 'v1/logs',
};

/** Status codes the OTLP/HTTP specification marks as retryable. */
const RETRYABLE_STATUS = new Set([429, 502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS.has(status);
}

export function signalUrl(endpoint: string, signal: SignalType): string {
  const base = endpoint.endsWith('/') ? endpoint : `${endpoint}/`;
  return new URL(SIGNAL_PATHS[signal], base).toString();
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  endpoint: string;
  headers?: Record<string, string>;
  logger: pino.Logger;
  /** Injected in tests; defaults to the global fetch. */
  fetch?: FetchFn;
}

export class HttpProtobufTransport implements Transport {
  readonly protocol = 'http-protobuf' as const;
  private readonly fetchFn: FetchFn;
  private closed = false;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async send(signal: SignalType, payload: Uint8Array, options: SendOptions): Promise<Uint8Array> {
    if (this.closed) {
      throw new TransportError('Transport is closed', 'TRANSPORT_CLOSED', false);
    }

    const url = signalUrl(this.options.endpoint, signal);
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const abort = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          ...this.options.headers,
          'Content-Type': 'application/x-protobuf',
        },
        body: payload,
        signal: abort,
      });
    } catch (err: unknown) {
      // Network failure or deadline: the collector may be restarting.
      throw new TransportError(
        `OTLP/HTTP request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        timeout.aborted ? 'EXPORT_TIMEOUT' : 'NETWORK_ERROR',
        !options.signal?.aborted,
        { url },
      );
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (err: unknown) {
      throw new TransportError(
        `OTLP/HTTP response from ${url} could not be read: ${err instanceof Error ? err.message : String(err)}`,
        timeout.aborted ? 'EXPORT_TIMEOUT' : 'NETWORK_ERROR',
        !options.signal?.aborted,
        { url, status: response.status },
      );
    }
    if (response.ok) return body;

    this.options.logger.debug({ url, status: response.status }, 'OTLP/HTTP export rejected');
    throw new TransportError(
      `OTLP/HTTP export to ${url} returned ${response.status}`,
      `HTTP_${response.status}`,
      isRetryableStatus(response.status),
      { url, status: response.status },
    );
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
