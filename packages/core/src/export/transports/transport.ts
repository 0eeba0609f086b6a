/**
 * @spanline/core — Transport contract
 *
 * A transport moves one encoded OTLP request to the collector and returns
 * the encoded response. Failures are reported as TransportError; the
 * `retryable` flag tells the pipeline whether to back off and resend.
 */

import type { OtlpProtocol } from '../../types/index.js';

export type SignalType = 'traces' | 'logs';

export interface SendOptions {
  /** Per-request deadline in ms. */
  timeoutMs: number;
  /** Fires when the pipeline gives up (shutdown timeout). */
  signal?: AbortSignal;
}

export interface Transport {
  readonly protocol: OtlpProtocol | 'custom';
  send(signal: SignalType, payload: Uint8Array, options: SendOptions): Promise<Uint8Array>;
  close(): Promise<void>;
}
