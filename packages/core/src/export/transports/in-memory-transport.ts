/**
 * @spanline/core — In-memory transport
 *
 * Keeps every request it receives instead of sending it anywhere. Meant for
 * tests of instrumented code: pass it as `transport` to initialize() and
 * inspect the decoded batches afterwards. A failure plan makes the next N
 * sends throw, to exercise retry paths.
 */

import { TransportError } from '../../types/index.js';
import type { SendOptions, SignalType, Transport } from './transport.js';

export interface RecordedRequest {
  signal: SignalType;
  payload: Uint8Array;
  attempt: number;
}

export class InMemoryTransport implements Transport {
  readonly protocol = 'custom' as const;
  readonly requests: RecordedRequest[] = [];
  private pendingFailures: TransportError[] = [];
  private sendCount = 0;
  private closed = false;
  private delayMs = 0;

  /** Make the next `count` sends fail with the given error. */
  failNext(count: number, error = new TransportError('Simulated outage', 'SIMULATED', true)): this {
    for (let i = 0; i < count; i++) this.pendingFailures.push(error);
    return this;
  }

  /** Delay every send, to observe in-flight behaviour. */
  setLatency(delayMs: number): this {
    this.delayMs = delayMs;
    return this;
  }

  async send(signal: SignalType, payload: Uint8Array, options: SendOptions): Promise<Uint8Array> {
    if (this.closed) {
      throw new TransportError('Transport is closed', 'TRANSPORT_CLOSED', false);
    }
    this.sendCount++;

    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (options.signal?.aborted) {
      throw new TransportError('Send aborted', 'ABORTED', false);
    }

    const failure = this.pendingFailures.shift();
    if (failure) throw failure;

    this.requests.push({ signal, payload, attempt: this.sendCount });
    return new Uint8Array(0);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Total send() calls, failed ones included. */
  get attempts(): number {
    return this.sendCount;
  }

  payloads(signal: SignalType): Uint8Array[] {
    return this.requests.filter((r) => r.signal === signal).map((r) => r.payload);
  }
}
