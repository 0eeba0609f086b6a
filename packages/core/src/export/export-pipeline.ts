/**
 * @spanline/core — Export Pipeline
 *
 * configured → running → draining → stopped
 *
 * Enqueue is synchronous and never blocks: records go into bounded queues
 * (drop-new on overflow). A single flush runs at a time; it is triggered by
 * the interval timer, by a queue reaching the batch size, by forceFlush()
 * or by shutdown(). A timer tick that finds a flush in flight is skipped.
 * Each batch is sent with bounded exponential backoff and dropped (counted
 * as lost) once the attempts are used up. Nothing here throws to the caller.
 */

import type pino from 'pino';
import type { PipelineOptions } from '../config/schemas.js';
import type { FinishedSpan, LogRecord, TelemetrySink } from '../types/index.js';
import { TransportError } from '../types/index.js';
import { BoundedQueue } from './bounded-queue.js';
import type { OtlpSerializer } from './otlp-serializer.js';
import { withRetry } from './retry.js';
import type { SignalType, Transport } from './transports/transport.js';

// --- Types ---

export type PipelineState = 'uninitialized' | 'configured' | 'running' | 'draining' | 'stopped';

type FlushReason = 'timer' | 'batch-size' | 'manual' | 'shutdown';

export interface SignalStats {
  queued: number;
  exported: number;
  rejected: number;
  dropped: number;
  lost: number;
}

export interface PipelineStats {
  state: PipelineState;
  spans: SignalStats;
  logs: SignalStats;
  lostBatches: number;
  skippedTicks: number;
  discarded: number;
}

interface Counters {
  exported: number;
  rejected: number;
  lost: number;
}

export function isRetryableTransportError(error: unknown): boolean {
  return error instanceof TransportError && error.retryable;
}

// --- ExportPipeline ---

export class ExportPipeline implements TelemetrySink {
  private state: PipelineState = 'configured';
  private readonly spanQueue: BoundedQueue<FinishedSpan>;
  private readonly logQueue: BoundedQueue<LogRecord>;
  private readonly counters: Record<SignalType, Counters> = {
    traces: { exported: 0, rejected: 0, lost: 0 },
    logs: { exported: 0, rejected: 0, lost: 0 },
  };
  private readonly overflowWarned: Record<SignalType, boolean> = { traces: false, logs: false };
  private readonly abortController = new AbortController();
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private shutdownPromise?: Promise<void>;
  private lostBatches = 0;
  private skippedTicks = 0;
  private discarded = 0;

  constructor(
    private readonly serializer: OtlpSerializer,
    private readonly transport: Transport,
    private readonly options: PipelineOptions,
    private readonly logger: pino.Logger,
  ) {
    this.spanQueue = new BoundedQueue(options.maxQueueSize);
    this.logQueue = new BoundedQueue(options.maxQueueSize);
  }

  getState(): PipelineState {
    return this.state;
  }

  /** configured → running. Starts the flush timer; later calls are no-ops. */
  start(): void {
    if (this.state !== 'configured') return;
    this.state = 'running';

    this.timer = setInterval(() => this.onTick(), this.options.scheduledDelayMs);
    // The timer must not keep the host process alive.
    this.timer.unref();

    this.logger.debug(
      { protocol: this.transport.protocol, scheduledDelayMs: this.options.scheduledDelayMs },
      'Export pipeline running',
    );
  }

  enqueueSpan(span: FinishedSpan): void {
    this.accept('traces', this.spanQueue, span);
  }

  enqueueLog(record: LogRecord): void {
    this.accept('logs', this.logQueue, record);
  }

  /** Export everything queued so far. Resolves once the queues are empty. */
  async forceFlush(): Promise<void> {
    if (this.state !== 'running' && this.state !== 'draining') return;
    if (this.inFlight) await this.inFlight;
    await this.flush('manual');
  }

  /**
   * Stop the timer, make one final flush bounded by shutdownTimeoutMs, then
   * release the transport. Safe to call repeatedly and during a flush.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  getStats(): PipelineStats {
    return {
      state: this.state,
      spans: this.signalStats('traces', this.spanQueue),
      logs: this.signalStats('logs', this.logQueue),
      lostBatches: this.lostBatches,
      skippedTicks: this.skippedTicks,
      discarded: this.discarded,
    };
  }

  // --- Enqueue ---

  private accept<T>(signal: SignalType, queue: BoundedQueue<T>, item: T): void {
    if (this.state !== 'running' && this.state !== 'draining') {
      this.discarded++;
      return;
    }

    if (!queue.offer(item)) {
      if (!this.overflowWarned[signal]) {
        this.overflowWarned[signal] = true;
        this.logger.warn(
          { signal, maxQueueSize: this.options.maxQueueSize },
          'Export queue full, dropping new records',
        );
      }
      return;
    }

    if (this.state === 'running' && queue.size >= this.options.maxExportBatchSize && !this.inFlight) {
      void this.flush('batch-size');
    }
  }

  // --- Flush ---

  private onTick(): void {
    if (this.inFlight) {
      this.skippedTicks++;
      return;
    }
    if (this.spanQueue.size === 0 && this.logQueue.size === 0) return;
    void this.flush('timer');
  }

  private flush(reason: FlushReason): Promise<void> {
    if (this.inFlight) return this.inFlight;

    const run = this.drain(reason)
      .catch((err: unknown) => {
        this.logger.error({ reason, error: String(err) }, 'Unexpected export failure');
      })
      .finally(() => {
        this.inFlight = undefined;
      });
    this.inFlight = run;
    return run;
  }

  private async drain(reason: FlushReason): Promise<void> {
    const abort = this.abortController.signal;
    const max = this.options.maxExportBatchSize;

    while (!abort.aborted && (this.spanQueue.size > 0 || this.logQueue.size > 0)) {
      const spans = this.spanQueue.take(max);
      if (spans.length > 0) {
        await this.exportBatch('traces', spans.length, reason, () => this.serializer.encodeSpans(spans));
      }

      const logs = this.logQueue.take(max);
      if (logs.length > 0) {
        await this.exportBatch('logs', logs.length, reason, () => this.serializer.encodeLogs(logs));
      }
    }

    if (this.spanQueue.size === 0) this.overflowWarned.traces = false;
    if (this.logQueue.size === 0) this.overflowWarned.logs = false;
  }

  private async exportBatch(
    signal: SignalType,
    count: number,
    reason: FlushReason,
    encode: () => Uint8Array,
  ): Promise<void> {
    let payload: Uint8Array;
    try {
      payload = encode();
    } catch (err: unknown) {
      this.markLost(signal, count);
      this.logger.error({ signal, count, error: String(err) }, 'Failed to encode export batch');
      return;
    }

    const abort = this.abortController.signal;
    try {
      const response = await withRetry(
        () => this.transport.send(signal, payload, { timeoutMs: this.options.exportTimeoutMs, signal: abort }),
        {
          maxAttempts: this.options.maxAttempts,
          initialDelayMs: this.options.initialBackoffMs,
          maxDelayMs: this.options.maxBackoffMs,
          backoffMultiplier: this.options.backoffMultiplier,
          isRetryable: isRetryableTransportError,
          signal: abort,
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(
              { signal, count, attempt, delayMs, error: String(error) },
              'Export failed, retrying',
            );
          },
        },
      );
      this.recordSuccess(signal, count, response);
      this.logger.debug({ signal, count, reason }, 'Export batch sent');
    } catch (err: unknown) {
      this.markLost(signal, count);
      this.logger.warn({ signal, count, reason, error: String(err) }, 'Export batch dropped');
    }
  }

  private recordSuccess(signal: SignalType, count: number, response: Uint8Array): void {
    let rejected = 0;
    let errorMessage: string | undefined;
    try {
      ({ rejected, errorMessage } = this.serializer.decodeResponse(signal, response));
    } catch (err: unknown) {
      this.logger.debug({ signal, error: String(err) }, 'Could not decode export response');
    }

    const accepted = Math.max(0, count - rejected);
    this.counters[signal].exported += accepted;
    this.counters[signal].rejected += count - accepted;
    if (rejected > 0) {
      this.logger.warn({ signal, rejected, errorMessage }, 'Collector rejected part of the batch');
    }
  }

  private markLost(signal: SignalType, count: number): void {
    this.counters[signal].lost += count;
    this.lostBatches++;
  }

  // --- Shutdown ---

  private async doShutdown(): Promise<void> {
    if (this.state === 'stopped') return;
    const wasRunning = this.state === 'running';
    this.state = 'draining';

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    if (wasRunning) {
      const finalFlush = (async () => {
        if (this.inFlight) await this.inFlight;
        await this.flush('shutdown');
      })();

      const completed = await this.waitAtMost(finalFlush, this.options.shutdownTimeoutMs);
      if (!completed) {
        this.abortController.abort();
        const spans = this.spanQueue.clear();
        const logs = this.logQueue.clear();
        this.counters.traces.lost += spans;
        this.counters.logs.lost += logs;
        this.logger.warn(
          { timeoutMs: this.options.shutdownTimeoutMs, spans, logs },
          'Shutdown timed out, pending telemetry dropped',
        );
      }
    }

    try {
      await this.transport.close();
    } catch (err: unknown) {
      this.logger.warn({ error: String(err) }, 'Failed to close transport');
    }

    // Records that arrived after the final flush had nothing left to send them.
    const leftover = this.spanQueue.clear() + this.logQueue.clear();
    if (leftover > 0) {
      this.discarded += leftover;
      this.logger.debug({ count: leftover }, 'Records enqueued during shutdown discarded');
    }

    this.state = 'stopped';
    this.logger.debug(this.getStats(), 'Export pipeline stopped');
  }

  /** Resolves true if work settled within ms, false on timeout. */
  private waitAtMost(work: Promise<void>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    return Promise.race([work.then(() => true), timeout]).finally(() => clearTimeout(timer));
  }

  private signalStats<T>(signal: SignalType, queue: BoundedQueue<T>): SignalStats {
    return {
      queued: queue.size,
      exported: this.counters[signal].exported,
      rejected: this.counters[signal].rejected,
      dropped: queue.dropped,
      lost: this.counters[signal].lost,
    };
  }
}
