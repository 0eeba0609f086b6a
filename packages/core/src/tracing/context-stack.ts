/**
 * @spanline/core — Context Stack
 *
 * Tracks the current span per logical execution context. Each run() opens
 * a frame in AsyncLocalStorage, so concurrent async call chains never see
 * each other's spans. Code outside any run() shares the root frame, which
 * suits sequential scripts.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { SpanHandle } from './span.js';

// --- Internal Frame ---

interface ContextFrame {
  readonly spans: SpanHandle[];
}

function dropStopped(spans: SpanHandle[]): void {
  while (spans.length > 0 && !spans[spans.length - 1].isRecording()) {
    spans.pop();
  }
}

// --- ContextStack ---

export class ContextStack {
  private readonly storage = new AsyncLocalStorage<ContextFrame>();
  private readonly root: ContextFrame = { spans: [] };

  /** Make span the current span of the active frame. */
  push(span: SpanHandle): void {
    const spans = this.frame().spans;
    dropStopped(spans);
    spans.push(span);
  }

  /**
   * Remove span if, and only if, it is the current span. The next span
   * below it that is still open becomes current. Returns whether the
   * current pointer changed.
   */
  pop(span: SpanHandle): boolean {
    const spans = this.frame().spans;
    if (spans[spans.length - 1] !== span) return false;

    spans.pop();
    dropStopped(spans);
    return true;
  }

  /**
   * The newest span of the active frame that is still open. A span
   * stopped in another frame (e.g. inside withSpan) is skipped here.
   */
  current(): SpanHandle | undefined {
    const spans = this.frame().spans;
    dropStopped(spans);
    return spans[spans.length - 1];
  }

  /**
   * Run fn in a fresh frame. With a span, that span is current inside fn;
   * this is how a span is carried explicitly across concurrency
   * boundaries (worker callbacks, queued jobs, Promise.all branches).
   */
  run<T>(fn: () => T, span?: SpanHandle): T {
    const frame: ContextFrame = { spans: span ? [span] : [] };
    return this.storage.run(frame, fn);
  }

  /** Depth of the active frame. */
  depth(): number {
    return this.frame().spans.length;
  }

  private frame(): ContextFrame {
    return this.storage.getStore() ?? this.root;
  }
}
