/**
 * Terminal event source
 *
 * Collects input chunks and resize notifications into one ordered queue.
 * The event loop awaits `next()` once per iteration; everything that
 * arrived in the meantime waits in the queue until the previous event has
 * been handled.
 */

import type { EventEmitter } from 'events';
import { StringDecoder } from 'string_decoder';
import type { TerminalEvent } from '../shared/types.js';
import { decodeInput } from './keys.js';

/** stdin, or anything that emits `data` and `end` like it. */
export interface InputStream extends EventEmitter {
  resume(): unknown;
  pause(): unknown;
}

/** stdout, or anything that emits `resize` and reports its size like it. */
export interface ResizableOutput extends EventEmitter {
  columns?: number;
  rows?: number;
}

export const DEFAULT_COLUMNS = 80;
export const DEFAULT_ROWS = 24;

export function outputSize(output: ResizableOutput): { columns: number; rows: number } {
  return {
    columns: output.columns ?? DEFAULT_COLUMNS,
    rows: output.rows ?? DEFAULT_ROWS,
  };
}

export class TerminalEventSource {
  private readonly queue: TerminalEvent[] = [];
  private waiting: ((event: TerminalEvent) => void) | undefined;
  private readonly decoder = new StringDecoder('utf8');
  private closed = false;

  private readonly onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    for (const event of decodeInput(text)) {
      this.push(event);
    }
  };

  private readonly onResize = (): void => {
    this.push({ type: 'resize', ...outputSize(this.output) });
  };

  private readonly onEnd = (): void => {
    this.close();
  };

  private readonly onAbort = (): void => {
    this.close();
  };

  constructor(
    private readonly input: InputStream,
    private readonly output: ResizableOutput,
    private readonly signal?: AbortSignal
  ) {
    input.on('data', this.onData);
    input.on('end', this.onEnd);
    output.on('resize', this.onResize);
    input.resume();

    if (signal?.aborted) {
      this.close();
    } else {
      signal?.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  /**
   * Resolve with the next event. After `close()` (or end of input) queued
   * events still drain first, then every call yields `closed`.
   */
  next(): Promise<TerminalEvent> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve({ type: 'closed' });
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /** Stop listening and release the input stream. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.output.off('resize', this.onResize);
    this.signal?.removeEventListener('abort', this.onAbort);
    this.input.pause();

    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.({ type: 'closed' });
  }

  private push(event: TerminalEvent): void {
    if (this.closed) return;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting(event);
    } else {
      this.queue.push(event);
    }
  }
}
