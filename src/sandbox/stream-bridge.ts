// Sandbay Stream Bridge - Push-style command output to a bounded, pull-style line sequence

import { stderrLine, warningLine } from '../core/stream-events.js';
import type { SandboxHandle } from './provider.js';

export const DEFAULT_QUEUE_CAPACITY = 10_000;

const CLOSED: unique symbol = Symbol('closed');
type Closed = typeof CLOSED;

/**
 * FIFO with a non-blocking bounded `offer` and an awaitable `take`.
 * Closing is a state, not a queued item, so the end marker can never be dropped.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | Closed) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when full or closed; never blocks. */
  offer(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /** Appends regardless of capacity. Reserved for control messages. */
  put(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(CLOSED);
    }
  }

  /** Resolves with the next item, or `undefined` once closed and drained. */
  async take(signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return this.items.shift();
    }
    if (this.closed) return undefined;
    signal?.throwIfAborted();

    const next = await new Promise<T | Closed>((resolve, reject) => {
      const waiter = (item: T | Closed) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(signal?.reason);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
    return next === CLOSED ? undefined : next;
  }
}

export type CommandOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; error: unknown }
  | { status: 'cancelled' };

/**
 * Background driver of one remote command. The outcome promise never
 * rejects; the bridge is closed whatever way the command ends.
 */
export class CommandTask {
  private readonly controller = new AbortController();
  private finished = false;
  readonly outcome: Promise<CommandOutcome>;

  constructor(handle: SandboxHandle, command: string, bridge: StreamBridge, timeoutMs: number) {
    this.outcome = this.drive(handle, command, bridge, timeoutMs);
  }

  get done(): boolean {
    return this.finished;
  }

  cancel(): void {
    if (this.finished || this.controller.signal.aborted) return;
    this.controller.abort();
  }

  private async drive(
    handle: SandboxHandle,
    command: string,
    bridge: StreamBridge,
    timeoutMs: number,
  ): Promise<CommandOutcome> {
    try {
      await handle.run(command, {
        timeoutMs,
        onStdout: bridge.onStdout,
        onStderr: bridge.onStderr,
        signal: this.controller.signal,
      });
      return { status: 'succeeded' };
    } catch (error) {
      if (this.controller.signal.aborted) return { status: 'cancelled' };
      return { status: 'failed', error };
    } finally {
      this.finished = true;
      bridge.close();
    }
  }
}

export interface StreamBridgeOptions {
  capacity?: number;
  requestId?: string;
  /** Called for every dropped line. */
  onDrop?: (dropped: number) => void;
}

/**
 * Two synchronous producers (stdout, stderr) feed one bounded queue; a single
 * consumer pulls trimmed, non-blank lines until the producer side closes.
 */
export class StreamBridge {
  private readonly queue: BoundedQueue<string>;
  private readonly requestId: string;
  private readonly onDrop?: (dropped: number) => void;
  private overflowAnnounced = false;
  private droppedCount = 0;
  private consumed = false;

  constructor(options: StreamBridgeOptions = {}) {
    this.queue = new BoundedQueue(options.capacity ?? DEFAULT_QUEUE_CAPACITY);
    this.requestId = options.requestId ?? '';
    this.onDrop = options.onDrop;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  readonly onStdout = (data: string): void => {
    this.enqueue(data);
  };

  readonly onStderr = (data: string): void => {
    const text = data.trim();
    if (text) this.enqueue(stderrLine(text));
  };

  /** Never blocks, never throws. Drops on overflow and announces the first drop once. */
  enqueue(line: string): void {
    if (this.queue.offer(line)) return;
    if (this.queue.isClosed) return;

    this.droppedCount++;
    this.onDrop?.(this.droppedCount);
    if (this.overflowAnnounced) return;

    this.overflowAnnounced = true;
    console.warn(
      `[${this.requestId}] Queue full (capacity=${this.queue.capacity}), dropping messages: consumer can't keep up`
    );
    this.queue.put(warningLine('Output buffer full, some messages may be dropped'));
  }

  close(): void {
    this.queue.close();
  }

  start(handle: SandboxHandle, command: string, timeoutMs: number): CommandTask {
    return new CommandTask(handle, command, this, timeoutMs);
  }

  /** Single-pass: a second call throws. */
  async *lines(signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    if (this.consumed) {
      throw new Error('StreamBridge lines() can only be consumed once');
    }
    this.consumed = true;

    while (true) {
      const line = await this.queue.take(signal);
      if (line === undefined) return;
      const trimmed = line.trim();
      if (trimmed) yield trimmed;
    }
  }
}
