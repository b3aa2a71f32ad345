/**
 * Streaming Utilities
 *
 * `Channel` carries answer fragments from one producer to one consumer with a
 * bounded buffer: the producer waits while the buffer is full, and the
 * consumer cancelling (or breaking out of `for await`) aborts the producer's
 * signal so it can release the upstream completion stream.
 *
 * SSE helpers format `StreamEvent`s for the HTTP layer and parse them back.
 *
 * @module @docpilot/rag/generation/streaming
 */

import { AbortError } from '@docpilot/database';
import type { StreamEvent } from '../types';

// ============================================================================
// Channel
// ============================================================================

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export class Channel<T> implements AsyncIterable<T> {
  private readonly capacity: number;
  private readonly controller = new AbortController();
  private buffer: T[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;
  private consumer: Waiter<IteratorResult<T>> | null = null;
  private producers: Array<Waiter<void>> = [];
  private iterated = false;

  constructor(capacity = 16) {
    if (capacity < 1) throw new Error('Channel capacity must be at least 1');
    this.capacity = capacity;
  }

  /** A closed channel holding the given values */
  static of<T>(...values: T[]): Channel<T> {
    const channel = new Channel<T>(Math.max(1, values.length));
    channel.buffer.push(...values);
    channel.close();
    return channel;
  }

  /** Aborted once the consumer cancels */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Hand a value to the consumer, waiting for buffer space
   */
  async push(value: T): Promise<void> {
    while (true) {
      if (this.cancelled) throw new AbortError('Stream cancelled by consumer');
      if (this.closed) throw new Error('Cannot push to a closed channel');

      if (this.consumer) {
        const consumer = this.consumer;
        this.consumer = null;
        consumer.resolve({ value, done: false });
        return;
      }
      if (this.buffer.length < this.capacity) {
        this.buffer.push(value);
        return;
      }

      await new Promise<void>((resolve, reject) => {
        this.producers.push({ resolve, reject });
      });
    }
  }

  /** Producer finished; buffered values are still delivered */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settleConsumer();
  }

  /** Producer failed; the consumer sees the error after the buffered values */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    this.settleConsumer();
  }

  /** Consumer gives up; the producer's next push throws and its signal aborts */
  cancel(reason = 'Stream cancelled by consumer'): void {
    if (this.cancelled) return;
    this.controller.abort(new AbortError(reason));
    this.buffer = [];

    const producers = this.producers;
    this.producers = [];
    for (const producer of producers) producer.resolve();

    if (this.consumer) {
      const consumer = this.consumer;
      this.consumer = null;
      consumer.resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterated) {
      throw new Error('Channel can only be iterated once');
    }
    this.iterated = true;

    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<T>> => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.wakeProducer();
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }
    if (this.closed || this.cancelled) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.consumer = { resolve, reject };
    });
  }

  private wakeProducer(): void {
    this.producers.shift()?.resolve();
  }

  private settleConsumer(): void {
    if (!this.consumer || this.buffer.length > 0) return;

    const consumer = this.consumer;
    this.consumer = null;
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      consumer.reject(error);
    } else {
      consumer.resolve({ value: undefined, done: true });
    }
  }
}

// ============================================================================
// Server-Sent Events
// ============================================================================

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
};

/**
 * Event name and JSON payload for an SSE writer
 */
export function toSSEMessage(event: StreamEvent): { event: string; data: string } {
  return { event: event.type, data: JSON.stringify(event) };
}

export function formatSSEEvent(event: StreamEvent): string {
  const message = toSSEMessage(event);
  return `event: ${message.event}\ndata: ${message.data}\n\n`;
}

const STREAM_EVENT_TYPES = new Set(['route', 'citations', 'token', 'done', 'error']);

function isStreamEvent(value: unknown): value is StreamEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    STREAM_EVENT_TYPES.has(value.type)
  );
}

/**
 * Parse one SSE event block; null when it carries no stream event
 */
export function parseSSEEvent(block: string): StreamEvent | null {
  const data = block
    .split('\n')
    .filter((line) => line.startsWith('data:'))
    .map((line) => line.slice(5).trimStart())
    .join('\n');

  if (!data) return null;

  try {
    const parsed: unknown = JSON.parse(data);
    return isStreamEvent(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Split a complete SSE body into events
 */
export function parseSSEBody(body: string): StreamEvent[] {
  return body
    .split(/\n\n+/)
    .map(parseSSEEvent)
    .filter((event): event is StreamEvent => event !== null);
}
