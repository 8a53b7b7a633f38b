import { DEFAULT_STREAM_CAPACITY } from '../../config/env-config.js';

/**
 * Bounded single-producer/single-consumer queue. `send` resolves as soon as
 * there is room; when the consumer stops iterating early the channel is
 * cancelled and pending or later sends resolve to false.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private closedFlag = false;
  private cancelledFlag = false;
  private wakeReader: (() => void) | null = null;
  private wakeWriter: (() => void) | null = null;

  constructor(readonly capacity: number = DEFAULT_STREAM_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`event channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  get size(): number {
    return this.buffer.length;
  }

  async send(value: T): Promise<boolean> {
    if (this.closedFlag) {
      throw new Error('send on closed event channel');
    }
    while (this.buffer.length >= this.capacity && !this.cancelledFlag) {
      await new Promise<void>((resolve) => {
        this.wakeWriter = resolve;
      });
    }
    if (this.cancelledFlag) {
      return false;
    }
    this.buffer.push(value);
    this.notifyReader();
    return true;
  }

  close(): void {
    this.closedFlag = true;
    this.notifyReader();
  }

  cancel(): void {
    this.cancelledFlag = true;
    this.buffer.length = 0;
    this.notifyWriter();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    let drained = false;
    try {
      while (true) {
        if (this.buffer.length > 0) {
          const [value] = this.buffer.splice(0, 1);
          this.notifyWriter();
          yield value;
          continue;
        }
        if (this.closedFlag || this.cancelledFlag) {
          drained = true;
          return;
        }
        await new Promise<void>((resolve) => {
          this.wakeReader = resolve;
        });
      }
    } finally {
      if (!drained) {
        this.cancel();
      }
    }
  }

  private notifyReader(): void {
    const wake = this.wakeReader;
    this.wakeReader = null;
    wake?.();
  }

  private notifyWriter(): void {
    const wake = this.wakeWriter;
    this.wakeWriter = null;
    wake?.();
  }
}

/**
 * Holds at most one terminal error. Sealed when the event channel closes;
 * reports after that are refused.
 */
export class ErrorSlot {
  private error: Error | undefined;
  private sealedFlag = false;
  private resolveSettled: ((error: Error | undefined) => void) | null = null;
  readonly settled: Promise<Error | undefined>;

  constructor() {
    this.settled = new Promise<Error | undefined>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get current(): Error | undefined {
    return this.error;
  }

  get sealed(): boolean {
    return this.sealedFlag;
  }

  report(error: Error): boolean {
    if (this.sealedFlag || this.error) {
      return false;
    }
    this.error = error;
    return true;
  }

  seal(): void {
    if (this.sealedFlag) {
      return;
    }
    this.sealedFlag = true;
    const resolve = this.resolveSettled;
    this.resolveSettled = null;
    resolve?.(this.error);
  }
}

export interface StreamChannels {
  events: EventChannel<string>;
  errors: ErrorSlot;
}

export interface CollectedStream {
  events: string[];
  error?: Error;
}

/** Drains a stream completely; mostly for tests and the CLI. */
export async function collectStream(channels: StreamChannels): Promise<CollectedStream> {
  const events: string[] = [];
  for await (const event of channels.events) {
    events.push(event);
  }
  const error = await channels.errors.settled;
  return error ? { events, error } : { events };
}
