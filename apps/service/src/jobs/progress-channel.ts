import type { JobResult } from '@scriptforge/core';
import type { JobStreamEvent } from '@scriptforge/core/jobs';

export const DEFAULT_PROGRESS_CAPACITY = 1_000;

export interface ProgressChannelOptions {
  /** Maximum number of undelivered log lines held for a slow consumer. */
  readonly capacity?: number;
}

type Waiter = (result: IteratorResult<JobStreamEvent>) => void;

/**
 * Single-consumer queue of job events. Log lines beyond `capacity` push out the
 * oldest undelivered line; the terminal result is always delivered last.
 */
export class ProgressChannel implements AsyncIterable<JobStreamEvent> {
  private readonly capacity: number;
  private readonly buffer: JobStreamEvent[] = [];
  private waiter: Waiter | undefined;
  private closed = false;
  private detached = false;
  private droppedLines = 0;

  constructor(options: ProgressChannelOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_PROGRESS_CAPACITY);
  }

  get dropped(): number {
    return this.droppedLines;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  publishLog(line: string): void {
    if (this.closed || this.detached) {
      return;
    }
    this.deliver({ log: line });
  }

  close(result: JobResult): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.detached) {
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: result, done: false });
      return;
    }
    this.buffer.push(result);
  }

  [Symbol.asyncIterator](): AsyncIterator<JobStreamEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.detach();
        return { value: undefined, done: true };
      }
    };
  }

  private deliver(event: JobStreamEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: event, done: false });
      return;
    }
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedLines += 1;
    }
    this.buffer.push(event);
  }

  private next(): Promise<IteratorResult<JobStreamEvent>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed || this.detached) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private detach(): void {
    this.detached = true;
    this.buffer.length = 0;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: undefined, done: true });
    }
  }
}
