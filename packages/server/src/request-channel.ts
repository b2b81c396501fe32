/**
 * One-receiver queue of captured request metadata.
 *
 * The server pushes a record after each response is written; a test pulls
 * them with recv() or `for await`. Records pushed before anyone waits are
 * buffered in the channel.
 */

import type { RequestRecord } from "./request.js";

interface Waiter {
  resolve: (record: RequestRecord) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class RequestChannelClosedError extends Error {
  constructor() {
    super("Request channel is closed");
    this.name = "RequestChannelClosedError";
  }
}

export class RequestChannel implements AsyncIterable<RequestRecord> {
  private queue: RequestRecord[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  /** Called by the server; ignored once the channel is closed */
  push(record: RequestRecord): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(record);
      return;
    }
    this.queue.push(record);
  }

  /**
   * Next record. Rejects after timeoutMs (when given) or when the channel
   * is closed with nothing left to deliver.
   */
  recv(timeoutMs?: number): Promise<RequestRecord> {
    const buffered = this.queue.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.closed) return Promise.reject(new RequestChannelClosedError());

    return new Promise<RequestRecord>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new Error(`No request received within ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Next buffered record without waiting */
  tryRecv(): RequestRecord | undefined {
    return this.queue.shift();
  }

  pending(): number {
    return this.queue.length;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(new RequestChannelClosedError());
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RequestRecord, void, undefined> {
    while (true) {
      try {
        yield await this.recv();
      } catch (err) {
        if (err instanceof RequestChannelClosedError) return;
        throw err;
      }
    }
  }
}
