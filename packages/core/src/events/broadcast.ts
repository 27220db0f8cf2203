import type { MonorepoEvent } from "@monoweave/contracts";

/**
 * Observer end of the bus broadcast. Holds at most `capacity` events; when a
 * slow consumer falls behind, the oldest are dropped and counted in `missed`.
 */
export class BroadcastReceiver implements AsyncIterable<MonorepoEvent> {
  private readonly buffer: MonorepoEvent[] = [];
  /** Pending receive() calls, oldest first; each gets its own event. */
  private readonly waiters: Array<(event: MonorepoEvent | undefined) => void> = [];
  private closed = false;
  missed = 0;

  constructor(
    readonly capacity: number,
    private readonly onClose: (receiver: BroadcastReceiver) => void = () => undefined,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Called by the bus for every emitted event. */
  deliver(event: MonorepoEvent): void {
    if (this.closed) { return; }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return;
    }
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.missed += 1;
    }
    this.buffer.push(event);
  }

  tryReceive(): MonorepoEvent | undefined {
    return this.buffer.shift();
  }

  /** Next event; undefined once the receiver is closed and drained. */
  receive(): Promise<MonorepoEvent | undefined> {
    const next = this.buffer.shift();
    if (next || this.closed) { return Promise.resolve(next); }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  drain(): MonorepoEvent[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  close(): void {
    if (this.closed) { return; }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<MonorepoEvent> {
    for (;;) {
      const event = await this.receive();
      if (!event) { return; }
      yield event;
    }
  }
}
