import { EventPriority } from "@monoweave/contracts";
import type { MonorepoEvent } from "@monoweave/contracts";

/** Highest priority first. */
const ORDER: readonly EventPriority[] = [EventPriority.Critical, EventPriority.High, EventPriority.Normal, EventPriority.Low];

/**
 * One FIFO bucket per priority. Past capacity, push still accepts the event
 * and drops the oldest entry of the lowest non-empty bucket instead.
 */
export class EventQueue {
  private readonly buckets = new Map<EventPriority, MonorepoEvent[]>(ORDER.map((p) => [p, []]));
  private count = 0;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.count;
  }

  /** Returns the event dropped to make room, if any. */
  push(event: MonorepoEvent): MonorepoEvent | undefined {
    this.bucket(event.context.priority).push(event);
    this.count += 1;
    if (this.count <= this.capacity) { return undefined; }

    for (const priority of [...ORDER].reverse()) {
      const dropped = this.bucket(priority).shift();
      if (dropped) {
        this.count -= 1;
        return dropped;
      }
    }
    return undefined;
  }

  pop(): MonorepoEvent | undefined {
    for (const priority of ORDER) {
      const event = this.bucket(priority).shift();
      if (event) {
        this.count -= 1;
        return event;
      }
    }
    return undefined;
  }

  clear(): void {
    for (const bucket of this.buckets.values()) { bucket.length = 0; }
    this.count = 0;
  }

  private bucket(priority: EventPriority): MonorepoEvent[] {
    let bucket = this.buckets.get(priority);
    if (!bucket) {
      bucket = [];
      this.buckets.set(priority, bucket);
    }
    return bucket;
  }
}
