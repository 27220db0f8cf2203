import { randomUUID } from "node:crypto";
import { EventPriority, toErrorMessage } from "@monoweave/contracts";
import type { EventType, EventsConfig, MonorepoEvent } from "@monoweave/contracts";
import { createLogger } from "@monoweave/adapters";
import { BroadcastReceiver } from "./broadcast";
import { matchesFilter } from "./filters";
import type { EventFilter } from "./filters";
import { EventQueue } from "./priority-queue";

const log = createLogger("events");

const BATCH = 64;

export type EventHandler = (event: MonorepoEvent) => void | Promise<void>;

export interface Subscription {
  readonly id: string;
  readonly filter: EventFilter;
  unsubscribe(): boolean;
}

export interface EventBusStats {
  eventsEmitted: number;
  eventsProcessed: number;
  /** Gauge of current subscriptions. */
  activeSubscriptions: number;
  handlerInvocations: number;
  handlerErrors: number;
  overflowDrops: number;
  byType: Record<EventType, number>;
  byPriority: Record<EventPriority, number>;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

function zeroStats(activeSubscriptions: number): EventBusStats {
  return {
    eventsEmitted: 0,
    eventsProcessed: 0,
    activeSubscriptions,
    handlerInvocations: 0,
    handlerErrors: 0,
    overflowDrops: 0,
    byType: { config: 0, task: 0, changeset: 0, hook: 0, package: 0, filesystem: 0, workflow: 0 },
    byPriority: { [EventPriority.Low]: 0, [EventPriority.Normal]: 0, [EventPriority.High]: 0, [EventPriority.Critical]: 0 },
  };
}

interface Entry {
  id: string;
  filter: EventFilter;
  handler: EventHandler;
}

/**
 * In-process bus: emit enqueues by priority, process() delivers to every
 * subscription whose filter admits the event. Critical before High before
 * Normal before Low; FIFO within a priority.
 */
export class EventBus {
  private readonly queue: EventQueue;
  private readonly subscriptions = new Map<string, Entry>();
  private readonly receivers = new Set<BroadcastReceiver>();
  private counters: EventBusStats;
  private running = false;
  private loop?: Promise<void>;
  private wake?: () => void;

  constructor(private readonly config: EventsConfig = { queueCapacity: 10_000, broadcastBuffer: 256 }) {
    this.queue = new EventQueue(config.queueCapacity);
    this.counters = zeroStats(0);
  }

  get pending(): number {
    return this.queue.size;
  }

  /** Enqueues without waiting for handlers. */
  emit(event: MonorepoEvent): void {
    const dropped = this.queue.push(event);
    this.counters.eventsEmitted += 1;
    this.counters.byType[event.type] += 1;
    this.counters.byPriority[event.context.priority] += 1;

    if (dropped) {
      this.counters.overflowDrops += 1;
      log.warn("queue_overflow", {
        capacity: this.queue.capacity,
        dropped: `${dropped.type}/${dropped.kind}`,
        eventId: dropped.context.eventId,
      });
    }

    for (const receiver of this.receivers) {
      receiver.deliver(event);
    }
    this.wake?.();
  }

  subscribe(filter: EventFilter, handler: EventHandler): Subscription {
    const id = randomUUID();
    this.subscriptions.set(id, { id, filter, handler });
    this.counters.activeSubscriptions = this.subscriptions.size;
    return { id, filter, unsubscribe: () => this.unsubscribe(id) };
  }

  unsubscribe(id: string): boolean {
    const removed = this.subscriptions.delete(id);
    this.counters.activeSubscriptions = this.subscriptions.size;
    return removed;
  }

  /** Broadcast receiver seeing every emitted event from now on. */
  receiver(bufferSize = this.config.broadcastBuffer): BroadcastReceiver {
    const receiver = new BroadcastReceiver(bufferSize, (r) => this.receivers.delete(r));
    this.receivers.add(receiver);
    return receiver;
  }

  /** Delivers up to n queued events; returns how many were taken. */
  async process(n: number, options: ProcessOptions = {}): Promise<number> {
    let taken = 0;
    while (taken < n && !options.signal?.aborted) {
      const event = this.queue.pop();
      if (!event) { break; }
      taken += 1;
      await this.dispatch(event);
      this.counters.eventsProcessed += 1;
    }
    return taken;
  }

  async processAll(options: ProcessOptions = {}): Promise<number> {
    let total = 0;
    for (;;) {
      const taken = await this.process(BATCH, options);
      total += taken;
      if (taken === 0) { return total; }
    }
  }

  /** Drains the queue in the background until stop(). */
  start(): void {
    if (this.loop) { return; }
    this.running = true;
    this.loop = this.drainLoop().catch((error: unknown) => {
      log.error("event loop stopped", { error: toErrorMessage(error) });
    });
  }

  /** Stops the background loop after delivering whatever is still queued. */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.();
    await this.loop;
    this.loop = undefined;
    await this.processAll();
  }

  stats(): EventBusStats {
    return {
      ...this.counters,
      byType: { ...this.counters.byType },
      byPriority: { ...this.counters.byPriority },
    };
  }

  resetStats(): void {
    this.counters = zeroStats(this.subscriptions.size);
  }

  /** Drops queued events, subscriptions and receivers. */
  clear(): void {
    this.queue.clear();
    this.subscriptions.clear();
    for (const receiver of [...this.receivers]) { receiver.close(); }
    this.counters.activeSubscriptions = 0;
  }

  private async dispatch(event: MonorepoEvent) {
    for (const entry of [...this.subscriptions.values()]) {
      let admitted: boolean;
      try {
        admitted = matchesFilter(entry.filter, event);
      } catch (error) {
        this.counters.handlerErrors += 1;
        log.error("event filter failed", { subscription: entry.id, error: toErrorMessage(error) });
        continue;
      }
      if (!admitted) { continue; }

      this.counters.handlerInvocations += 1;
      try {
        await entry.handler(event);
      } catch (error) {
        this.counters.handlerErrors += 1;
        log.error("event handler failed", {
          subscription: entry.id,
          event: `${event.type}/${event.kind}`,
          error: toErrorMessage(error),
        });
      }
    }
  }

  private async drainLoop() {
    while (this.running) {
      if (this.queue.size === 0) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        this.wake = undefined;
        continue;
      }
      await this.process(BATCH);
    }
  }
}
