import { randomUUID } from "node:crypto";
import { EventPriority, MonoweaveError, monorepoEventSchema } from "@monoweave/contracts";
import type { EventContext, MonorepoEvent } from "@monoweave/contracts";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event without its context; createEvent fills that in. */
export type EventInit = DistributiveOmit<MonorepoEvent, "context">;

export interface EventOptions {
  source: string;
  priority?: EventPriority;
  metadata?: Record<string, unknown>;
}

export function createEventContext(options: EventOptions): EventContext {
  return {
    eventId: randomUUID(),
    timestamp: new Date().toISOString(),
    source: options.source,
    priority: options.priority ?? EventPriority.Normal,
    metadata: options.metadata ?? {},
  };
}

export function createEvent(init: EventInit, options: EventOptions): MonorepoEvent {
  return { ...init, context: createEventContext(options) };
}

export function serializeEvent(event: MonorepoEvent): string {
  return JSON.stringify(event);
}

export function parseEvent(text: string): MonorepoEvent {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MonoweaveError("events", "ERR_EVENT_INVALID", "Event is not valid JSON", { cause: error });
  }
  const parsed = monorepoEventSchema.safeParse(json);
  if (!parsed.success) {
    throw new MonoweaveError("events", "ERR_EVENT_INVALID", "Event does not match any known event shape", {
      context: { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
    });
  }
  return parsed.data;
}
