import type { EventPriority, EventType, MonorepoEvent } from "@monoweave/contracts";

export type EventFilter =
  | { kind: "all" }
  | { kind: "by-type"; type: EventType }
  | { kind: "by-source"; source: string }
  | { kind: "by-priority"; priority: EventPriority }
  | { kind: "and"; filters: EventFilter[] }
  | { kind: "or"; filters: EventFilter[] }
  | { kind: "not"; filter: EventFilter }
  | { kind: "custom"; predicate: (event: MonorepoEvent) => boolean };

export const EventFilters = {
  all: (): EventFilter => ({ kind: "all" }),
  byType: (type: EventType): EventFilter => ({ kind: "by-type", type }),
  bySource: (source: string): EventFilter => ({ kind: "by-source", source }),
  /** Events at or above the given priority. */
  byPriority: (priority: EventPriority): EventFilter => ({ kind: "by-priority", priority }),
  and: (...filters: EventFilter[]): EventFilter => ({ kind: "and", filters }),
  or: (...filters: EventFilter[]): EventFilter => ({ kind: "or", filters }),
  not: (filter: EventFilter): EventFilter => ({ kind: "not", filter }),
  custom: (predicate: (event: MonorepoEvent) => boolean): EventFilter => ({ kind: "custom", predicate }),
};

export function matchesFilter(filter: EventFilter, event: MonorepoEvent): boolean {
  switch (filter.kind) {
    case "all":
      return true;
    case "by-type":
      return event.type === filter.type;
    case "by-source":
      return event.context.source === filter.source;
    case "by-priority":
      return event.context.priority >= filter.priority;
    case "and":
      return filter.filters.every((f) => matchesFilter(f, event));
    case "or":
      return filter.filters.some((f) => matchesFilter(f, event));
    case "not":
      return !matchesFilter(filter.filter, event);
    case "custom":
      return filter.predicate(event);
  }
}
