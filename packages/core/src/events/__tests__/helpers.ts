import { EventPriority } from "@monoweave/contracts";
import type { MonorepoEvent } from "@monoweave/contracts";
import { createEvent } from "../factory";

/** A small event whose configPath doubles as a label. */
export function labelled(label: string, priority: EventPriority = EventPriority.Normal, source = "test"): MonorepoEvent {
  return createEvent({ type: "filesystem", kind: "config-file-changed", configPath: label }, { source, priority });
}

export function labelOf(event: MonorepoEvent): string {
  return event.type === "filesystem" && event.kind === "config-file-changed" ? event.configPath : `${event.type}/${event.kind}`;
}
