import { describe, it, expect } from "vitest";
import { EventPriority, MonoweaveError } from "@monoweave/contracts";
import { createEvent, parseEvent, serializeEvent } from "../factory";

function capture(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("event factory", () => {
  it("should fill in the context", () => {
    const event = createEvent(
      { type: "package", kind: "updated", packageName: "core", oldVersion: "1.0.0", newVersion: "1.1.0" },
      { source: "versioning", metadata: { run: 7 } },
    );

    expect(event.context).toMatchObject({ source: "versioning", priority: EventPriority.Normal, metadata: { run: 7 } });
    expect(event.context.eventId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(Number.isNaN(Date.parse(event.context.timestamp))).toBe(false);
  });

  it("should parse what it serializes", () => {
    const event = createEvent(
      { type: "changeset", kind: "applied", changesets: ["cs-1"], packages: ["core"] },
      { source: "cli", priority: EventPriority.High },
    );

    expect(parseEvent(serializeEvent(event))).toEqual(event);
  });

  it("should reject text that is not an event", () => {
    const notJson = capture(() => parseEvent("{"));
    const unknownKind = capture(() =>
      parseEvent(
        JSON.stringify({
          type: "task",
          kind: "exploded",
          context: {
            eventId: "00000000-0000-4000-8000-000000000000",
            timestamp: "2026-01-01T00:00:00.000Z",
            source: "x",
            priority: 1,
            metadata: {},
          },
        }),
      ),
    );

    expect(notJson).toBeInstanceOf(MonoweaveError);
    expect(notJson).toMatchObject({ code: "ERR_EVENT_INVALID", message: "Event is not valid JSON" });
    expect(unknownKind).toMatchObject({ code: "ERR_EVENT_INVALID", message: "Event does not match any known event shape" });
  });
});
