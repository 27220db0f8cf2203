import { describe, it, expect, beforeAll } from "vitest";
import { ChangesetError } from "@monoweave/contracts";
import type { Changeset } from "@monoweave/contracts";
import { MemoryFileSystem, setLogLevel } from "@monoweave/adapters";
import { ChangesetStore, changesetFileName, matchesChangesetFilter } from "../store";

const FIRST = "11111111-1111-4111-8111-111111111111";
const SECOND = "22222222-2222-4222-8222-222222222222";

function changeset(overrides: Partial<Changeset> = {}): Changeset {
  return {
    id: FIRST,
    package: "@acme/core",
    bump: "minor",
    description: "Add retry support",
    branch: "feature/retry",
    environments: ["staging"],
    author: "dev@example.com",
    createdAt: "2026-03-01T10:00:00.000Z",
    status: "pending",
    ...overrides,
  };
}

async function capture(work: () => Promise<unknown>): Promise<unknown> {
  try {
    await work();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("ChangesetStore", () => {
  beforeAll(() => {
    setLogLevel("silent");
  });

  it("should name files by creation time, branch and short id", () => {
    expect(changesetFileName(changeset())).toBe("1772359200000-feature-retry-11111111.json");
    expect(changesetFileName(changeset({ branch: "" }))).toBe("1772359200000-detached-11111111.json");
  });

  it("should save changesets as JSON under the configured directory", async () => {
    const fs = new MemoryFileSystem();
    const store = new ChangesetStore(fs, "/repo", ".changesets");

    const path = await store.save(changeset());

    expect(path).toBe("/repo/.changesets/1772359200000-feature-retry-11111111.json");
    expect(JSON.parse(await fs.readFile(path))).toEqual(changeset());
    expect(await store.load(FIRST)).toEqual(changeset());
    expect(await store.load(SECOND)).toBeUndefined();
  });

  it("should list newest first and apply filters", async () => {
    const fs = new MemoryFileSystem();
    const store = new ChangesetStore(fs, "/repo", ".changesets");
    await store.save(changeset());
    await store.save(changeset({ id: SECOND, package: "@acme/web", createdAt: "2026-03-02T10:00:00.000Z", status: "applied" }));

    expect((await store.list()).map((c) => c.id)).toEqual([SECOND, FIRST]);
    expect((await store.list({ status: "pending" })).map((c) => c.id)).toEqual([FIRST]);
    expect((await store.list({ package: "@acme/web" })).map((c) => c.id)).toEqual([SECOND]);
    expect(await store.list({ environment: "production" })).toEqual([]);
  });

  it("should list nothing before the directory exists", async () => {
    const store = new ChangesetStore(new MemoryFileSystem(), "/repo", ".changesets");

    expect(await store.list()).toEqual([]);
  });

  it("should rewrite a changeset in place when its status changes", async () => {
    const fs = new MemoryFileSystem();
    const store = new ChangesetStore(fs, "/repo", ".changesets");
    await store.save(changeset());
    await store.save(changeset({ status: "applied", appliedAt: "2026-03-03T10:00:00.000Z" }));

    expect(await fs.walk("/repo/.changesets")).toEqual(["1772359200000-feature-retry-11111111.json"]);
    expect((await store.load(FIRST))?.status).toBe("applied");
  });

  it("should remove changesets by id", async () => {
    const fs = new MemoryFileSystem();
    const store = new ChangesetStore(fs, "/repo", ".changesets");
    await store.save(changeset());

    expect(await store.remove(FIRST)).toBe(true);
    expect(await store.remove(FIRST)).toBe(false);
    expect(await fs.exists("/repo/.changesets/1772359200000-feature-retry-11111111.json")).toBe(false);
  });

  it("should reject files that are not changesets", async () => {
    const fs = MemoryFileSystem.fromTree("/repo", {
      ".changesets/1-main-broken.json": "{ not json",
    });
    const store = new ChangesetStore(fs, "/repo", ".changesets");

    const error = await capture(() => store.list());

    expect(error).toBeInstanceOf(ChangesetError);
    expect(error).toMatchObject({
      code: "ERR_CHANGESET_STORAGE",
      message: "/repo/.changesets/1-main-broken.json is not valid JSON",
    });

    await fs.writeFile("/repo/.changesets/1-main-broken.json", JSON.stringify({ ...changeset(), bump: "huge" }));

    expect(await capture(() => store.list())).toMatchObject({ code: "ERR_CHANGESET_STORAGE" });
  });

  it("should match every filter field", () => {
    const cs = changeset();

    expect(matchesChangesetFilter(cs, {})).toBe(true);
    expect(matchesChangesetFilter(cs, { branch: "feature/retry", author: "dev@example.com", environment: "staging" })).toBe(true);
    expect(matchesChangesetFilter(cs, { branch: "main" })).toBe(false);
    expect(matchesChangesetFilter(cs, { author: "ops@example.com" })).toBe(false);
  });
});
