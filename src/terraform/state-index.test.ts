import { describe, it, expect } from "vitest";
import { StateIndex } from "./state-index.js";
import { InMemoryStateStore, MemoryTransport, createTestLogger } from "../../test/fakes.js";

describe("StateIndex", () => {
  it("answers from the snapshot", async () => {
    const index = await StateIndex.snapshot(new InMemoryStateStore(["module.a.main"]));

    expect(index.contains("module.a.main")).toBe(true);
    expect(index.contains("module.b.main")).toBe(false);
    expect(index.snapshotSize).toBe(1);
    expect(index.isSnapshotEmpty()).toBe(false);
  });

  it("adds recorded addresses to an overlay without touching the snapshot", () => {
    const index = StateIndex.fromAddresses(["module.a.main"]);

    index.record("module.b.main");
    index.record("module.a.main");

    expect(index.contains("module.b.main")).toBe(true);
    expect(index.snapshotSize).toBe(1);
    expect(index.size).toBe(2);
  });

  it("does not re-query the store", async () => {
    const store = new InMemoryStateStore();
    const index = await StateIndex.snapshot(store);

    store.addresses.add("module.late.main");

    expect(index.contains("module.late.main")).toBe(false);
    expect(store.listCalls).toBe(1);
  });

  it("falls back to an empty snapshot when listing fails", async () => {
    const store = new InMemoryStateStore(["module.a.main"]);
    store.listError = "Error: Failed to load state";
    const logs = new MemoryTransport();

    const index = await StateIndex.snapshot(store, createTestLogger(logs));

    expect(index.isSnapshotEmpty()).toBe(true);
    expect(index.snapshotFailed).toBe(true);
    expect(logs.messages("warn")).toEqual([
      "Could not list Terraform state; treating it as empty: Error: Failed to load state",
    ]);
  });
});
