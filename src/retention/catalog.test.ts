import { describe, expect, it } from "vitest";
import { InMemoryStorageEngine } from "../storage/in-memory-engine.js";
import { snapshotName } from "../storage/types.js";
import { SnapshotCatalog } from "./catalog.js";

describe("SnapshotCatalog", () => {
  it("orders by creation time, then dataset, then label", async () => {
    const engine = new InMemoryStorageEngine()
      .addSnapshot("tank/b", "L2", 200)
      .addSnapshot("tank/b", "L1", 100)
      .addSnapshot("tank/a", "L3", 200)
      .addSnapshot("tank/a", "L2", 200)
      .addSnapshot("backup/x", "L9", 150);

    const catalog = await new SnapshotCatalog(engine).listAll();

    expect(catalog.map(snapshotName)).toEqual(["tank/b@L1", "backup/x@L9", "tank/a@L2", "tank/a@L3", "tank/b@L2"]);
  });

  it("returns an empty catalog when there are no snapshots", async () => {
    const catalog = await new SnapshotCatalog(new InMemoryStorageEngine()).listAll();
    expect(catalog).toEqual([]);
  });

  it("applies a dataset scope", async () => {
    const engine = new InMemoryStorageEngine().addSnapshot("tank/a", "L1", 1).addSnapshot("backup/a", "L1", 2);

    const catalog = await new SnapshotCatalog(engine).listAll((ds) => ds.startsWith("tank"));

    expect(catalog.map(snapshotName)).toEqual(["tank/a@L1"]);
  });

  it("is a frozen value that later listings do not change", async () => {
    const engine = new InMemoryStorageEngine().addSnapshot("tank/a", "L1", 1);
    const catalog = new SnapshotCatalog(engine);

    const first = await catalog.listAll();
    engine.addSnapshot("tank/a", "L2", 2);
    const second = await catalog.listAll();

    expect(Object.isFrozen(first)).toBe(true);
    expect(first).toHaveLength(1);
    expect(second).toHaveLength(2);
    expect(engine.listSnapshotsCalls).toBe(2);
  });

  it("propagates listing failures", async () => {
    const engine = new InMemoryStorageEngine();
    engine.failListSnapshots = true;

    await expect(new SnapshotCatalog(engine).listAll()).rejects.toThrow("pool is busy");
  });
});
