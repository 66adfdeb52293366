import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { InMemoryStorageEngine } from "../storage/in-memory-engine.js";
import { SnapshotCatalog } from "./catalog.js";
import { SpaceEvictor } from "./evictor.js";
import { SnapshotReaper } from "./reaper.js";
import { SpaceGauge } from "./space-gauge.js";
import { DeletionThrottle } from "./throttle.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), debug: vi.fn(), error: vi.fn() },
}));

const DEGRADED =
  "Couldn't free up enough space by deleting old snapshots. Consider freeing some space as pool performance may be degraded.";

/** A ceiling later than every snapshot used here, so age never blocks eviction. */
const FAR_FUTURE = 10_000_000_000;

function evictorFor(engine: InMemoryStorageEngine, settleDelayMs = 0) {
  return new SpaceEvictor({
    gauge: new SpaceGauge(engine, "ds"),
    catalog: new SnapshotCatalog(engine),
    reaper: new SnapshotReaper(engine, new DeletionThrottle(4)),
    settleDelayMs,
  });
}

function policy(minFreeSpaceGb: number, maxAgeCeiling = FAR_FUTURE) {
  return { minFreeSpaceGb, maxAgeCeiling, maxAgeDays: 30 };
}

describe("SpaceEvictor", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("does nothing when free space already meets the floor", async () => {
    const engine = new InMemoryStorageEngine().setFreeSpace("ds", 250).addSnapshot("ds/a", "L1", 100, 10);

    const report = await evictorFor(engine).evict(policy(200));

    expect(report).toEqual({
      stopReason: "adequate",
      finalAvailableGb: 250,
      degraded: false,
      tally: { destroyed: [], absent: [], failed: [] },
    });
    expect(engine.listSnapshotsCalls).toBe(0);
    expect(engine.has("ds/a@L1")).toBe(true);
  });

  it("deletes only the oldest snapshot when that is enough", async () => {
    const engine = new InMemoryStorageEngine()
      .setFreeSpace("ds", 150)
      .addSnapshot("ds/a", "L1", 100, 100)
      .addSnapshot("ds/a", "L2", 9_999_999_999, 100);

    const report = await evictorFor(engine).evict(policy(200));

    expect(engine.destroyed).toEqual(["ds/a@L1"]);
    expect(engine.has("ds/a@L2")).toBe(true);
    expect(report.stopReason).toBe("goal-met");
    expect(report.finalAvailableGb).toBe(250);
    expect(report.degraded).toBe(false);
    expect(logger.info).toHaveBeenCalledWith("Adequate free space achieved.");
  });

  it("refuses to delete anything newer than the age ceiling", async () => {
    const engine = new InMemoryStorageEngine()
      .setFreeSpace("ds", 50)
      .addSnapshot("ds/a", "L1", 2000, 100)
      .addSnapshot("ds/a", "L2", 3000, 100);

    const report = await evictorFor(engine).evict(policy(200, 1000));

    expect(engine.destroyed).toEqual([]);
    expect(report.stopReason).toBe("age-ceiling");
    expect(report.degraded).toBe(true);
    expect(logger.info).toHaveBeenCalledWith("Minimum 30 days to keep exceeded.");
    expect(logger.warn).toHaveBeenCalledWith(DEGRADED);
    expect(logger.warn).toHaveBeenCalledWith("Free space: 50G");
  });

  it("stops at the age ceiling after deleting everything older", async () => {
    const engine = new InMemoryStorageEngine()
      .setFreeSpace("ds", 0)
      .addSnapshot("ds/a", "L1", 500, 10)
      .addSnapshot("ds/a", "L2", 1000, 10)
      .addSnapshot("ds/a", "L3", 1001, 10);

    const report = await evictorFor(engine).evict(policy(200, 1000));

    expect(engine.destroyed).toEqual(["ds/a@L1", "ds/a@L2"]);
    expect(report.stopReason).toBe("age-ceiling");
    expect(report.finalAvailableGb).toBe(20);
  });

  it("exhausts the catalog and warns when the floor is out of reach", async () => {
    const engine = new InMemoryStorageEngine()
      .setFreeSpace("ds", 10)
      .addSnapshot("ds/a", "L1", 100, 10)
      .addSnapshot("ds/a", "L2", 200, 10)
      .addSnapshot("ds/b", "L1", 300, 10);

    const report = await evictorFor(engine).evict(policy(200));

    expect(engine.remaining()).toEqual([]);
    expect(report.stopReason).toBe("exhausted");
    expect(report.tally.destroyed).toEqual(["ds/a@L1", "ds/a@L2", "ds/b@L1"]);
    expect(report.finalAvailableGb).toBe(40);
    expect(report.degraded).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Free space: 40G");
  });

  it("re-polls space once per distinct creation time", async () => {
    const engine = new InMemoryStorageEngine()
      .setFreeSpace("ds", 100)
      .addSnapshot("ds/a", "L1", 100, 30)
      .addSnapshot("ds/b", "L1", 100, 30)
      .addSnapshot("ds/a", "L2", 200, 30)
      .addSnapshot("ds/a", "L3", 300, 30);

    const report = await evictorFor(engine).evict(policy(150));

    // The whole first group goes before the next reading shows 160G.
    expect(engine.destroyed.sort()).toEqual(["ds/a@L1", "ds/b@L1"]);
    expect(report.stopReason).toBe("goal-met");
    // initial reading, the group boundary at 200, and the final check
    expect(engine.availableSpaceCalls).toBe(3);
  });

  it("does not re-poll inside a single timestamp group", async () => {
    const engine = new InMemoryStorageEngine().setFreeSpace("ds", 10);
    for (const ds of ["ds/a", "ds/b", "ds/c", "ds/d", "ds/e"]) {
      engine.addSnapshot(ds, "L1", 100, 0);
    }

    const report = await evictorFor(engine).evict(policy(200));

    expect(report.tally.destroyed).toHaveLength(5);
    expect(engine.availableSpaceCalls).toBe(2);
  });

  it("never dispatches a newer group before an older group has finished", async () => {
    const engine = new InMemoryStorageEngine().setFreeSpace("ds", 0);
    const delays: Record<string, number> = {};
    for (const [i, ds] of ["ds/a", "ds/b", "ds/c"].entries()) {
      engine.addSnapshot(ds, "old", 100, 0);
      engine.addSnapshot(ds, "new", 200, 0);
      // Earlier members of each group take longer, so they finish out of order.
      delays[`${ds}@old`] = 6 - i * 2;
      delays[`${ds}@new`] = 6 - i * 2;
    }
    engine.destroyGate = (name) => new Promise<void>((r) => setTimeout(r, delays[name] ?? 0));

    await evictorFor(engine).evict(policy(200));

    const oldGroup = engine.destroyed.slice(0, 3);
    const newGroup = engine.destroyed.slice(3);
    expect(oldGroup.every((name) => name.endsWith("@old"))).toBe(true);
    expect(newGroup.every((name) => name.endsWith("@new"))).toBe(true);
  });

  it("treats an unreadable gauge as below the floor", async () => {
    const engine = new InMemoryStorageEngine()
      .setFreeSpace("ds", 500)
      .addSnapshot("ds/a", "L1", 100, 10)
      .addSnapshot("ds/a", "L2", 2000, 10);
    engine.failAvailableSpace = true;

    const report = await evictorFor(engine).evict(policy(200, 1000));

    expect(engine.destroyed).toEqual(["ds/a@L1"]);
    expect(report.stopReason).toBe("age-ceiling");
    expect(report.finalAvailableGb).toBeNull();
    expect(report.degraded).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Free space: unknown");
  });

  it("warns when there are no snapshots to delete", async () => {
    const engine = new InMemoryStorageEngine().setFreeSpace("ds", 10);

    const report = await evictorFor(engine).evict(policy(200));

    expect(report.stopReason).toBe("no-snapshots");
    expect(report.degraded).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      "No snapshots found. Consider freeing some space as pool performance may be degraded.",
    );
  });

  it("reports a catalog failure", async () => {
    const engine = new InMemoryStorageEngine().setFreeSpace("ds", 10).addSnapshot("ds/a", "L1", 100, 10);
    engine.failListSnapshots = true;

    const report = await evictorFor(engine).evict(policy(200));

    expect(report.stopReason).toBe("catalog-failed");
    expect(report.error).toBe("zfs list -t snapshot failed: pool is busy");
    expect(engine.destroyed).toEqual([]);
  });

  it("waits for the settle delay before re-polling", async () => {
    const engine = new InMemoryStorageEngine()
      .setFreeSpace("ds", 150)
      .addSnapshot("ds/a", "L1", 100, 100)
      .addSnapshot("ds/a", "L2", 200, 100);

    const started = Date.now();
    const report = await evictorFor(engine, 20).evict(policy(200));

    expect(report.stopReason).toBe("goal-met");
    // one settle at the group boundary and one before the final check
    expect(Date.now() - started).toBeGreaterThanOrEqual(38);
  });
});
