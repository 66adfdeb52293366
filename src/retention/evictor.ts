import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../config/logger.js";
import type { Catalog, SnapshotCatalog } from "./catalog.js";
import { mergeTallies, type ReapTally, type SnapshotReaper } from "./reaper.js";
import { meetsFloor, type SpaceGauge } from "./space-gauge.js";
import type { RetentionThresholds } from "./thresholds.js";

export type EvictionStopReason =
  /** Free space was already at or above the floor; no catalog was built. */
  | "adequate"
  | "goal-met"
  | "age-ceiling"
  | "exhausted"
  | "no-snapshots"
  | "catalog-failed";

export interface EvictionReport {
  stopReason: EvictionStopReason;
  /** Last known free space in GiB, null when the last read failed. */
  finalAvailableGb: number | null;
  /** True when the run ended below the floor (or with an unknown reading). */
  degraded: boolean;
  tally: ReapTally;
  error?: string;
}

export interface EvictorOptions {
  gauge: SpaceGauge;
  catalog: SnapshotCatalog;
  reaper: SnapshotReaper;
  /** Pause after joining a deletion group, before re-polling space. */
  settleDelayMs: number;
}

const DEGRADED_WARNING =
  "Couldn't free up enough space by deleting old snapshots. Consider freeing some space as pool performance may be degraded.";

/**
 * Deletes snapshots oldest-first until the free-space floor is met or the
 * age ceiling is reached.
 *
 * Space is re-polled once per distinct creation time: when the walk reaches a
 * newer timestamp group it joins the previous group's destroys, waits for the
 * engine's space accounting to settle, then reads again.
 */
export class SpaceEvictor {
  private readonly gauge: SpaceGauge;
  private readonly catalog: SnapshotCatalog;
  private readonly reaper: SnapshotReaper;
  private readonly settleDelayMs: number;

  constructor(opts: EvictorOptions) {
    this.gauge = opts.gauge;
    this.catalog = opts.catalog;
    this.reaper = opts.reaper;
    this.settleDelayMs = opts.settleDelayMs;
  }

  async evict(
    thresholds: Pick<RetentionThresholds, "minFreeSpaceGb" | "maxAgeCeiling" | "maxAgeDays">,
  ): Promise<EvictionReport> {
    const floor = thresholds.minFreeSpaceGb;
    let available = await this.gauge.available();

    if (meetsFloor(available, floor)) {
      logger.info("Free space is adequate, no snapshots need to be deleted.");
      return { stopReason: "adequate", finalAvailableGb: available, degraded: false, tally: emptyTally() };
    }

    logger.info("Deleting old snapshots to free space...");

    let catalog: Catalog;
    try {
      catalog = await this.catalog.listAll();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error("Could not list snapshots for eviction", { err: message });
      return this.finish("catalog-failed", available, emptyTally(), floor, message);
    }

    if (catalog.length === 0) {
      logger.warn("No snapshots found. Consider freeing some space as pool performance may be degraded.");
      return this.finish("no-snapshots", available, emptyTally(), floor);
    }

    const tallies: ReapTally[] = [];
    let checkpoint = catalog[0].creationEpoch;
    let stopReason: EvictionStopReason = "exhausted";

    for (const snap of catalog) {
      if (snap.creationEpoch > thresholds.maxAgeCeiling) {
        logger.info(`Minimum ${thresholds.maxAgeDays} days to keep exceeded.`);
        stopReason = "age-ceiling";
        break;
      }

      if (snap.creationEpoch > checkpoint) {
        logger.info("Checking free space...");
        tallies.push(await this.reaper.join());
        if (this.settleDelayMs > 0) await sleep(this.settleDelayMs);
        available = await this.gauge.available();
        checkpoint = snap.creationEpoch;
      }

      if (meetsFloor(available, floor)) {
        logger.info("Adequate free space achieved.");
        stopReason = "goal-met";
        break;
      }
      await this.reaper.dispatch(snap, "eviction");
    }

    tallies.push(await this.reaper.join());
    if (this.settleDelayMs > 0) await sleep(this.settleDelayMs);
    available = await this.gauge.available();
    return this.finish(stopReason, available, mergeTallies(...tallies), floor);
  }

  private finish(
    stopReason: EvictionStopReason,
    available: number | null,
    tally: ReapTally,
    floor: number,
    error?: string,
  ): EvictionReport {
    const degraded = !meetsFloor(available, floor);
    if (degraded) {
      logger.warn(DEGRADED_WARNING);
      logger.warn(`Free space: ${available === null ? "unknown" : `${available}G`}`);
    }
    logger.info(`Eviction finished (${stopReason}): deleted ${tally.destroyed.length} snapshot(s)`, {
      absent: tally.absent.length,
      failed: tally.failed.length,
    });
    return { stopReason, finalAvailableGb: available, degraded, tally, ...(error ? { error } : {}) };
  }
}

function emptyTally(): ReapTally {
  return { destroyed: [], absent: [], failed: [] };
}
