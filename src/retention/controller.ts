import type { ConsolidationScope } from "../config/index.js";
import { logger } from "../config/logger.js";
import { isWithin, type StorageEngine } from "../storage/types.js";
import { SnapshotCatalog } from "./catalog.js";
import { type ConsolidationReport, IntradayConsolidator } from "./consolidator.js";
import { type CreationReport, SnapshotCreator } from "./creator.js";
import { type EvictionReport, SpaceEvictor } from "./evictor.js";
import { formatSnapshotLabel } from "./label.js";
import { SnapshotReaper } from "./reaper.js";
import { RunLock, RunLockedError } from "./run-lock.js";
import { SpaceGauge } from "./space-gauge.js";
import { DeletionThrottle } from "./throttle.js";
import { computeThresholds, type RetentionPolicy, type RetentionThresholds } from "./thresholds.js";

export interface RetentionRunOptions extends RetentionPolicy {
  pool: string;
  deleteConcurrency: number;
  settleDelayMs: number;
  consolidationScope: ConsolidationScope;
  /** Path of the single-runner lock; empty or omitted runs unlocked. */
  lockFile?: string;
  /** Run start; defaults to the current time. */
  now?: Date;
}

export type RunReport =
  | { status: "skipped"; label: string; reason: string }
  | {
      status: "completed";
      label: string;
      thresholds: Readonly<RetentionThresholds>;
      initialAvailableGb: number | null;
      consolidation: ConsolidationReport;
      eviction: EvictionReport;
      creation: CreationReport;
    };

/**
 * One full retention run against a pool:
 * gauge → intraday consolidation → space eviction → snapshot creation.
 *
 * Operational failures are logged and reported, never thrown.
 */
export async function runRetention(engine: StorageEngine, opts: RetentionRunOptions): Promise<RunReport> {
  const now = opts.now ?? new Date();
  const label = formatSnapshotLabel(now);
  const thresholds = computeThresholds(opts, now);

  let lock = opts.lockFile ? new RunLock(opts.lockFile) : null;
  if (lock) {
    try {
      await lock.acquire();
    } catch (err) {
      if (err instanceof RunLockedError) {
        logger.warn(`Skipping run for ${opts.pool}: ${err.message}`);
        return { status: "skipped", label, reason: err.message };
      }
      logger.warn(`Cannot take run lock ${opts.lockFile}, continuing without it`, {
        err: err instanceof Error ? err.message : String(err),
      });
      lock = null;
    }
  }

  const catalog = new SnapshotCatalog(engine);
  const gauge = new SpaceGauge(engine, opts.pool);
  const reaper = new SnapshotReaper(engine, new DeletionThrottle(opts.deleteConcurrency));

  if (opts.consolidationScope === "all") {
    logger.debug("Intraday consolidation covers every visible dataset, not only the target pool");
  }

  try {
    const initialAvailableGb = await gauge.available();

    const consolidation = await new IntradayConsolidator({
      catalog,
      reaper,
      scope: opts.consolidationScope === "pool" ? (ds) => isWithin(ds, opts.pool) : undefined,
    }).consolidate(thresholds);

    const eviction = await new SpaceEvictor({
      gauge,
      catalog,
      reaper,
      settleDelayMs: opts.settleDelayMs,
    }).evict(thresholds);

    const creation = await new SnapshotCreator(engine).createAll(opts.pool, label);

    // Final join point of the run.
    await reaper.join();

    return {
      status: "completed",
      label,
      thresholds,
      initialAvailableGb,
      consolidation,
      eviction,
      creation,
    };
  } finally {
    await lock?.release();
  }
}
