import { logger } from "../config/logger.js";
import type { Catalog, SnapshotCatalog } from "./catalog.js";
import { labelDay } from "./label.js";
import type { ReapTally, SnapshotReaper } from "./reaper.js";
import type { RetentionThresholds } from "./thresholds.js";

export interface ConsolidationReport {
  /** Day buckets (dataset + day) holding more than one snapshot. */
  bucketsExamined: number;
  tally: ReapTally;
  error?: string;
}

export interface ConsolidatorOptions {
  catalog: SnapshotCatalog;
  reaper: SnapshotReaper;
  /** Restrict the pass to these datasets. Omitted means every visible dataset. */
  scope?: (dataset: string) => boolean;
}

/**
 * Group a catalog into `dataset → day → snapshots`, preserving catalog order
 * inside each bucket. Snapshots whose label carries no day are left out.
 */
export function bucketByDay(catalog: Catalog): Map<string, Map<string, Catalog[number][]>> {
  const byDataset = new Map<string, Map<string, Catalog[number][]>>();
  for (const snap of catalog) {
    const day = labelDay(snap.label);
    if (day === null) continue;

    let days = byDataset.get(snap.dataset);
    if (!days) {
      days = new Map();
      byDataset.set(snap.dataset, days);
    }
    const bucket = days.get(day);
    if (bucket) bucket.push(snap);
    else days.set(day, [snap]);
  }
  return byDataset;
}

/**
 * Collapses each dataset's same-day snapshots to the last one taken that day,
 * for snapshots older than the intraday ceiling. Independent of free space.
 */
export class IntradayConsolidator {
  private readonly catalog: SnapshotCatalog;
  private readonly reaper: SnapshotReaper;
  private readonly scope?: (dataset: string) => boolean;

  constructor(opts: ConsolidatorOptions) {
    this.catalog = opts.catalog;
    this.reaper = opts.reaper;
    this.scope = opts.scope;
  }

  async consolidate(thresholds: Pick<RetentionThresholds, "intradayCeiling" | "intradayDays">): Promise<ConsolidationReport> {
    logger.info(`Deleting intraday snapshots older than ${thresholds.intradayDays} days...`);

    let catalog: Catalog;
    try {
      catalog = await this.catalog.listAll(this.scope);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error("Intraday consolidation skipped: could not list snapshots", { err: message });
      return { bucketsExamined: 0, tally: { destroyed: [], absent: [], failed: [] }, error: message };
    }

    let bucketsExamined = 0;
    for (const days of bucketByDay(catalog).values()) {
      for (const bucket of days.values()) {
        if (bucket.length < 2) continue;
        bucketsExamined++;

        // Catalog order is ascending, so the last member is the day's survivor.
        for (const snap of bucket.slice(0, -1)) {
          if (snap.creationEpoch < thresholds.intradayCeiling) {
            await this.reaper.dispatch(snap, "intraday");
          }
        }
      }
    }

    const tally = await this.reaper.join();
    logger.info(`Intraday consolidation removed ${tally.destroyed.length} snapshot(s)`, {
      buckets: bucketsExamined,
      absent: tally.absent.length,
      failed: tally.failed.length,
    });
    return { bucketsExamined, tally };
  }
}
