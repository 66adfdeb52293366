import { logger } from "../config/logger.js";
import { isWithin, type StorageEngine } from "../storage/types.js";

export interface CreationReport {
  label: string;
  created: string[];
  failed: string[];
  error?: string;
}

/**
 * Snapshots every dataset of a pool under one shared label, so incremental
 * transfer tooling sees the whole pool as a single generation.
 */
export class SnapshotCreator {
  private readonly engine: StorageEngine;

  constructor(engine: StorageEngine) {
    this.engine = engine;
  }

  async createAll(pool: string, label: string): Promise<CreationReport> {
    let datasets: string[];
    try {
      datasets = (await this.engine.listDatasets(pool)).filter((ds) => isWithin(ds, pool));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Could not list datasets of ${pool}, no snapshots created`, { err: message });
      return { label, created: [], failed: [], error: message };
    }

    const results = await Promise.all(datasets.map((dataset) => this.createOne(dataset, label)));

    const created = results.filter((r) => r.ok).map((r) => r.dataset);
    const failed = results.filter((r) => !r.ok).map((r) => r.dataset);
    logger.info(`Created ${created.length} snapshot(s) of ${pool} at ${label}, ${failed.length} failed`);
    return { label, created, failed };
  }

  private async createOne(dataset: string, label: string): Promise<{ dataset: string; ok: boolean }> {
    logger.info(`Creating snapshot for dataset: ${dataset}`);
    try {
      await this.engine.createSnapshot(dataset, label);
      logger.info(`Snapshot created: ${dataset}@${label}`);
      return { dataset, ok: true };
    } catch (err) {
      logger.error(`Snapshot failed: ${dataset}@${label}`, { err: err instanceof Error ? err.message : String(err) });
      return { dataset, ok: false };
    }
  }
}
