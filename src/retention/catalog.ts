import type { SnapshotRecord, StorageEngine } from "../storage/types.js";

/** Point-in-time, oldest-first listing of snapshots. Valid for one pass only. */
export type Catalog = readonly Readonly<SnapshotRecord>[];

export function compareSnapshots(a: SnapshotRecord, b: SnapshotRecord): number {
  if (a.creationEpoch !== b.creationEpoch) return a.creationEpoch - b.creationEpoch;
  if (a.dataset !== b.dataset) return a.dataset < b.dataset ? -1 : 1;
  if (a.label !== b.label) return a.label < b.label ? -1 : 1;
  return 0;
}

export class SnapshotCatalog {
  private readonly engine: StorageEngine;

  constructor(engine: StorageEngine) {
    this.engine = engine;
  }

  /**
   * List every snapshot, ascending by creation time with ties broken by
   * dataset then label. Lists afresh on every call. Throws if the engine does.
   */
  async listAll(include?: (dataset: string) => boolean): Promise<Catalog> {
    const records = await this.engine.listSnapshots();
    const scoped = include ? records.filter((s) => include(s.dataset)) : records;
    return Object.freeze(scoped.map((s) => Object.freeze({ ...s })).sort(compareSnapshots));
  }
}
