import {
  type DestroyOutcome,
  isWithin,
  type SnapshotRecord,
  type SpaceReading,
  StorageCommandError,
  type StorageEngine,
  snapshotName,
} from "./types.js";

export interface InMemorySnapshot extends SnapshotRecord {
  /** Space returned to the pool when this snapshot is destroyed, in GiB. */
  sizeGb: number;
}

/**
 * In-process stand-in for a storage engine. Destroying a snapshot returns its
 * `sizeGb` to the owning pool immediately.
 */
export class InMemoryStorageEngine implements StorageEngine {
  private readonly datasets = new Set<string>();
  private readonly snapshots = new Map<string, InMemorySnapshot>();
  private readonly freeGb = new Map<string, number>();

  readonly destroyed: string[] = [];
  readonly created: string[] = [];
  availableSpaceCalls = 0;
  listSnapshotsCalls = 0;

  private inFlightDestroys = 0;
  maxInFlightDestroys = 0;

  failAvailableSpace = false;
  failListSnapshots = false;
  failListDatasets = false;
  readonly failCreateFor = new Set<string>();
  readonly failDestroyFor = new Set<string>();

  /** Awaited inside every destroy before it takes effect. */
  destroyGate: (name: string) => Promise<void> = async () => {};

  addDataset(dataset: string): this {
    this.datasets.add(dataset);
    return this;
  }

  addSnapshot(dataset: string, label: string, creationEpoch: number, sizeGb = 0): this {
    this.datasets.add(dataset);
    this.snapshots.set(`${dataset}@${label}`, { dataset, label, creationEpoch, sizeGb });
    return this;
  }

  setFreeSpace(pool: string, gb: number): this {
    this.freeGb.set(pool, gb);
    return this;
  }

  /** Remove a snapshot behind the controller's back. */
  removeExternally(name: string): void {
    this.snapshots.delete(name);
  }

  has(name: string): boolean {
    return this.snapshots.has(name);
  }

  remaining(): string[] {
    return [...this.snapshots.keys()].sort();
  }

  freeSpace(pool: string): number {
    return this.freeGb.get(pool) ?? 0;
  }

  async listDatasets(root?: string): Promise<string[]> {
    if (this.failListDatasets) {
      throw new StorageCommandError("zfs", ["list"], "pool is busy");
    }
    const all = [...this.datasets].sort();
    return root ? all.filter((ds) => isWithin(ds, root)) : all;
  }

  async listSnapshots(): Promise<SnapshotRecord[]> {
    this.listSnapshotsCalls++;
    if (this.failListSnapshots) {
      throw new StorageCommandError("zfs", ["list", "-t", "snapshot"], "pool is busy");
    }
    return [...this.snapshots.values()].map(({ dataset, label, creationEpoch }) => ({ dataset, label, creationEpoch }));
  }

  async availableSpace(pool: string): Promise<SpaceReading> {
    this.availableSpaceCalls++;
    if (this.failAvailableSpace || !this.freeGb.has(pool)) {
      throw new StorageCommandError("zfs", ["list", "-o", "available", pool], `cannot open '${pool}'`);
    }
    return { magnitude: this.freeSpace(pool), unit: "G" };
  }

  async createSnapshot(dataset: string, label: string): Promise<void> {
    const name = `${dataset}@${label}`;
    if (this.failCreateFor.has(dataset)) {
      throw new StorageCommandError("zfs", ["snapshot", name], "dataset is busy");
    }
    this.snapshots.set(name, { dataset, label, creationEpoch: 0, sizeGb: 0 });
    this.created.push(name);
  }

  async destroySnapshot(dataset: string, label: string): Promise<DestroyOutcome> {
    const name = snapshotName({ dataset, label });
    this.inFlightDestroys++;
    this.maxInFlightDestroys = Math.max(this.maxInFlightDestroys, this.inFlightDestroys);
    try {
      await this.destroyGate(name);
      if (this.failDestroyFor.has(name)) {
        throw new StorageCommandError("zfs", ["destroy", name], "dataset is busy");
      }
      const snap = this.snapshots.get(name);
      if (!snap) return "absent";

      this.snapshots.delete(name);
      this.destroyed.push(name);
      const pool = dataset.split("/")[0];
      this.freeGb.set(pool, this.freeSpace(pool) + snap.sizeGb);
      return "destroyed";
    } finally {
      this.inFlightDestroys--;
    }
  }
}
