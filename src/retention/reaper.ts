import { logger } from "../config/logger.js";
import { type DestroyOutcome, type SnapshotRecord, type StorageEngine, snapshotName } from "../storage/types.js";
import type { DeletionThrottle } from "./throttle.js";

export type ReapReason = "eviction" | "intraday";

export interface ReapTally {
  destroyed: string[];
  absent: string[];
  failed: string[];
}

type ReapOutcome = DestroyOutcome | "failed";

/**
 * Fire-and-forget snapshot destroys with an explicit join. `dispatch` waits
 * only for throttle admission; `join` waits for everything dispatched since
 * the last join. A destroy that fails is logged and counted, never rethrown.
 */
export class SnapshotReaper {
  private readonly engine: StorageEngine;
  private readonly throttle: DeletionThrottle;
  private pending: Array<Promise<[string, ReapOutcome]>> = [];

  constructor(engine: StorageEngine, throttle: DeletionThrottle) {
    this.engine = engine;
    this.throttle = throttle;
  }

  get outstanding(): number {
    return this.pending.length;
  }

  async dispatch(snapshot: SnapshotRecord, reason: ReapReason): Promise<void> {
    const name = snapshotName(snapshot);
    const { done } = await this.throttle.admit(() => this.destroy(snapshot, name, reason));
    this.pending.push(done);
  }

  async join(): Promise<ReapTally> {
    const tally: ReapTally = { destroyed: [], absent: [], failed: [] };
    while (this.pending.length > 0) {
      const batch = this.pending;
      this.pending = [];
      for (const [name, outcome] of await Promise.all(batch)) {
        tally[outcome].push(name);
      }
    }
    return tally;
  }

  private async destroy(snapshot: SnapshotRecord, name: string, reason: ReapReason): Promise<[string, ReapOutcome]> {
    if (reason === "intraday") {
      logger.info(`Removing outdated intraday snapshot: ${name}`);
    } else {
      logger.info(`Deleting snapshot ${name}`);
    }

    try {
      const outcome = await this.engine.destroySnapshot(snapshot.dataset, snapshot.label);
      if (outcome === "absent") {
        logger.info(`Snapshot ${name} was already gone`);
      }
      return [name, outcome];
    } catch (err) {
      logger.error(`Failed to delete snapshot ${name}`, { err: err instanceof Error ? err.message : String(err) });
      return [name, "failed"];
    }
  }
}

export function mergeTallies(...tallies: ReapTally[]): ReapTally {
  return {
    destroyed: tallies.flatMap((t) => t.destroyed),
    absent: tallies.flatMap((t) => t.absent),
    failed: tallies.flatMap((t) => t.failed),
  };
}
