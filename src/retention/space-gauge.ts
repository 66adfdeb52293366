import { logger } from "../config/logger.js";
import type { SizeUnit, SpaceReading, StorageEngine } from "../storage/types.js";

/** Multipliers into the base unit (GiB). */
const GIB_PER_UNIT: Record<SizeUnit, number> = {
  B: 1 / 1024 ** 3,
  K: 1 / 1024 ** 2,
  M: 1 / 1024,
  G: 1,
  T: 1024,
  P: 1024 ** 2,
  E: 1024 ** 3,
};

/** Normalize a reading to whole GiB, rounding to the nearest unit. */
export function toGib(reading: SpaceReading): number {
  return Math.round(reading.magnitude * GIB_PER_UNIT[reading.unit]);
}

/**
 * Reads a pool's available space. Every reading is logged; a failed read
 * returns null, which callers must treat as below any threshold.
 */
export class SpaceGauge {
  private readonly engine: StorageEngine;
  readonly pool: string;

  constructor(engine: StorageEngine, pool: string) {
    this.engine = engine;
    this.pool = pool;
  }

  async available(): Promise<number | null> {
    try {
      const gb = toGib(await this.engine.availableSpace(this.pool));
      logger.info(`Available space in ${this.pool}: ${gb}G`);
      return gb;
    } catch (err) {
      logger.error(`Could not read available space for ${this.pool}`, {
        err: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}

/** True when a reading is known and at or above the floor. */
export function meetsFloor(availableGb: number | null, floorGb: number): boolean {
  return availableGb !== null && availableGb >= floorGb;
}
