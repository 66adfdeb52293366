export interface RetentionPolicy {
  /** Free-space floor in GiB. */
  minFreeSpaceGb: number;
  /** Snapshots younger than this are never evicted for space. */
  maxAgeDays: number;
  /** Same-day snapshots older than this are collapsed to one per day. */
  intradayDays: number;
}

export interface RetentionThresholds extends RetentionPolicy {
  /** Epoch seconds; snapshots created after this are kept regardless of space pressure. */
  maxAgeCeiling: number;
  /** Epoch seconds; only snapshots created before this are consolidated. */
  intradayCeiling: number;
}

/** Same local wall-clock time `days` calendar days earlier, in epoch seconds. */
function daysBefore(now: Date, days: number): number {
  const then = new Date(now.getTime());
  then.setDate(then.getDate() - days);
  return Math.floor(then.getTime() / 1000);
}

export function computeThresholds(policy: RetentionPolicy, now: Date): Readonly<RetentionThresholds> {
  return Object.freeze({
    minFreeSpaceGb: policy.minFreeSpaceGb,
    maxAgeDays: policy.maxAgeDays,
    intradayDays: policy.intradayDays,
    maxAgeCeiling: daysBefore(now, policy.maxAgeDays),
    intradayCeiling: daysBefore(now, policy.intradayDays),
  });
}
