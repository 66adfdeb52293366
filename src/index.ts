export { type Config, loadConfig, type RetentionArgs, retentionArgsSchema } from "./config/index.js";
export { buildProgram } from "./program.js";
export { type Catalog, compareSnapshots, SnapshotCatalog } from "./retention/catalog.js";
export { bucketByDay, type ConsolidationReport, IntradayConsolidator } from "./retention/consolidator.js";
export { type RetentionRunOptions, type RunReport, runRetention } from "./retention/controller.js";
export { type CreationReport, SnapshotCreator } from "./retention/creator.js";
export { type EvictionReport, type EvictionStopReason, SpaceEvictor } from "./retention/evictor.js";
export { formatSnapshotLabel, labelDay } from "./retention/label.js";
export { type ReapTally, SnapshotReaper } from "./retention/reaper.js";
export { RunLock, RunLockedError } from "./retention/run-lock.js";
export { meetsFloor, SpaceGauge, toGib } from "./retention/space-gauge.js";
export { DeletionThrottle } from "./retention/throttle.js";
export { computeThresholds, type RetentionPolicy, type RetentionThresholds } from "./retention/thresholds.js";
export { InMemoryStorageEngine } from "./storage/in-memory-engine.js";
export * from "./storage/types.js";
export { parseSize, parseSnapshotList, ZfsStorageEngine } from "./storage/zfs-engine.js";
