import { z } from "zod";

/** One snapshot of one dataset, as listed by the storage engine. */
export interface SnapshotRecord {
  dataset: string;
  label: string;
  /** Creation time, epoch seconds. */
  creationEpoch: number;
}

export const sizeUnitSchema = z.enum(["B", "K", "M", "G", "T", "P", "E"]);
export type SizeUnit = z.infer<typeof sizeUnitSchema>;

/** A human-readable size as reported by the engine, e.g. 1.5T. */
export interface SpaceReading {
  magnitude: number;
  unit: SizeUnit;
}

/** `absent` means the snapshot was already gone; callers must not treat it as an error. */
export type DestroyOutcome = "destroyed" | "absent";

/**
 * Snapshot primitives of the underlying storage engine.
 *
 * Every method may throw {@link StorageCommandError} or {@link StorageOutputError}.
 */
export interface StorageEngine {
  /** All visible datasets, or `root` and everything nested under it. */
  listDatasets(root?: string): Promise<string[]>;
  /** Every snapshot of every pool visible to this process, in no particular order. */
  listSnapshots(): Promise<SnapshotRecord[]>;
  availableSpace(pool: string): Promise<SpaceReading>;
  createSnapshot(dataset: string, label: string): Promise<void>;
  destroySnapshot(dataset: string, label: string): Promise<DestroyOutcome>;
}

export function snapshotName(snapshot: Pick<SnapshotRecord, "dataset" | "label">): string {
  return `${snapshot.dataset}@${snapshot.label}`;
}

/** True when `dataset` is `root` itself or nested below it (`tank` never matches `tank2`). */
export function isWithin(dataset: string, root: string): boolean {
  return dataset === root || dataset.startsWith(`${root}/`);
}

export class StorageCommandError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly stderr: string;

  constructor(command: string, args: readonly string[], stderr: string, cause?: unknown) {
    super(`${command} ${args.join(" ")} failed${stderr ? `: ${stderr.trim()}` : ""}`, { cause });
    this.name = "StorageCommandError";
    this.command = command;
    this.args = args;
    this.stderr = stderr;
  }
}

export class StorageOutputError extends Error {
  constructor(what: string, output: string) {
    super(`Unexpected ${what} output: ${JSON.stringify(output)}`);
    this.name = "StorageOutputError";
  }
}
