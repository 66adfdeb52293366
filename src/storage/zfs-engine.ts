import { execFile } from "node:child_process";
import { promisify } from "node:util";
import {
  type DestroyOutcome,
  type SizeUnit,
  type SnapshotRecord,
  type SpaceReading,
  type StorageEngine,
  StorageCommandError,
  StorageOutputError,
  sizeUnitSchema,
} from "./types.js";

const execFileAsync = promisify(execFile);

/** Large pools list tens of thousands of snapshots. */
const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

const SIZE_RE = /^(\d+(?:\.\d+)?)([BKMGTPE])?$/;

/** stderr fragments zfs prints when the target of a destroy is already gone. */
const ABSENT_MARKERS = ["could not find any snapshots to destroy", "does not exist"];

/**
 * Parse a zfs human-readable size such as `1.5T`, `820G` or `512` (bytes).
 */
export function parseSize(raw: string): SpaceReading {
  const match = SIZE_RE.exec(raw.trim());
  if (!match) {
    throw new StorageOutputError("size", raw);
  }
  const unit: SizeUnit = match[2] ? sizeUnitSchema.parse(match[2]) : "B";
  return { magnitude: Number.parseFloat(match[1]), unit };
}

/**
 * Parse `zfs list -H -p -t snapshot -o creation,name` output.
 * Lines that do not start with an epoch are skipped.
 */
export function parseSnapshotList(stdout: string): SnapshotRecord[] {
  const records: SnapshotRecord[] = [];
  for (const line of stdout.split("\n")) {
    const [creation, name] = line.split("\t");
    if (!creation || !name || !/^\d+$/.test(creation)) continue;

    const at = name.indexOf("@");
    if (at <= 0 || at === name.length - 1) {
      throw new StorageOutputError("snapshot name", name);
    }
    records.push({
      dataset: name.slice(0, at),
      label: name.slice(at + 1),
      creationEpoch: Number.parseInt(creation, 10),
    });
  }
  return records;
}

function stderrOf(err: unknown): string {
  if (err instanceof Error && "stderr" in err && typeof err.stderr === "string") {
    return err.stderr;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * ZFS binding. Every call goes through execFile with an explicit argument
 * array; nothing is ever interpolated into a shell.
 */
export class ZfsStorageEngine implements StorageEngine {
  private readonly binary: string;

  constructor(binary = "zfs") {
    this.binary = binary;
  }

  private async run(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.binary, args, { maxBuffer: MAX_OUTPUT_BYTES });
      return stdout;
    } catch (err) {
      throw new StorageCommandError(this.binary, args, stderrOf(err), err);
    }
  }

  async listDatasets(root?: string): Promise<string[]> {
    const args = ["list", "-H", "-t", "filesystem,volume", "-o", "name"];
    if (root) args.push("-r", root);
    const stdout = await this.run(args);
    return stdout
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }

  async listSnapshots(): Promise<SnapshotRecord[]> {
    const stdout = await this.run(["list", "-H", "-p", "-t", "snapshot", "-o", "creation,name"]);
    return parseSnapshotList(stdout);
  }

  async availableSpace(pool: string): Promise<SpaceReading> {
    const stdout = await this.run(["list", "-H", "-o", "available", pool]);
    const lines = stdout.split("\n").filter((line) => line.trim() !== "");
    const last = lines[lines.length - 1];
    if (last === undefined) {
      throw new StorageOutputError("available space", stdout);
    }
    return parseSize(last);
  }

  async createSnapshot(dataset: string, label: string): Promise<void> {
    await this.run(["snapshot", `${dataset}@${label}`]);
  }

  async destroySnapshot(dataset: string, label: string): Promise<DestroyOutcome> {
    try {
      await this.run(["destroy", `${dataset}@${label}`]);
      return "destroyed";
    } catch (err) {
      if (err instanceof StorageCommandError && ABSENT_MARKERS.some((m) => err.stderr.includes(m))) {
        return "absent";
      }
      throw err;
    }
  }
}
