import { link, readFile, rename, rm, writeFile } from "node:fs/promises";
import { logger } from "../config/logger.js";

export class RunLockedError extends Error {
  /** Pid recorded in the lock file, null when it could not be read. */
  readonly holderPid: number | null;

  constructor(path: string, holderPid: number | null) {
    super(`Another run (pid ${holderPid ?? "unknown"}) holds ${path}`);
    this.name = "RunLockedError";
    this.holderPid = holderPid;
  }
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/** Whether a process with this pid exists. EPERM means it exists but belongs to someone else. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === "EPERM";
  }
}

function parsePid(content: string): number | null {
  const pid = Number.parseInt(content.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/**
 * Exclusive pid-file lock guarding against two runs on the same host. A lock
 * left behind by a dead process is taken over; when several runs race for the
 * same stale lock exactly one wins and the others get {@link RunLockedError}.
 */
export class RunLock {
  readonly path: string;
  private readonly pid: number;
  private readonly alive: (pid: number) => boolean;
  private held = false;

  constructor(path: string, opts?: { pid?: number; isAlive?: (pid: number) => boolean }) {
    this.path = path;
    this.pid = opts?.pid ?? process.pid;
    this.alive = opts?.isAlive ?? isProcessAlive;
  }

  /**
   * @throws RunLockedError when another run holds the lock.
   * Any other filesystem error is rethrown as is.
   */
  async acquire(): Promise<void> {
    if (await this.tryCreate()) return;

    const holder = await this.readHolder(this.path);
    if (holder !== null && holder !== this.pid && this.alive(holder)) {
      throw new RunLockedError(this.path, holder);
    }

    logger.warn(`Removing stale lock ${this.path}`, { holder });
    await this.evictStale(holder);

    if (!(await this.tryCreate())) {
      throw new RunLockedError(this.path, await this.readHolder(this.path));
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    await rm(this.path, { force: true });
  }

  /** The pid is written to a private file first so the lock never appears empty. */
  private async tryCreate(): Promise<boolean> {
    const draft = `${this.path}.${this.pid}.tmp`;
    await writeFile(draft, `${this.pid}\n`);
    try {
      await link(draft, this.path);
      this.held = true;
      return true;
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return false;
      throw err;
    } finally {
      await rm(draft, { force: true });
    }
  }

  /**
   * Move the stale lock aside rather than deleting it in place. If what was
   * moved turns out to be a fresh lock written by a competing run, it is
   * linked back (never overwriting) and the caller loses the race.
   */
  private async evictStale(staleHolder: number | null): Promise<void> {
    const aside = `${this.path}.stale-${this.pid}`;
    try {
      await rename(this.path, aside);
    } catch (err) {
      // Someone else already moved it; fall through to the exclusive create.
      if (errnoCode(err) === "ENOENT") return;
      throw err;
    }

    const moved = await this.readHolder(aside);
    if (moved !== staleHolder) {
      try {
        await link(aside, this.path);
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") throw err;
      }
      await rm(aside, { force: true });
      throw new RunLockedError(this.path, moved);
    }
    await rm(aside, { force: true });
  }

  private async readHolder(path: string): Promise<number | null> {
    try {
      return parsePid(await readFile(path, "utf-8"));
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    }
  }
}
