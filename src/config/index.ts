import { z } from "zod";

export const consolidationScopeSchema = z.enum(["all", "pool"]);
export type ConsolidationScope = z.infer<typeof consolidationScopeSchema>;

const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Append-only run log. Empty string disables the file transport. */
  logFile: z.string().default("/var/log/snapshots.log"),

  /** Single-runner lock. Empty string disables locking. */
  lockFile: z.string().default("/run/snaptide.lock"),

  zfsBinary: z.string().min(1).default("zfs"),

  /** Ceiling on concurrently in-flight destroys, shared by every pass. */
  deleteConcurrency: z.coerce.number().int().min(1).max(256).default(16),

  /** Pause between joining a deletion group and re-polling free space. */
  settleDelayMs: z.coerce.number().int().min(0).default(5000),

  /**
   * Which datasets the intraday pass looks at. "all" covers every dataset
   * visible to the process, "pool" only the target pool.
   */
  consolidationScope: consolidationScopeSchema.default("all"),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: env.LOG_LEVEL || undefined,
    logFile: env.SNAPTIDE_LOG_FILE,
    lockFile: env.SNAPTIDE_LOCK_FILE,
    zfsBinary: env.SNAPTIDE_ZFS_BIN || undefined,
    deleteConcurrency: env.SNAPTIDE_DELETE_CONCURRENCY || undefined,
    settleDelayMs: env.SNAPTIDE_SETTLE_DELAY_MS || undefined,
    consolidationScope: env.SNAPTIDE_CONSOLIDATION_SCOPE || undefined,
  });
}

export const config = loadConfig();

/**
 * Positional retention arguments. Defaults: keep 200G free, keep 30 days of
 * snapshots, consolidate intraday snapshots older than 7 days.
 */
export const retentionArgsSchema = z.object({
  pool: z.string().min(1, "pool is required"),
  minFreeSpaceGb: z.coerce.number().int().min(0).default(200),
  maxAgeDays: z.coerce.number().int().min(0).default(30),
  intradayDays: z.coerce.number().int().min(0).default(7),
});

export type RetentionArgs = z.infer<typeof retentionArgsSchema>;
