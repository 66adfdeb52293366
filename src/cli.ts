#!/usr/bin/env node
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { buildProgram } from "./program.js";
import { runRetention } from "./retention/controller.js";
import { ZfsStorageEngine } from "./storage/zfs-engine.js";

const program = buildProgram(async (args) => {
  await runRetention(new ZfsStorageEngine(config.zfsBinary), {
    ...args,
    deleteConcurrency: config.deleteConcurrency,
    settleDelayMs: config.settleDelayMs,
    consolidationScope: config.consolidationScope,
    lockFile: config.lockFile,
  });
});

program.parseAsync(process.argv).catch((err) => {
  logger.error("Retention run aborted", {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exitCode = 1;
});
