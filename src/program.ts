import { Command } from "commander";
import { type RetentionArgs, retentionArgsSchema } from "./config/index.js";

const EXAMPLES = `
Examples:
  $ snaptide tank 300
  $ snaptide tank              keep 200G free, 30 days of snapshots, 7 days of intraday snapshots
  $ snaptide tank 500 30 10    keep 500G free for 30 days, consolidate intraday snapshots older than 10 days
`;

/**
 * Build the command line surface. `run` receives validated arguments; invalid
 * or missing arguments end in usage text and exit code 1.
 */
export function buildProgram(run: (args: RetentionArgs) => Promise<void>): Command {
  const program: Command = new Command();

  program
    .name("snaptide")
    .description("Snapshot every dataset of a pool and prune old snapshots to keep free space above a floor")
    .argument("<pool>", "pool to snapshot and keep free space in")
    .argument("[min_free_space_gb]", "free space to maintain, in GiB", "200")
    .argument("[days_to_keep]", "snapshots younger than this many days are never deleted", "30")
    .argument("[intraday_days_to_keep]", "collapse same-day snapshots older than this many days", "7")
    .showHelpAfterError()
    .addHelpText("after", EXAMPLES)
    .action(async (pool: string, minFreeSpaceGb: string, maxAgeDays: string, intradayDays: string) => {
      const parsed = retentionArgsSchema.safeParse({ pool, minFreeSpaceGb, maxAgeDays, intradayDays });
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        program.error(`error: invalid arguments (${issues})`, { exitCode: 1, code: "snaptide.invalidArgument" });
      }
      await run(parsed.data);
    });

  return program;
}
