import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      // Keep test runs away from the system log and lock paths.
      SNAPTIDE_LOG_FILE: "",
      SNAPTIDE_LOCK_FILE: "",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Pure type-only and barrel files
        "src/storage/types.ts",
        "src/index.ts",
        "src/cli.ts",
      ],
    },
  },
});
