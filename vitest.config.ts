import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const isCI = process.env.CI === "1" || process.env.CI === "true";

const source = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "geo-workshop-engine": source("./engine/src/index.ts"),
      "geo-workshop-ingestion": source("./ingestion/src/index.ts"),
      "geo-workshop-sessions": source("./sessions/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts", "sessions/tests/**/*.test.ts"],
    pool: isCI ? "forks" : "threads",
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 15000,
    hookTimeout: isCI ? 30000 : 10000,
  },
});
