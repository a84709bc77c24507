import { defineConfig } from "vitest/config";
import { resolve } from "node:path";

const domainEntry = resolve(__dirname, "../packages/domain/src/index.ts");

export default defineConfig({
  resolve: {
    preserveSymlinks: true,
    alias: {
      "@pcr-bess/domain": domainEntry,
    },
  },
  test: {
    pool: "forks",
    globals: true,
    env: {
      PCR_SIM_STORAGE_PATH: ":memory:",
    },
  },
});
