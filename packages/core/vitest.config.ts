import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqlist/core",
    globals: true,
    environment: "node",
    // process.chdir is unavailable in worker threads
    pool: "forks",
  },
});
