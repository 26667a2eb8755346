import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqlist/fp",
    globals: true,
    environment: "node",
    // process.chdir is unavailable in worker threads
    pool: "forks",
  },
});
