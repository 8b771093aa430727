import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // the CLI tests change the working directory, which worker threads forbid
    pool: "forks",
    testTimeout: 30_000,
  },
});
