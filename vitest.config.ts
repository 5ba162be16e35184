import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["backend/**/*.test.ts"],
    environment: "node",
    // every test file opens its own in-process DuckDB
    testTimeout: 20000,
  },
});
