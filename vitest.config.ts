import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "server/src/**/*.test.ts"],
    // Greedy-strategy tests run several thousand legality probes each.
    testTimeout: 20_000,
  },
});
