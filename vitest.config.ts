import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // Shiki loads its grammars on first use
    testTimeout: 30_000,
  },
});
