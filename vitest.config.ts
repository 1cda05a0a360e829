import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.test.tsx", "tests/**/*.test.ts"],
    // Growing the tiling to depth 6 with exact arithmetic takes several seconds.
    testTimeout: 120000,
    hookTimeout: 120000,
  },
});
