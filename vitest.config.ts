import { defineConfig } from "vitest/config";

/**
 * Vitest configuration for the package.
 * Runs test files in forked processes so Ink's raw-mode stdin stubs stay
 * isolated per file.
 */
export default defineConfig({
  test: {
    pool: "forks",
    environment: "node",
    include: ["tests/**/*.test.ts", "tests/**/*.test.tsx"],
  },
});
