import { defineConfig } from "vitest/config";

// Forked workers sometimes outlive the run in containers; threads exit cleanly.
export default defineConfig({
  test: {
    pool: "threads",
    include: ["test/**/*.test.ts"],
  },
});
