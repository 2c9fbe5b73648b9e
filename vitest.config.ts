import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Sockets and fake hypervisors are per-file; keep files isolated
    pool: "forks",
    testTimeout: 10000,
    hookTimeout: 10000,
  },
})
