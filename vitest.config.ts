import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
    // Pipe reads wait for bytes; a missing write should fail fast, not hang.
    testTimeout: 2_000,
    projects: [
      {
        extends: true,
        test: { name: "logger", include: ["packages/logger/src/**/__tests__/**/*.test.ts"] },
      },
      {
        extends: true,
        test: { name: "wire", include: ["packages/wire/src/**/__tests__/**/*.test.ts"] },
      },
    ],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/__tests__/**", "**/index.ts"],
    },
  },
})
