import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "true" || process.env.GITHUB_ACTIONS === "true";

export default defineConfig({
  test: {
    testTimeout: 30_000,
    hookTimeout: 30_000,
    unstubEnvs: true,
    unstubGlobals: true,
    pool: "forks",
    maxWorkers: isCI ? 2 : 4,
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    exclude: ["dist/**", "**/node_modules/**", "**/*.live.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      all: false,
      include: ["./src/**/*.ts"],
      exclude: ["test/**", "src/**/*.test.ts", "src/index.ts", "src/cli/**"],
    },
  },
});
