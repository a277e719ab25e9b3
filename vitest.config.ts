import { defineConfig } from "vitest/config";

const isCI = !!process.env.CI;

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    // CI: retry flaky tests up to 2 times, increase timeout for slow runners
    ...(isCI && { retry: 2, testTimeout: 30_000 }),
    setupFiles: ["./tests/vitest.setup.ts"],
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "dist/",
        "**/*.test.ts",
        "vitest.config.ts",
        "src/index.ts",
        // Type-only files (no executable code to test)
        "src/transcripts/types.ts",
        "src/transcripts/pipeline/types.ts",
        "src/embeddings/base.ts",
        // Test utilities (not production code)
        "tests/**/test-helpers.ts",
        "tests/mocks/**",
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 75,
        statements: 85,
        "src/transcripts/segmenter.ts": {
          lines: 100,
          functions: 100,
          branches: 95,
          statements: 100,
        },
        "src/transcripts/pipeline/batch-runner.ts": {
          lines: 95,
          functions: 100,
          branches: 85,
          statements: 95,
        },
      },
    },
  },
});
